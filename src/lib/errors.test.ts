import { describe, it, expect } from 'vitest';

import {
  ApiError,
  authenticationRequired,
  ClassifiedError,
  classifyError,
  DEFAULT_MESSAGES,
  isAuthenticationError,
  stripErrorPrefix,
} from './errors';

describe('stripErrorPrefix', () => {
  it('removes stacked wrapping prefixes', () => {
    expect(stripErrorPrefix('Exception: Error: Invalid input')).toBe('Invalid input');
  });

  it('leaves plain messages untouched', () => {
    expect(stripErrorPrefix('Not found')).toBe('Not found');
  });
});

describe('classifyError', () => {
  describe('substring fallback', () => {
    it.each([
      ['Could not validate credentials', 'AuthenticationRequired'],
      ['Not authenticated', 'AuthenticationRequired'],
      ['Image appears to be AI-generated', 'ContentRejected'],
      ['Photo was heavily edited', 'ContentRejected'],
      ['This issue has already been reported nearby', 'DuplicateSubmission'],
      ['Record already exists', 'DuplicateSubmission'],
      ['You have submitted too many reports today', 'RateLimited'],
      ['Too many requests', 'RateLimited'],
      ['Blocked due to suspicious activity', 'SuspiciousActivity'],
      ['Request timeout - check your internet connection', 'NetworkUnavailable'],
      ['Failed to create issue: storage error', 'ServerRejected'],
      ['Failed to complete task', 'ServerRejected'],
      ['Something odd', 'Unknown'],
    ] as const)('classifies "%s" as %s', (message, category) => {
      expect(classifyError(new Error(message)).category).toBe(category);
    });

    it('first matching pattern wins', () => {
      // Matches both the auth and the network substrings
      const error = classifyError(new Error('Not authenticated: connection reset'));
      expect(error.category).toBe('AuthenticationRequired');
    });

    it('accepts raw strings', () => {
      expect(classifyError('Exception: Too many requests').category).toBe('RateLimited');
    });
  });

  it('uses the HTTP status before the message', () => {
    const error = classifyError(new ApiError(401, 'Bad gateway connection'));
    expect(error.category).toBe('AuthenticationRequired');
    expect(error.status).toBe(401);
  });

  it('maps status 429, 0 and 5xx', () => {
    expect(classifyError(new ApiError(429, 'slow down')).category).toBe('RateLimited');
    expect(classifyError(new ApiError(0, 'no response')).category).toBe('NetworkUnavailable');
    expect(classifyError(new ApiError(503, 'unavailable')).category).toBe('ServerRejected');
  });

  it('falls back to the message for statuses without a mapping', () => {
    const error = classifyError(new ApiError(400, 'This issue has already been reported'));
    expect(error.category).toBe('DuplicateSubmission');
  });

  it('prefers a structured code over the status', () => {
    const error = classifyError(new ApiError(400, 'rejected', { detail: 'rejected', code: 'synthetic_image' }));
    expect(error.category).toBe('ContentRejected');
  });

  it('reads error_code as well as code', () => {
    const error = classifyError(new ApiError(500, 'rejected', { error_code: 'duplicate_issue' }));
    expect(error.category).toBe('DuplicateSubmission');
  });

  it('ignores unknown codes and continues with the status', () => {
    const error = classifyError(new ApiError(429, 'x', { code: 'mystery' }));
    expect(error.category).toBe('RateLimited');
  });

  it('keeps the stripped raw message as detail and shows the category message', () => {
    const error = classifyError(new Error('Exception: disk quota'));
    expect(error.detail).toBe('disk quota');
    expect(error.message).toBe(DEFAULT_MESSAGES.Unknown);
  });

  it('applies per-call message overrides', () => {
    const error = classifyError(new ApiError(401, 'Incorrect'), {
      messages: { AuthenticationRequired: 'Wrong email or password.' },
    });
    expect(error.message).toBe('Wrong email or password.');
  });

  it('passes already-classified errors through', () => {
    const original = new ClassifiedError('RateLimited', 'wait', 'raw');
    expect(classifyError(original)).toBe(original);
  });
});

describe('authenticationRequired', () => {
  it('builds an AuthenticationRequired error', () => {
    const error = authenticationRequired();
    expect(error.category).toBe('AuthenticationRequired');
    expect(error.detail).toBe('No active session');
    expect(isAuthenticationError(error)).toBe(true);
    expect(isAuthenticationError(null)).toBe(false);
  });
});
