/**
 * Error classification
 *
 * Maps raw failures (transport exceptions, server rejection messages, timeouts)
 * onto a closed set of categories with a user-facing message. Structured codes
 * and HTTP statuses are checked first; message substrings are a legacy fallback
 * and are not a stable contract with the backend.
 */

import { isRecord } from './json';

export type ErrorCategory =
  | 'AuthenticationRequired'
  | 'DuplicateSubmission'
  | 'ContentRejected'
  | 'RateLimited'
  | 'SuspiciousActivity'
  | 'NetworkUnavailable'
  | 'ServerRejected'
  | 'Unknown';

/**
 * Failure raised by the transport. `status` is 0 when no response arrived
 * (network failure or timeout).
 */
export class ApiError extends Error {
  readonly status: number;
  readonly payload: unknown;

  constructor(status: number, message: string, payload: unknown = null) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.payload = payload;
  }
}

/**
 * A failure after classification. Held in container error state, and thrown
 * by the few operations that propagate instead of recording.
 */
export class ClassifiedError extends Error {
  readonly category: ErrorCategory;
  /** Raw failure text, for logs only */
  readonly detail: string;
  readonly status: number | null;

  constructor(category: ErrorCategory, message: string, detail: string, status: number | null = null) {
    super(message);
    this.name = 'ClassifiedError';
    this.category = category;
    this.detail = detail;
    this.status = status;
  }
}

export const DEFAULT_MESSAGES: Record<ErrorCategory, string> = {
  AuthenticationRequired: 'Your session has expired. Please sign in again.',
  DuplicateSubmission:
    'This issue has already been reported. Please check existing reports or take a new photo if this is a different problem.',
  ContentRejected:
    'Please upload a real photo taken with your camera. Edited or AI-generated images are not allowed.',
  RateLimited:
    'You have submitted too many reports recently. Please wait a few minutes before submitting another report.',
  SuspiciousActivity:
    'Your report could not be submitted. Please contact support if you believe this is an error.',
  NetworkUnavailable: 'Network error. Please check your internet connection and try again.',
  ServerRejected:
    'The server could not process your request. Please try again or contact support if the problem persists.',
  Unknown: 'Something went wrong. Please try again later.',
};

const CODE_CATEGORIES: Record<string, ErrorCategory> = {
  auth_required: 'AuthenticationRequired',
  invalid_credentials: 'AuthenticationRequired',
  token_expired: 'AuthenticationRequired',
  duplicate_issue: 'DuplicateSubmission',
  content_rejected: 'ContentRejected',
  synthetic_image: 'ContentRejected',
  rate_limited: 'RateLimited',
  suspicious_activity: 'SuspiciousActivity',
  server_error: 'ServerRejected',
};

// Order matters: first match wins.
const MESSAGE_PATTERNS: ReadonlyArray<{ category: ErrorCategory; substrings: readonly string[] }> = [
  {
    category: 'AuthenticationRequired',
    substrings: ['Could not validate credentials', 'Not authenticated', 'Authentication required'],
  },
  { category: 'ContentRejected', substrings: ['AI-generated', 'heavily edited'] },
  { category: 'DuplicateSubmission', substrings: ['already been reported', 'already exists'] },
  { category: 'RateLimited', substrings: ['too many reports', 'Too many requests'] },
  { category: 'SuspiciousActivity', substrings: ['suspicious activity'] },
  { category: 'NetworkUnavailable', substrings: ['timeout', 'connection'] },
  { category: 'ServerRejected', substrings: ['Failed to create issue', 'Failed to complete task'] },
];

const WRAPPING_PREFIX = /^(?:(?:Error|Exception|ApiError|TypeError):\s*)+/;

/**
 * Remove the "Error: " / "Exception: " wrapping that stringified failures carry
 */
export function stripErrorPrefix(message: string): string {
  return message.replace(WRAPPING_PREFIX, '').trim();
}

function rawMessage(raw: unknown): string {
  if (raw instanceof Error) return raw.message;
  if (typeof raw === 'string') return raw;
  return String(raw);
}

function structuredCode(payload: unknown): string | null {
  if (!isRecord(payload)) return null;
  const code = payload.code ?? payload.error_code;
  return typeof code === 'string' ? code : null;
}

function categoryFromStatus(status: number): ErrorCategory | null {
  if (status === 0) return 'NetworkUnavailable';
  if (status === 401) return 'AuthenticationRequired';
  if (status === 429) return 'RateLimited';
  if (status >= 500) return 'ServerRejected';
  return null;
}

function categoryFromMessage(message: string): ErrorCategory {
  for (const pattern of MESSAGE_PATTERNS) {
    if (pattern.substrings.some((s) => message.includes(s))) {
      return pattern.category;
    }
  }
  return 'Unknown';
}

export interface ClassifyOptions {
  /** Per-call wording, e.g. login shows "Incorrect email or password" for auth failures */
  messages?: Partial<Record<ErrorCategory, string>>;
}

/**
 * Classify a raw failure. Already-classified errors pass through unchanged.
 */
export function classifyError(raw: unknown, options: ClassifyOptions = {}): ClassifiedError {
  if (raw instanceof ClassifiedError) return raw;

  const detail = stripErrorPrefix(rawMessage(raw));
  let category: ErrorCategory | null = null;
  let status: number | null = null;

  if (raw instanceof ApiError) {
    status = raw.status;
    const code = structuredCode(raw.payload);
    if (code !== null) {
      category = CODE_CATEGORIES[code] ?? null;
    }
    if (category === null) {
      category = categoryFromStatus(raw.status);
    }
  }

  if (category === null) {
    category = categoryFromMessage(detail);
  }

  const message = options.messages?.[category] ?? DEFAULT_MESSAGES[category];
  return new ClassifiedError(category, message, detail, status);
}

/**
 * The error a container records when an authenticated call is attempted without a session
 */
export function authenticationRequired(detail = 'No active session'): ClassifiedError {
  return new ClassifiedError('AuthenticationRequired', DEFAULT_MESSAGES.AuthenticationRequired, detail);
}

export function isAuthenticationError(error: ClassifiedError | null): boolean {
  return error !== null && error.category === 'AuthenticationRequired';
}
