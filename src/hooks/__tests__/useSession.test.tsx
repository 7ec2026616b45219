import { act, renderHook, waitFor } from '@testing-library/react';
import type { ReactNode } from 'react';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { CivicClientProvider, useCivicClient } from '../../contexts/CivicClientContext';
import { MemoryStorage } from '../../lib/auth-token';
import { createCivicClient, type CivicClient } from '../../services/client';
import { DEFAULT_CONFIG } from '../../services/config';
import { FakePushDelivery, FakeTransport, userPayload } from '../../test/fakes';
import { useSession } from '../useSession';

function makeClient(): CivicClient {
  const transport = new FakeTransport()
    .reply('POST', '/auth/login', { access_token: 'test-token' })
    .reply('GET', '/users/me', userPayload());
  return createCivicClient({
    config: DEFAULT_CONFIG,
    transport,
    storage: new MemoryStorage(),
    push: new FakePushDelivery(),
  });
}

function wrapperFor(client: CivicClient) {
  return function Wrapper({ children }: { children: ReactNode }) {
    return <CivicClientProvider client={client}>{children}</CivicClientProvider>;
  };
}

describe('useSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('starts signed out', () => {
    const { result } = renderHook(() => useSession(), { wrapper: wrapperFor(makeClient()) });

    expect(result.current.isAuthenticated).toBe(false);
    expect(result.current.user).toBeNull();
  });

  it('re-renders with the user after login', async () => {
    const { result } = renderHook(() => useSession(), { wrapper: wrapperFor(makeClient()) });

    await act(async () => {
      await result.current.login('asha@example.com', 'test-secret');
    });

    expect(result.current.isAuthenticated).toBe(true);
    expect(result.current.user?.fullName).toBe('Asha Verma');
  });

  it('re-renders after the deferred logout publish', async () => {
    const client = makeClient();
    await client.session.login('asha@example.com', 'test-secret');
    const { result } = renderHook(() => useSession(), { wrapper: wrapperFor(client) });
    expect(result.current.isAuthenticated).toBe(true);

    await act(async () => {
      await result.current.logout();
    });

    await waitFor(() => {
      expect(result.current.isAuthenticated).toBe(false);
    });
  });
});

describe('useCivicClient', () => {
  it('throws outside the provider', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => renderHook(() => useCivicClient())).toThrow(
      'useCivicClient must be used within a CivicClientProvider'
    );
  });
});
