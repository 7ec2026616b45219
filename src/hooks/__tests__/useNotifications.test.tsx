import { act, renderHook } from '@testing-library/react';
import type { ReactNode } from 'react';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { CivicClientProvider } from '../../contexts/CivicClientContext';
import { MemoryStorage } from '../../lib/auth-token';
import { createCivicClient } from '../../services/client';
import { DEFAULT_CONFIG } from '../../services/config';
import { FakeTransport } from '../../test/fakes';
import { useNotifications } from '../useNotifications';

describe('useNotifications', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  it('tracks ingested messages and read state', () => {
    const client = createCivicClient({
      config: DEFAULT_CONFIG,
      transport: new FakeTransport(),
      storage: new MemoryStorage(),
    });
    const wrapper = ({ children }: { children: ReactNode }) => (
      <CivicClientProvider client={client}>{children}</CivicClientProvider>
    );
    const { result } = renderHook(() => useNotifications(), { wrapper });

    act(() => {
      client.notifications.ingestMessage({ title: 'Issue assigned' });
      client.notifications.ingestMessage({ title: 'Issue verified' });
    });

    expect(result.current.unreadCount).toBe(2);
    expect(result.current.notifications[0]?.title).toBe('Issue verified');

    act(() => {
      result.current.markRead(0);
    });
    expect(result.current.unreadCount).toBe(1);

    act(() => {
      result.current.markAllRead();
    });
    expect(result.current.unreadCount).toBe(0);

    act(() => {
      result.current.clear();
    });
    expect(result.current.notifications).toEqual([]);
  });
});
