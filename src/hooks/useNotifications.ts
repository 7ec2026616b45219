/**
 * useNotifications Hook
 * Buffered notifications with unread count and read-state operations
 */

import { useCivicClient } from '../contexts/CivicClientContext';
import type { NotificationState } from '../types';

import { useStore } from './useStore';

interface UseNotificationsResult extends NotificationState {
  markRead: (index: number) => void;
  markAllRead: () => void;
  clear: () => void;
}

export function useNotifications(): UseNotificationsResult {
  const { notifications } = useCivicClient();
  const state = useStore(notifications.store);

  return {
    ...state,
    markRead: (index) => notifications.markRead(index),
    markAllRead: () => notifications.markAllRead(),
    clear: () => notifications.clear(),
  };
}
