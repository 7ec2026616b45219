/**
 * Notification Service
 * Bounded, newest-first buffer of received notifications with unread
 * accounting. Fed by the push channel; has no transport dependency.
 */

import { toJsonObject } from '../lib/json';
import { Store } from '../lib/store';
import type { NotificationRecord, NotificationState, PushMessage } from '../types';

export const DEFAULT_NOTIFICATION_CAPACITY = 50;

export interface NotificationServiceOptions {
  capacity?: number;
  now?: () => Date;
}

function emptyState(): NotificationState {
  return { notifications: [], unreadCount: 0 };
}

export class NotificationService {
  readonly store = new Store<NotificationState>(emptyState());
  private capacity: number;
  private now: () => Date;

  constructor({ capacity = DEFAULT_NOTIFICATION_CAPACITY, now = () => new Date() }: NotificationServiceOptions = {}) {
    this.capacity = capacity;
    this.now = now;
  }

  getState(): NotificationState {
    return this.store.getState();
  }

  subscribe(listener: (state: NotificationState) => void): () => void {
    return this.store.subscribe(listener);
  }

  size(): number {
    return this.store.getState().notifications.length;
  }

  /**
   * Prepend a record, then evict from the tail past capacity
   */
  ingest(record: NotificationRecord): void {
    const { notifications, unreadCount } = this.store.getState();
    let next = [record, ...notifications];
    let unread = unreadCount + (record.read ? 0 : 1);

    while (next.length > this.capacity) {
      const evicted = next[next.length - 1];
      next = next.slice(0, -1);
      if (evicted && !evicted.read) {
        unread -= 1;
      }
    }

    this.store.update({ notifications: next, unreadCount: unread });
  }

  /**
   * Convert a raw push message into an unread record and ingest it
   */
  ingestMessage(message: PushMessage): void {
    console.debug(`[notifications] received: ${message.title ?? '(untitled)'}`);
    this.ingest({
      title: message.title ?? '',
      body: message.body ?? '',
      payload: toJsonObject(message.data),
      receivedAt: this.now(),
      read: false,
    });
  }

  /**
   * Mark one record read. Out-of-range or already-read is a no-op.
   */
  markRead(index: number): void {
    const { notifications, unreadCount } = this.store.getState();
    const target = notifications[index];
    if (!target || target.read) return;

    const next = notifications.map((n, i) => (i === index ? { ...n, read: true } : n));
    this.store.update({ notifications: next, unreadCount: unreadCount - 1 });
  }

  markAllRead(): void {
    const { notifications } = this.store.getState();
    this.store.update({
      notifications: notifications.map((n) => (n.read ? n : { ...n, read: true })),
      unreadCount: 0,
    });
  }

  clear(): void {
    this.store.update(emptyState());
  }
}
