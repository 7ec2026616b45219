/**
 * Notification Types
 */

import type { JsonObject } from '../lib/json';

export interface NotificationRecord {
  readonly title: string;
  readonly body: string;
  readonly payload: JsonObject;
  readonly receivedAt: Date;
  readonly read: boolean;
}

/** Raw message as handed over by the push channel */
export interface PushMessage {
  title?: string;
  body?: string;
  data?: Record<string, unknown>;
}

export interface NotificationState {
  notifications: readonly NotificationRecord[];
  unreadCount: number;
}
