/**
 * Push delivery binding
 * The native push SDK stays outside this library. It provides a device token
 * and a message channel; this module binds the token to the signed-in account
 * and routes messages into the notification buffer.
 */

import type { PushMessage } from '../types';

import type { CivicApiService } from './civicApi';
import type { NotificationService } from './notificationService';

export interface PushDelivery {
  /** Bind this device to the account owning authToken */
  register(authToken: string): Promise<void>;
  unregister(): Promise<void>;
}

export interface DeviceTokenSource {
  getToken(): Promise<string | null>;
}

export interface PushChannel {
  onMessage(handler: (message: PushMessage) => void): () => void;
}

export class DevicePushBinding implements PushDelivery {
  private boundDeviceToken: string | null = null;

  constructor(
    private api: CivicApiService,
    private source: DeviceTokenSource
  ) {}

  get isBound(): boolean {
    return this.boundDeviceToken !== null;
  }

  async register(authToken: string): Promise<void> {
    const deviceToken = await this.source.getToken();
    if (!deviceToken) {
      console.warn('[push] No device token available, skipping registration');
      return;
    }
    await this.api.registerDeviceToken(authToken, deviceToken);
    this.boundDeviceToken = deviceToken;
    console.debug('[push] Device token sent to backend');
  }

  async unregister(): Promise<void> {
    // The backend drops stale device tokens itself when delivery fails
    this.boundDeviceToken = null;
    console.debug('[push] Device binding released');
  }
}

/**
 * Used when the host has no push support
 */
export const noopPushDelivery: PushDelivery = {
  register: async () => {},
  unregister: async () => {},
};

/**
 * Route every message from the channel into the buffer. Returns the disconnect handle.
 */
export function connectPushChannel(channel: PushChannel, buffer: NotificationService): () => void {
  return channel.onMessage((message) => buffer.ingestMessage(message));
}
