/**
 * Civic client composition
 * Wires the transport, storage and push collaborators into one set of services
 * that share a single session.
 */

import { FetchTransport, type Transport } from '../lib/api';
import { createDefaultStorage, type SecureStorage } from '../lib/auth-token';

import { AnalyticsService } from './analyticsService';
import { CivicApiService } from './civicApi';
import { type AppConfig, loadConfig } from './config';
import { IssueService } from './issueService';
import { NotificationService } from './notificationService';
import { PreferencesService } from './preferencesService';
import { DevicePushBinding, type DeviceTokenSource, noopPushDelivery, type PushDelivery } from './pushService';
import { SessionService } from './sessionService';

export interface CivicClientOptions {
  config?: AppConfig;
  transport?: Transport;
  storage?: SecureStorage;
  /** Explicit push delivery; takes precedence over deviceTokens */
  push?: PushDelivery;
  deviceTokens?: DeviceTokenSource;
  now?: () => Date;
}

export interface CivicClient {
  config: AppConfig;
  api: CivicApiService;
  session: SessionService;
  issues: IssueService;
  analytics: AnalyticsService;
  notifications: NotificationService;
  preferences: PreferencesService;
  /** Restore the saved session and language */
  start(): Promise<void>;
}

export function createCivicClient(options: CivicClientOptions = {}): CivicClient {
  const config = options.config ?? loadConfig();
  const transport =
    options.transport ?? new FetchTransport({ baseUrl: config.apiBaseUrl, timeoutMs: config.requestTimeoutMs });
  const storage = options.storage ?? createDefaultStorage();
  const api = new CivicApiService(transport);

  let push: PushDelivery = noopPushDelivery;
  if (options.push) {
    push = options.push;
  } else if (options.deviceTokens) {
    push = new DevicePushBinding(api, options.deviceTokens);
  }

  const session = new SessionService(api, storage, push);
  const preferences = new PreferencesService(storage);

  return {
    config,
    api,
    session,
    issues: new IssueService(api, session),
    analytics: new AnalyticsService(api, session, { windowDays: config.analyticsWindowDays, now: options.now }),
    notifications: new NotificationService({ capacity: config.notificationCapacity, now: options.now }),
    preferences,
    async start() {
      await Promise.all([session.restore(), preferences.restore()]);
    },
  };
}
