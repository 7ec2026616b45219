import { describe, it, expect, beforeEach } from 'vitest';

import { clearConfigCache, DEFAULT_CONFIG, getCachedConfig, loadConfig, parseConfig } from '../config';

describe('config.ts', () => {
  beforeEach(() => {
    clearConfigCache();
  });

  describe('parseConfig', () => {
    it('uses defaults for an empty environment', () => {
      expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('reads every setting', () => {
      expect(
        parseConfig({
          VITE_API_BASE_URL: 'https://civic.test',
          VITE_REQUEST_TIMEOUT_MS: '5000',
          VITE_NOTIFICATION_CAPACITY: '20',
          VITE_ANALYTICS_WINDOW_DAYS: '7',
        })
      ).toEqual({
        apiBaseUrl: 'https://civic.test',
        requestTimeoutMs: 5000,
        notificationCapacity: 20,
        analyticsWindowDays: 7,
      });
    });

    it('falls back on invalid or non-positive numbers', () => {
      const config = parseConfig({
        VITE_REQUEST_TIMEOUT_MS: 'soon',
        VITE_NOTIFICATION_CAPACITY: '0',
        VITE_ANALYTICS_WINDOW_DAYS: '-3',
      });

      expect(config.requestTimeoutMs).toBe(15000);
      expect(config.notificationCapacity).toBe(50);
      expect(config.analyticsWindowDays).toBe(30);
    });

    it('falls back on a blank base URL', () => {
      expect(parseConfig({ VITE_API_BASE_URL: '   ' }).apiBaseUrl).toBe('http://127.0.0.1:8000');
    });
  });

  describe('loadConfig', () => {
    it('caches the first result', () => {
      expect(getCachedConfig()).toBeNull();

      const first = loadConfig();

      expect(getCachedConfig()).toBe(first);
      expect(loadConfig()).toBe(first);
    });

    it('clearConfigCache drops the cached value', () => {
      loadConfig();
      clearConfigCache();
      expect(getCachedConfig()).toBeNull();
    });
  });
});
