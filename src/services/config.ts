/**
 * Application configuration, read from Vite environment variables at startup.
 * Results are cached in memory after the first read.
 */
export interface AppConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  /** Maximum notifications kept in the in-app buffer */
  notificationCapacity: number;
  /** Default analytics window, ending today */
  analyticsWindowDays: number;
}

export type ConfigEnv = Partial<Record<
  'VITE_API_BASE_URL' | 'VITE_REQUEST_TIMEOUT_MS' | 'VITE_NOTIFICATION_CAPACITY' | 'VITE_ANALYTICS_WINDOW_DAYS',
  string
>>;

export const DEFAULT_CONFIG: AppConfig = {
  apiBaseUrl: 'http://127.0.0.1:8000',
  requestTimeoutMs: 15000,
  notificationCapacity: 50,
  analyticsWindowDays: 30,
};

let cachedConfig: AppConfig | null = null;

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Build config from an environment map. Invalid numbers fall back to defaults.
 */
export function parseConfig(env: ConfigEnv): AppConfig {
  const baseUrl = env.VITE_API_BASE_URL?.trim();
  return {
    apiBaseUrl: baseUrl ? baseUrl : DEFAULT_CONFIG.apiBaseUrl,
    requestTimeoutMs: positiveInt(env.VITE_REQUEST_TIMEOUT_MS, DEFAULT_CONFIG.requestTimeoutMs),
    notificationCapacity: positiveInt(env.VITE_NOTIFICATION_CAPACITY, DEFAULT_CONFIG.notificationCapacity),
    analyticsWindowDays: positiveInt(env.VITE_ANALYTICS_WINDOW_DAYS, DEFAULT_CONFIG.analyticsWindowDays),
  };
}

/**
 * Load configuration from import.meta.env, cached after the first call
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = parseConfig(import.meta.env);
  return cachedConfig;
}

/**
 * Get cached config synchronously
 * Returns null if config hasn't been loaded yet
 */
export function getCachedConfig(): AppConfig | null {
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
