/**
 * Session token persistence
 *
 * The storage collaborator is async so it can sit in front of an encrypted
 * keystore on device. Browser builds use Web Storage; tests use memory.
 */

export const STORAGE_KEYS = {
  ACCESS_TOKEN: 'access_token',
  LANGUAGE: 'language',
} as const;

export interface SecureStorage {
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemoryStorage implements SecureStorage {
  private values = new Map<string, string>();

  async read(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}

export class WebStorage implements SecureStorage {
  constructor(private storage: Storage) {}

  async read(key: string): Promise<string | null> {
    return this.storage.getItem(key);
  }

  async write(key: string, value: string): Promise<void> {
    this.storage.setItem(key, value);
  }

  async delete(key: string): Promise<void> {
    this.storage.removeItem(key);
  }
}

/**
 * Web Storage when the host provides it, memory otherwise
 */
export function createDefaultStorage(): SecureStorage {
  if (typeof globalThis.localStorage !== 'undefined') {
    return new WebStorage(globalThis.localStorage);
  }
  return new MemoryStorage();
}

export function storeSessionToken(storage: SecureStorage, token: string): Promise<void> {
  return storage.write(STORAGE_KEYS.ACCESS_TOKEN, token);
}

export function getSessionToken(storage: SecureStorage): Promise<string | null> {
  return storage.read(STORAGE_KEYS.ACCESS_TOKEN);
}

export function clearSessionToken(storage: SecureStorage): Promise<void> {
  return storage.delete(STORAGE_KEYS.ACCESS_TOKEN);
}
