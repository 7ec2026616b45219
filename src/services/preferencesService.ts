/**
 * Preferences Service
 * Display language for user-facing text, persisted between launches.
 */

import { type SecureStorage, STORAGE_KEYS } from '../lib/auth-token';
import { Store } from '../lib/store';

export type Language = 'en' | 'hi';

export interface PreferencesState {
  language: Language;
}

export function isLanguage(value: string | null): value is Language {
  return value === 'en' || value === 'hi';
}

export class PreferencesService {
  readonly store = new Store<PreferencesState>({ language: 'en' });

  constructor(private storage: SecureStorage) {}

  getState(): PreferencesState {
    return this.store.getState();
  }

  subscribe(listener: (state: PreferencesState) => void): () => void {
    return this.store.subscribe(listener);
  }

  get language(): Language {
    return this.store.getState().language;
  }

  /**
   * Load the saved language. Unknown stored values are ignored.
   */
  async restore(): Promise<void> {
    try {
      const saved = await this.storage.read(STORAGE_KEYS.LANGUAGE);
      if (isLanguage(saved) && saved !== this.language) {
        this.store.update({ language: saved });
      }
    } catch (error) {
      console.error('[preferences] Failed to read saved language:', error);
    }
  }

  async setLanguage(language: Language): Promise<void> {
    if (language === this.language) return;

    this.store.setState({ language });
    try {
      await this.storage.write(STORAGE_KEYS.LANGUAGE, language);
    } catch (error) {
      console.error('[preferences] Failed to save language:', error);
    }
    this.store.notify();
  }

  getText(english: string, hindi: string): string {
    return this.language === 'hi' ? hindi : english;
  }
}
