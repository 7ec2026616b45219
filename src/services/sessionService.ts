/**
 * Session Service
 * Owns the authentication token and the signed-in user. The only writer of
 * session state; every other service reads a snapshot at call time.
 *
 * Transitions: Unauthenticated -> (login | register | restore) -> Authenticated
 *              Authenticated -> (logout | refresh failure | expire) -> Unauthenticated
 */

import { clearSessionToken, getSessionToken, type SecureStorage, storeSessionToken } from '../lib/auth-token';
import {
  authenticationRequired,
  type ClassifiedError,
  classifyError,
  type ClassifyOptions,
} from '../lib/errors';
import { Store } from '../lib/store';
import type { RegistrationProfile, User } from '../types';

import type { CivicApiService } from './civicApi';
import type { PushDelivery } from './pushService';

/** Which step failed; 'login-after-register' means the account exists but sign-in did not complete */
export type SessionStage = 'restore' | 'login' | 'register' | 'login-after-register' | 'expired';

export type SignOutReason = 'logout' | 'expired';

export class SessionError extends Error {
  readonly stage: SessionStage;
  readonly classified: ClassifiedError;
  /** Email to prefill a manual login retry with */
  readonly email: string | null;

  constructor(stage: SessionStage, classified: ClassifiedError, options: { message?: string; email?: string } = {}) {
    super(options.message ?? classified.message);
    this.name = 'SessionError';
    this.stage = stage;
    this.classified = classified;
    this.email = options.email ?? null;
  }

  get category(): ClassifiedError['category'] {
    return this.classified.category;
  }
}

export interface SessionState {
  token: string | null;
  user: User | null;
  /** Set during restore, login and register only */
  loading: boolean;
  error: SessionError | null;
  /** Incremented on every sign-in and sign-out */
  epoch: number;
}

export interface SessionSnapshot {
  token: string | null;
  epoch: number;
}

const LOGIN_MESSAGES: ClassifyOptions = {
  messages: {
    AuthenticationRequired: 'Incorrect email or password, or the account is inactive.',
    Unknown: 'Unable to sign in. Please try again.',
  },
};

const REGISTER_MESSAGES: ClassifyOptions = {
  messages: {
    DuplicateSubmission: 'An account with this email already exists.',
    Unknown: 'Registration failed. Please check your details and try again.',
  },
};

const LOGIN_AFTER_REGISTER_MESSAGE = 'Your account was created, but signing in failed. Please sign in manually.';

export function isAuthenticated(state: SessionState): boolean {
  return state.token !== null && state.user !== null;
}

export class SessionService {
  readonly store = new Store<SessionState>({
    token: null,
    user: null,
    loading: false,
    error: null,
    epoch: 0,
  });
  private signOutListeners = new Set<(reason: SignOutReason) => void>();

  constructor(
    private api: CivicApiService,
    private storage: SecureStorage,
    private push: PushDelivery
  ) {}

  getState(): SessionState {
    return this.store.getState();
  }

  subscribe(listener: (state: SessionState) => void): () => void {
    return this.store.subscribe(listener);
  }

  get isAuthenticated(): boolean {
    return isAuthenticated(this.store.getState());
  }

  /**
   * Token and epoch to capture when dispatching an authenticated call
   */
  snapshot(): SessionSnapshot {
    const { token, epoch } = this.store.getState();
    return { token, epoch };
  }

  /**
   * False once a sign-in or sign-out has happened since the epoch was captured
   */
  isCurrent(epoch: number): boolean {
    return this.store.getState().epoch === epoch;
  }

  /**
   * Register a synchronous hook run by every sign-out, before subscribers are notified
   */
  onSignOut(listener: (reason: SignOutReason) => void): () => void {
    this.signOutListeners.add(listener);
    return () => {
      this.signOutListeners.delete(listener);
    };
  }

  /**
   * Re-establish a session from the persisted token, validating it against the profile endpoint
   */
  async restore(): Promise<boolean> {
    const { epoch } = this.snapshot();
    this.store.update((s) => ({ ...s, loading: true, error: null }));

    try {
      const token = await getSessionToken(this.storage);
      if (!token) {
        this.store.update((s) => ({ ...s, loading: false }));
        return false;
      }

      const user = await this.api.getProfile(token);
      if (!this.isCurrent(epoch)) {
        console.warn('[session] Discarding restore result: session changed meanwhile');
        return false;
      }
      this.signIn(token, user);
      return true;
    } catch (error) {
      if (!this.isCurrent(epoch)) {
        console.warn('[session] Ignoring restore failure: session changed meanwhile');
        return false;
      }
      console.error('[session] Restore failed, discarding stored token:', error);
      await this.discardPersistedToken();
      if (this.isCurrent(epoch)) {
        this.store.update((s) => ({
          ...s,
          token: null,
          user: null,
          loading: false,
          error: new SessionError('restore', classifyError(error)),
        }));
      }
      return false;
    }
  }

  async login(email: string, password: string): Promise<boolean> {
    const { epoch } = this.snapshot();
    this.store.update((s) => ({ ...s, loading: true, error: null }));

    try {
      const { token, user } = await this.api.login(email, password);
      if (!this.isCurrent(epoch)) {
        console.warn('[session] Discarding login result: session changed meanwhile');
        return false;
      }
      await storeSessionToken(this.storage, token);
      if (!this.isCurrent(epoch)) {
        console.warn('[session] Session changed while saving the token; dropping it');
        await this.discardStoredToken(token);
        return false;
      }
      this.signIn(token, user);
      return true;
    } catch (error) {
      console.error('[session] Login failed:', error);
      this.fail(new SessionError('login', classifyError(error, LOGIN_MESSAGES)));
      return false;
    }
  }

  /**
   * Create the account, then sign in with the same credentials.
   * A failure in the second step is reported with stage 'login-after-register'.
   */
  async register(profile: RegistrationProfile): Promise<boolean> {
    const { epoch } = this.snapshot();
    this.store.update((s) => ({ ...s, loading: true, error: null }));

    try {
      await this.api.register(profile);
    } catch (error) {
      console.error('[session] Registration failed:', error);
      this.fail(new SessionError('register', classifyError(error, REGISTER_MESSAGES), { email: profile.email }));
      return false;
    }

    try {
      const { token, user } = await this.api.login(profile.email, profile.password);
      if (!this.isCurrent(epoch)) {
        console.warn('[session] Discarding post-registration login: session changed meanwhile');
        return false;
      }
      await storeSessionToken(this.storage, token);
      if (!this.isCurrent(epoch)) {
        console.warn('[session] Session changed while saving the token; dropping it');
        await this.discardStoredToken(token);
        return false;
      }
      this.signIn(token, user);
      return true;
    } catch (error) {
      console.error('[session] Login after registration failed:', error);
      this.fail(
        new SessionError('login-after-register', classifyError(error, LOGIN_MESSAGES), {
          message: LOGIN_AFTER_REGISTER_MESSAGE,
          email: profile.email,
        })
      );
      return false;
    }
  }

  async logout(): Promise<void> {
    await this.signOut('logout');
  }

  /**
   * Re-fetch the profile with the current token. Any failure signs the session out.
   */
  async refresh(): Promise<void> {
    const { token, epoch } = this.snapshot();
    if (!token) return;

    try {
      const user = await this.api.getProfile(token);
      if (!this.isCurrent(epoch)) return;
      this.store.update((s) => ({ ...s, user }));
    } catch (error) {
      console.error('[session] Profile refresh failed, signing out:', error);
      if (!this.isCurrent(epoch)) return;
      await this.signOut('expired');
    }
  }

  /**
   * Forced sign-out after an authenticated call was rejected. No-op without a session.
   */
  async expire(): Promise<void> {
    if (this.store.getState().token === null) return;
    await this.signOut('expired');
  }

  private signIn(token: string, user: User): void {
    const replaced = this.store.getState().token !== null;
    this.store.setState((s) => ({
      token,
      user,
      loading: false,
      error: null,
      epoch: s.epoch + 1,
    }));
    if (replaced) {
      this.runSignOutHooks('logout');
    }
    this.store.notify();
    void this.bindPush(token);
  }

  /**
   * Record a failed sign-in. An existing session is ended as by logout.
   */
  private fail(error: SessionError): void {
    const hadSession = this.store.getState().token !== null;
    this.store.setState((s) => ({
      token: null,
      user: null,
      loading: false,
      error,
      epoch: hadSession ? s.epoch + 1 : s.epoch,
    }));
    if (hadSession) {
      this.runSignOutHooks('logout');
    }
    this.store.notify();
    if (hadSession) {
      void this.releaseSession();
    }
  }

  private async signOut(reason: SignOutReason): Promise<void> {
    this.store.setState((s) => ({
      token: null,
      user: null,
      loading: false,
      error: reason === 'expired' ? new SessionError('expired', authenticationRequired('Session expired')) : null,
      epoch: s.epoch + 1,
    }));

    this.runSignOutHooks(reason);
    // Subscribers may be tearing down in the current call stack
    this.store.notifyDeferred();

    await this.releaseSession();
  }

  private runSignOutHooks(reason: SignOutReason): void {
    for (const listener of Array.from(this.signOutListeners)) {
      listener(reason);
    }
  }

  private async releaseSession(): Promise<void> {
    await this.discardPersistedToken();
    await this.unbindPush();
  }

  /**
   * Delete the persisted token only if it is still the given one
   */
  private async discardStoredToken(token: string): Promise<void> {
    try {
      if ((await getSessionToken(this.storage)) !== token) return;
    } catch (error) {
      console.error('[session] Failed to read stored token:', error);
      return;
    }
    await this.discardPersistedToken();
  }

  private async discardPersistedToken(): Promise<void> {
    try {
      await clearSessionToken(this.storage);
    } catch (error) {
      console.error('[session] Failed to delete stored token:', error);
    }
  }

  private async bindPush(token: string): Promise<void> {
    try {
      await this.push.register(token);
    } catch (error) {
      console.error('[session] Failed to register push delivery:', error);
    }
  }

  private async unbindPush(): Promise<void> {
    try {
      await this.push.unregister();
    } catch (error) {
      console.error('[session] Failed to release push delivery:', error);
    }
  }
}
