/**
 * Resource containers
 * A ResourceService holds one remote resource fetched with the session token;
 * an ActionService holds the outcome of one write and refreshes the read
 * container it affects.
 */

import {
  authenticationRequired,
  type ClassifiedError,
  classifyError,
  type ClassifyOptions,
} from '../lib/errors';
import { Store } from '../lib/store';

import type { SessionService, SignOutReason } from './sessionService';

export interface ResourceState<T> {
  data: T;
  loading: boolean;
  error: ClassifiedError | null;
}

export type Fetcher<T, P> = (token: string, params: P) => Promise<T>;

export interface ResourceOptions {
  /** Log prefix */
  name: string;
  messages?: ClassifyOptions['messages'];
}

function initialState<T>(data: T, error: ClassifiedError | null = null): ResourceState<T> {
  return { data, loading: false, error };
}

/**
 * Shared request cycle: fail fast without a token, then loading, then data or error.
 * Results from a superseded generation or an earlier session epoch are dropped.
 */
abstract class SessionBoundContainer<T> {
  readonly store: Store<ResourceState<T>>;
  private generation = 0;

  protected constructor(
    protected session: SessionService,
    private emptyData: T,
    protected options: ResourceOptions
  ) {
    this.store = new Store(initialState(emptyData));
    session.onSignOut((reason) => this.handleSignOut(reason));
  }

  getState(): ResourceState<T> {
    return this.store.getState();
  }

  subscribe(listener: (state: ResourceState<T>) => void): () => void {
    return this.store.subscribe(listener);
  }

  /**
   * Back to the empty state. In-flight results are discarded.
   */
  reset(error: ClassifiedError | null = null): void {
    this.generation += 1;
    this.store.update(initialState(this.emptyData, error));
  }

  clearError(): void {
    if (this.store.getState().error === null) return;
    this.store.update((s) => ({ ...s, error: null }));
  }

  /**
   * Run one request cycle. Resolves to the fetched value, or null when the
   * request failed or its result was discarded.
   */
  protected async cycle<R>(
    run: (token: string) => Promise<R>,
    commit: (result: R) => T,
    keepLoading: boolean
  ): Promise<{ value: R; generation: number } | null> {
    const generation = ++this.generation;
    const { token, epoch } = this.session.snapshot();

    if (!token) {
      this.store.update((s) => ({ ...s, loading: false, error: authenticationRequired() }));
      return null;
    }

    this.store.update((s) => ({ ...s, loading: true, error: null }));

    try {
      const value = await run(token);
      if (!this.isCurrent(generation, epoch)) {
        console.warn(`[${this.options.name}] Discarding stale result`);
        this.finish(generation);
        return null;
      }
      this.store.update((s) => ({ ...s, data: commit(value), loading: keepLoading }));
      return { value, generation };
    } catch (err) {
      if (!this.isCurrent(generation, epoch)) {
        console.warn(`[${this.options.name}] Discarding stale failure:`, err);
        this.finish(generation);
        return null;
      }
      const error = classifyError(err, { messages: this.options.messages });
      console.error(`[${this.options.name}] Request failed:`, error.detail);
      this.store.update((s) => ({ ...s, loading: false, error }));
      if (error.category === 'AuthenticationRequired') {
        void this.session.expire();
      }
      return null;
    }
  }

  /**
   * Clear loading, unless a newer request or a reset has taken over
   */
  protected finish(generation: number): void {
    if (generation !== this.generation || !this.store.getState().loading) return;
    this.store.update((s) => ({ ...s, loading: false }));
  }

  protected isCurrent(generation: number, epoch: number): boolean {
    return generation === this.generation && this.session.isCurrent(epoch);
  }

  private handleSignOut(reason: SignOutReason): void {
    this.reset(reason === 'expired' ? authenticationRequired('Session expired') : null);
  }
}

export class ResourceService<T, P = void> extends SessionBoundContainer<T> {
  constructor(
    session: SessionService,
    private fetcher: Fetcher<T, P>,
    emptyData: T,
    options: ResourceOptions
  ) {
    super(session, emptyData, options);
  }

  /**
   * Fetch and replace the held value. Never rejects; failures land in `error`.
   */
  async load(params: P): Promise<void> {
    await this.cycle(
      (token) => this.fetcher(token, params),
      (data) => data,
      false
    );
  }
}

export interface ActionOptions<P, R> extends ResourceOptions {
  /** Awaited after a successful write, before loading clears */
  onSuccess?: (result: R, params: P) => Promise<void>;
}

export class ActionService<P, R> extends SessionBoundContainer<R | null> {
  constructor(
    session: SessionService,
    private action: Fetcher<R, P>,
    private actionOptions: ActionOptions<P, R>
  ) {
    super(session, null, actionOptions);
  }

  /**
   * Perform the write. Resolves to the result, or null on failure.
   */
  async run(params: P): Promise<R | null> {
    const { onSuccess } = this.actionOptions;
    const outcome = await this.cycle(
      (token) => this.action(token, params),
      (result) => result,
      onSuccess !== undefined
    );
    if (!outcome) return null;

    if (onSuccess) {
      await onSuccess(outcome.value, params);
      this.finish(outcome.generation);
    }
    return outcome.value;
  }
}
