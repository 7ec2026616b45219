/**
 * Observable Store
 * Minimal typed publish/subscribe container that every service builds on.
 *
 * Each service owns its own stores; there is no shared broadcast channel.
 */

export type Listener<T> = (state: T) => void;

export type StateUpdater<T> = T | ((prev: T) => T);

function isUpdater<T>(next: StateUpdater<T>): next is (prev: T) => T {
  return typeof next === 'function';
}

export class Store<T> {
  private state: T;
  private listeners = new Set<Listener<T>>();
  private deferredPending = false;

  constructor(initialState: T) {
    this.state = initialState;
  }

  getState(): T {
    return this.state;
  }

  /**
   * Replace the held value. Does not publish; call notify() (or use update())
   * once the change is complete.
   */
  setState(next: StateUpdater<T>): void {
    this.state = isUpdater(next) ? next(this.state) : next;
  }

  /**
   * Set the value and publish synchronously
   */
  update(next: StateUpdater<T>): void {
    this.setState(next);
    this.notify();
  }

  /**
   * Register a listener. Registering the same function twice is a no-op.
   */
  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Invoke every listener registered at call time, in registration order.
   * Listeners removed mid-round still receive this round.
   */
  notify(): void {
    const snapshot = Array.from(this.listeners);
    const state = this.state;
    for (const listener of snapshot) {
      listener(state);
    }
  }

  /**
   * Publish once after the current synchronous call stack unwinds.
   * Several calls before the microtask runs collapse into one publish.
   */
  notifyDeferred(): void {
    if (this.deferredPending) return;
    this.deferredPending = true;
    queueMicrotask(() => {
      this.deferredPending = false;
      this.notify();
    });
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
