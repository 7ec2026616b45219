import { useSyncExternalStore } from 'react';

import type { Store } from '../lib/store';

/**
 * Subscribe a component to a store; re-renders on every publish
 */
export function useStore<T>(store: Store<T>): T {
  return useSyncExternalStore(
    (onChange) => store.subscribe(onChange),
    () => store.getState()
  );
}
