import { createContext, useContext, type ReactNode } from 'react';

import type { CivicClient } from '../services/client';

const CivicClientContext = createContext<CivicClient | undefined>(undefined);

interface CivicClientProviderProps {
  client: CivicClient;
  children: ReactNode;
}

/**
 * Makes one composed client available to the component tree
 */
export function CivicClientProvider({ client, children }: CivicClientProviderProps) {
  return <CivicClientContext.Provider value={client}>{children}</CivicClientContext.Provider>;
}

export function useCivicClient(): CivicClient {
  const context = useContext(CivicClientContext);
  if (context === undefined) {
    throw new Error('useCivicClient must be used within a CivicClientProvider');
  }
  return context;
}
