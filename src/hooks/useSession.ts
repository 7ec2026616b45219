/**
 * useSession Hook
 * Current session state plus the sign-in and sign-out operations
 */

import { useCivicClient } from '../contexts/CivicClientContext';
import type { SessionState } from '../services/sessionService';
import type { RegistrationProfile } from '../types';

import { useStore } from './useStore';

interface UseSessionResult extends SessionState {
  isAuthenticated: boolean;
  login: (email: string, password: string) => Promise<boolean>;
  register: (profile: RegistrationProfile) => Promise<boolean>;
  logout: () => Promise<void>;
  refresh: () => Promise<void>;
}

export function useSession(): UseSessionResult {
  const { session } = useCivicClient();
  const state = useStore(session.store);

  return {
    ...state,
    isAuthenticated: state.token !== null && state.user !== null,
    login: (email, password) => session.login(email, password),
    register: (profile) => session.register(profile),
    logout: () => session.logout(),
    refresh: () => session.refresh(),
  };
}
