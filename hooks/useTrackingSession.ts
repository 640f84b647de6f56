// Arquivo: hooks/useTrackingSession.ts

import { useCallback, useSyncExternalStore } from 'react';
import { TrackingSession } from '../core/session';
import { SessionSnapshot } from '../types';

/**
 * Snapshot da sessão para componentes React. Re-renderiza a cada notificação da sessão.
 */
export const useTrackingSession = (session: TrackingSession): SessionSnapshot => {
  const subscribe = useCallback((onChange: () => void) => session.subscribe(() => onChange()), [session]);
  const getSnapshot = useCallback(() => session.getSnapshot(), [session]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
};
