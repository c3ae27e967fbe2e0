import { useEffect, useState } from 'react';
import type { ScanSession, SessionState } from '../scanner/scanSession';

export function useScanSession(session: ScanSession | null): SessionState {
  const [state, setState] = useState<SessionState>(session?.state ?? 'idle');

  useEffect(() => {
    if (!session) {
      setState('idle');
      return;
    }
    let mounted = true;
    const unsubscribe = session.on('state', st => {
      if (mounted) setState(st);
    });
    return () => {
      mounted = false;
      unsubscribe();
    };
  }, [session]);

  return state;
}
