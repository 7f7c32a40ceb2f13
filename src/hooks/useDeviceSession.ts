/**
 * Device Session Hook
 *
 * Tracks a DeviceSession's connection status for a connection panel and
 * exposes connect/disconnect actions.
 */

import { useCallback, useEffect, useState } from 'react';
import type { DeviceSession } from '../services/DeviceSession';

export interface UseDeviceSessionReturn {
  isConnected: boolean;
  /** Port name while connected */
  address: string | null;
  /** Latest status message (port name, "Disconnected from ...", failure reason) */
  statusMessage: string | null;
  /** Latest reported error, cleared on a successful connect */
  lastError: string | null;
  connect: (address?: string) => Promise<boolean>;
  disconnect: () => Promise<void>;
}

interface SessionState {
  isConnected: boolean;
  address: string | null;
  statusMessage: string | null;
  lastError: string | null;
}

export function useDeviceSession(session: DeviceSession): UseDeviceSessionReturn {
  const [state, setState] = useState<SessionState>(() => ({
    isConnected: session.isConnected(),
    address: session.connectedAddress,
    statusMessage: null,
    lastError: null,
  }));

  useEffect(() => {
    setState(prev => ({ ...prev, isConnected: session.isConnected(), address: session.connectedAddress }));
    return session.subscribe(event => {
      if (event.type === 'connectionChanged') {
        setState(prev => ({
          isConnected: event.connected,
          address: session.connectedAddress,
          statusMessage: event.message,
          lastError: event.connected ? null : prev.lastError,
        }));
      } else {
        setState(prev => ({ ...prev, lastError: event.message }));
      }
    });
  }, [session]);

  const connect = useCallback((address?: string) => session.connect(address), [session]);
  const disconnect = useCallback(() => session.disconnect(), [session]);

  return { ...state, connect, disconnect };
}
