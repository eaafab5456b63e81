/**
 * Zone Types
 */

import type { EngineErrorKind } from '../errors';

export const ZONE_IDS = [1, 2, 3, 4] as const;

export type ZoneStatus = 'inactive' | 'active' | 'executing' | 'completed' | 'error';

export interface ZoneState {
  id: number;
  status: ZoneStatus;
  /** Share of the zone's fan-out steps acknowledged, 0..1 */
  progress: number;
  /** Why the zone ended in 'error' */
  error?: string;
}

export type ZoneSelection = { ok: true } | { ok: false; error: string };

/** Outcome of sending one command and waiting for its acknowledgement */
export interface DispatchResult {
  success: boolean;
  message: string;
  response?: string;
  errorKind?: EngineErrorKind;
}

export type CommandDispatcher = (command: string) => Promise<DispatchResult>;

export interface FanOutResult {
  success: boolean;
  message: string;
  zones: ZoneState[];
  failedZone?: number;
  failedCommand?: string;
  response?: string;
  errorKind?: EngineErrorKind;
}
