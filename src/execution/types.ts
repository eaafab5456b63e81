/**
 * Execution Types
 */

import type { EngineErrorKind } from '../errors';
import type { CommandKind } from '../sequences/types';

export type RunStatus = 'idle' | 'running' | 'paused' | 'completed' | 'failed' | 'cancelled';

export type TerminalStatus = 'completed' | 'failed' | 'cancelled';

/** One entry of the per-run result log */
export interface CommandResult {
  /** 0-based position in the executed list */
  index: number;
  command: string;
  kind: CommandKind;
  success: boolean;
  /** Not dispatched because it sits in a false conditional branch */
  skipped: boolean;
  message: string;
  /** Raw device line that acknowledged or rejected the command */
  response?: string;
  /** A critical failure stops the run regardless of policy */
  critical: boolean;
  errorKind?: EngineErrorKind;
  durationMs: number;
}

export interface RunOutcome {
  status: TerminalStatus;
  success: boolean;
  message: string;
  failedCommand?: string;
  response?: string;
  errorKind?: EngineErrorKind;
  results: CommandResult[];
}

export interface RunProgress {
  current: number;
  total: number;
  status: RunStatus;
}

export interface RunOptions {
  /** Cancel the run and report a timeout once this much time has passed */
  timeoutMs?: number;
  /** Record non-critical failures and carry on (worker only) */
  continueOnError?: boolean;
}
