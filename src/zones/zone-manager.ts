/**
 * Zone Manager
 *
 * Up to four physical sub-targets, addressed by a 4-bit mask where bit i
 * selects zone i+1. A fan-out command runs once per selected zone, in
 * ascending order, each run preceded by the mask command for that zone.
 *
 * An aborted fan-out never leaves a zone 'executing': the zone in flight
 * ends 'error', zones not yet reached keep their state.
 *
 * Emits:
 *   'zone-status' (id: number, status: ZoneStatus, previous: ZoneStatus)
 */

import { EventEmitter } from 'events';
import { CancellationToken } from '../execution/cancellation';
import { getLogger } from '../logger';
import {
  CommandDispatcher,
  DispatchResult,
  FanOutResult,
  ZONE_IDS,
  ZoneSelection,
  ZoneState,
  ZoneStatus,
} from './types';

const log = getLogger('Zones');

/** "multizone 0100" for zone 3 */
export function zoneMaskCommand(id: number): string {
  return `multizone ${(1 << (id - 1)).toString(2).padStart(ZONE_IDS.length, '0')}`;
}

/** Zone ids whose bit is set, ascending */
export function maskToZones(mask: number): number[] {
  return ZONE_IDS.filter(id => (mask & (1 << (id - 1))) !== 0);
}

function isZoneId(id: number): boolean {
  return Number.isInteger(id) && id >= 1 && id <= ZONE_IDS.length;
}

export class ZoneManager extends EventEmitter {
  private selected: number[] = [];
  private states: Map<number, ZoneState> = new Map();

  constructor() {
    super();
    for (const id of ZONE_IDS) {
      this.states.set(id, { id, status: 'inactive', progress: 0 });
    }
  }

  /** Select the active zones; every other zone becomes inactive */
  setZones(ids: readonly number[]): ZoneSelection {
    if (ids.length === 0) {
      return { ok: false, error: 'At least one zone must be selected' };
    }
    const seen = new Set<number>();
    for (const id of ids) {
      if (!isZoneId(id)) {
        return { ok: false, error: `Invalid zone ${id} (zones are 1-${ZONE_IDS.length})` };
      }
      if (seen.has(id)) {
        return { ok: false, error: `Duplicate zone ${id}` };
      }
      seen.add(id);
    }

    this.selected = Array.from(seen).sort((a, b) => a - b);
    this.resetZones();
    log.info(`Active zones: ${this.selected.join(', ')} (mask ${this.zoneMask().toString(2).padStart(4, '0')})`);
    return { ok: true };
  }

  /** Selected zones back to 'active', the rest to 'inactive' */
  resetZones(): void {
    for (const id of ZONE_IDS) {
      this.setZoneStatus(id, this.selected.includes(id) ? 'active' : 'inactive');
    }
  }

  activeZones(): number[] {
    return [...this.selected];
  }

  zoneMask(): number {
    return this.selected.reduce((mask, id) => mask | (1 << (id - 1)), 0);
  }

  zoneMaskCommand(id: number): string {
    return zoneMaskCommand(id);
  }

  getZoneStatus(id: number): ZoneStatus | undefined {
    return this.states.get(id)?.status;
  }

  getZoneStatuses(): ZoneState[] {
    return Array.from(this.states.values(), state => ({ ...state }));
  }

  setZoneStatus(id: number, status: ZoneStatus, error?: string): void {
    const state = this.states.get(id);
    if (!state) return;
    const previous = state.status;
    state.status = status;
    if (status === 'completed') {
      state.progress = 1;
    } else if (status !== 'error') {
      state.progress = 0;
    }
    if (status === 'error') {
      state.error = error;
    } else {
      delete state.error;
    }
    if (previous !== status) {
      this.emit('zone-status', id, status, previous);
    }
  }

  /**
   * Run `base` once per selected zone. Stops at the first failure; the
   * failing zone ends 'error' and later zones are not attempted.
   */
  async fanOut(base: string, dispatch: CommandDispatcher, token?: CancellationToken): Promise<FanOutResult> {
    if (this.selected.length === 0) {
      return this.result(false, `No active zones for "${base}"`, { errorKind: 'structural' });
    }

    for (const id of this.selected) {
      if (token?.isCancelled) {
        this.setZoneStatus(id, 'error', 'cancelled');
        return this.result(false, 'Operation cancelled', { failedZone: id, errorKind: 'cancelled' });
      }

      this.setZoneStatus(id, 'executing');
      log.debug(`Zone ${id}: ${base}`);

      const steps = [zoneMaskCommand(id), base];
      for (let i = 0; i < steps.length; i++) {
        const outcome = await dispatch(steps[i]);
        const failure = this.checkStep(id, steps[i], outcome, token);
        if (failure) return failure;
        this.setZoneProgress(id, (i + 1) / steps.length);
      }

      this.setZoneStatus(id, 'completed');
    }

    return this.result(true, `"${base}" completed in zones ${this.selected.join(', ')}`);
  }

  private setZoneProgress(id: number, progress: number): void {
    const state = this.states.get(id);
    if (state) state.progress = progress;
  }

  private checkStep(
    id: number,
    command: string,
    outcome: DispatchResult,
    token?: CancellationToken,
  ): FanOutResult | null {
    if (!outcome.success) {
      const cancelled = outcome.errorKind === 'cancelled';
      this.setZoneStatus(id, 'error', cancelled ? 'cancelled' : outcome.message);
      log.error(`Zone ${id} failed on "${command}": ${outcome.message}`);
      return this.result(false, `Zone ${id}: ${outcome.message}`, {
        failedZone: id,
        failedCommand: command,
        response: outcome.response,
        errorKind: outcome.errorKind,
      });
    }
    if (token?.isCancelled) {
      this.setZoneStatus(id, 'error', 'cancelled');
      return this.result(false, 'Operation cancelled', { failedZone: id, failedCommand: command, errorKind: 'cancelled' });
    }
    return null;
  }

  private result(success: boolean, message: string, extra: Partial<FanOutResult> = {}): FanOutResult {
    return { ...extra, success, message, zones: this.getZoneStatuses() };
  }
}
