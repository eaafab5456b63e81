/**
 * Cooperative cancellation.
 *
 * One token is shared by every suspension point of a run. reset() starts a
 * new generation, so a cancel aimed at a finished run cannot leak into the
 * next one that reuses the token.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from '../errors';

export type CancelListener = () => void;

export class CancellationToken {
  private _generation = 0;
  private cancelled = false;
  private listeners: Set<CancelListener> = new Set();

  get generation(): number {
    return this._generation;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Request cancellation. When `generation` is given, the request only
   * applies if the token has not been reset since it was read.
   */
  cancel(generation?: number): boolean {
    if (generation !== undefined && generation !== this._generation) return false;
    if (this.cancelled) return false;

    this.cancelled = true;
    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) listener();
    return true;
  }

  /** Start a new generation; returns its number */
  reset(): number {
    this._generation++;
    this.cancelled = false;
    this.listeners.clear();
    return this._generation;
  }

  throwIfCancelled(command?: string): void {
    if (this.cancelled) throw new CancelledError('Operation cancelled', command);
  }

  /** Called once on cancel; returns an unsubscribe function */
  onCancel(listener: CancelListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * Sleep for `ms`, waking every `sliceMs` to check the token.
 * Resolves false when cancelled before the time ran out.
 */
export async function sleepWithCancellation(ms: number, token: CancellationToken, sliceMs = 100): Promise<boolean> {
  const deadline = Date.now() + ms;
  let remaining = ms;
  while (remaining > 0) {
    if (token.isCancelled) return false;
    await delay(Math.min(sliceMs, remaining));
    remaining = deadline - Date.now();
  }
  return !token.isCancelled;
}
