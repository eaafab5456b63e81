/**
 * Flag Store
 *
 * Named boolean flags read by `if`, `stop_if_not` and comparison
 * expressions. The store is handed to the evaluator and the executors
 * explicitly; nothing resolves flags through module state.
 *
 * Emits:
 *   'flag-changed' (name: string, value: boolean | undefined)
 */

import { EventEmitter } from 'events';

/** What the condition evaluator needs from a flag collaborator */
export interface FlagSource {
  /** Unset flags read as false */
  getFlag(name: string): boolean;
}

export class FlagStore extends EventEmitter implements FlagSource {
  private flags: Map<string, boolean> = new Map();

  constructor(initial?: Record<string, boolean>) {
    super();
    if (initial) this.load(initial);
  }

  getFlag(name: string): boolean {
    return this.flags.get(name) ?? false;
  }

  setFlag(name: string, value: boolean): void {
    if (this.flags.get(name) === value) return;
    this.flags.set(name, value);
    this.emit('flag-changed', name, value);
  }

  hasFlag(name: string): boolean {
    return this.flags.has(name);
  }

  clearFlag(name: string): void {
    if (this.flags.delete(name)) {
      this.emit('flag-changed', name, undefined);
    }
  }

  clearAll(): void {
    const names = Array.from(this.flags.keys());
    this.flags.clear();
    for (const name of names) {
      this.emit('flag-changed', name, undefined);
    }
  }

  /** Merge flags from a plain object; non-boolean values are skipped */
  load(values: Record<string, unknown>): number {
    let loaded = 0;
    for (const [name, value] of Object.entries(values)) {
      if (typeof value === 'boolean') {
        this.setFlag(name, value);
        loaded++;
      }
    }
    return loaded;
  }

  snapshot(): Record<string, boolean> {
    return Object.fromEntries(this.flags);
  }

  get size(): number {
    return this.flags.size;
  }
}
