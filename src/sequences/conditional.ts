/**
 * Conditional State Machine
 *
 * Tracks nested if / else / endif blocks while a command stream runs.
 * Each frame remembers whether its parent was already suppressed, so an
 * inner `else` can never lift the suppression of an outer false branch.
 *
 * An `if` reached inside a suppressed branch is handled per policy:
 *   'skip'      the expression is not evaluated at all
 *   'evaluate'  the expression is evaluated and reported, the result ignored
 *
 * Emits:
 *   'entered'   (condition: string, value: boolean, evaluated: boolean)
 *   'evaluated' (condition: string, value: boolean)
 *   'exited'    (depth: number)
 */

import { EventEmitter } from 'events';
import { NestedIfPolicy } from '../config-schema';
import { StructuralError } from '../errors';
import { FlagSource } from '../flags/flag-store';
import { getLogger } from '../logger';
import { evaluateCondition } from './expression';

const log = getLogger('Conditional');

export interface ConditionalFrame {
  condition: string;
  value: boolean;
  parentSuppressed: boolean;
  /** false when the `if` was reached while suppressed under the 'skip' policy */
  evaluated: boolean;
}

export class ConditionalContext extends EventEmitter {
  private stack: ConditionalFrame[] = [];
  private _suppressed = false;
  private flags: FlagSource;
  private policy: NestedIfPolicy;

  constructor(flags: FlagSource, policy: NestedIfPolicy = 'skip') {
    super();
    this.flags = flags;
    this.policy = policy;
  }

  /** True while commands must be parsed but not dispatched */
  get suppressed(): boolean {
    return this._suppressed;
  }

  /** Number of unmatched `if` frames */
  get depth(): number {
    return this.stack.length;
  }

  isBalanced(): boolean {
    return this.stack.length === 0;
  }

  frames(): ConditionalFrame[] {
    return this.stack.map(frame => ({ ...frame }));
  }

  /** Evaluate an expression against the flag store */
  evaluate(condition: string): boolean {
    const value = evaluateCondition(condition, this.flags);
    log.debug(`Condition '${condition}' = ${value}`);
    this.emit('evaluated', condition, value);
    return value;
  }

  /** Handle `if <condition>` */
  enterIf(condition: string): void {
    const parentSuppressed = this._suppressed;
    let value = false;
    let evaluated = false;

    if (!parentSuppressed || this.policy === 'evaluate') {
      value = this.evaluate(condition);
      evaluated = true;
    }

    this.stack.push({ condition, value, parentSuppressed, evaluated });
    this._suppressed = parentSuppressed || !value;
    this.emit('entered', condition, value, evaluated);
  }

  /** Handle `else`: flip the innermost frame */
  enterElse(): void {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) {
      throw new StructuralError('else without matching if', 'else');
    }
    frame.value = !frame.value;
    this._suppressed = frame.parentSuppressed || !frame.value;
    log.debug(`else branch: condition = ${frame.value}`);
  }

  /** Handle `endif`: pop the innermost frame */
  exitIf(): void {
    if (this.stack.length === 0) {
      throw new StructuralError('endif without matching if', 'endif');
    }
    this.stack.pop();
    const top = this.stack[this.stack.length - 1];
    this._suppressed = top ? top.parentSuppressed || !top.value : false;
    this.emit('exited', this.stack.length);
  }

  reset(): void {
    this.stack = [];
    this._suppressed = false;
  }
}
