/**
 * Command Parser
 *
 * Classifies one line of the device mini-language into a typed, validated
 * outcome. The scanner is hand-written and linear in the input: no regular
 * expressions, no backtracking. A clock-checked step budget bounds the
 * wall time of a single classification without a watchdog.
 *
 * Recognized forms (keyword matched case-insensitively on the first word):
 *   wait <seconds>          stop_if_not <expr>     sequence <name>
 *   if <expr>               multizone <params>     button <params>
 *   else                    og_multizone-<base>    tagged <tag>
 *   endif
 * Anything else is a regular device command.
 */

import { EngineErrorKind } from '../errors';
import { ParserLimits } from '../config-schema';
import { getLogger } from '../logger';
import { CommandKind, CommandPayload, MULTIZONE_MARKER, ValidationOutcome } from './types';

const log = getLogger('Parser');

export const DEFAULT_PARSER_LIMITS: ParserLimits = {
  maxCommandLength: 1000,
  maxMatchGroups: 10,
  matchBudgetMs: 1000,
  maxWaitSeconds: 3600,
};

const LIMIT_KEYS: readonly (keyof ParserLimits)[] = [
  'maxCommandLength',
  'maxMatchGroups',
  'matchBudgetMs',
  'maxWaitSeconds',
];

export type Clock = () => number;

const KEYWORD_KINDS: ReadonlyMap<string, CommandKind> = new Map<string, CommandKind>([
  ['wait', 'wait'],
  ['if', 'if'],
  ['else', 'else'],
  ['endif', 'endif'],
  ['stop_if_not', 'stop_if_not'],
  ['multizone', 'multizone'],
  ['sequence', 'sequence_ref'],
  ['button', 'button_ref'],
  ['tagged', 'tagged'],
]);

/** Thrown inside a scan when the step budget runs out */
class ScanBudgetExceeded extends Error {}

/**
 * Counts scan steps and reads the clock every few steps.
 * Reading the clock on every character would dominate the scan cost.
 */
class ScanBudget {
  private steps = 0;
  private readonly deadline: number;

  constructor(private readonly clock: Clock, budgetMs: number) {
    this.deadline = clock() + budgetMs;
  }

  step(): void {
    this.steps++;
    if ((this.steps & 31) === 0) this.check();
  }

  check(): void {
    if (this.clock() > this.deadline) {
      throw new ScanBudgetExceeded();
    }
  }
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isAlnum(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

/** [A-Za-z0-9_-] */
function isNameChar(ch: string): boolean {
  return isAlnum(ch) || ch === '_' || ch === '-';
}

function ok(kind: CommandKind, payload: CommandPayload): ValidationOutcome {
  return { valid: true, error: '', kind, payload };
}

function fail(kind: CommandKind, error: string, errorKind: EngineErrorKind = 'syntax'): ValidationOutcome {
  return { valid: false, error, kind, payload: {}, errorKind };
}

export class SequenceParser {
  private limits: ParserLimits;
  private readonly clock: Clock;

  constructor(limits: Partial<ParserLimits> = {}, clock: Clock = () => performance.now()) {
    this.limits = { ...DEFAULT_PARSER_LIMITS, ...limits };
    this.clock = clock;
  }

  /** Current limits */
  getLimits(): ParserLimits {
    return { ...this.limits };
  }

  /** Change limits; non-positive values are ignored */
  setLimits(limits: Partial<ParserLimits>): void {
    for (const key of LIMIT_KEYS) {
      const value = limits[key];
      if (value === undefined) continue;
      if (value > 0) {
        this.limits[key] = value;
      } else {
        log.warn(`Ignoring non-positive parser limit ${key}=${value}`);
      }
    }
  }

  /** Classify and validate a single command */
  classify(command: string): ValidationOutcome {
    const text = command.trim();
    if (text.length === 0) {
      return fail('unknown', 'Empty command');
    }
    if (text.length > this.limits.maxCommandLength) {
      return fail('unknown', `Command too long (maximum ${this.limits.maxCommandLength} characters)`, 'range');
    }

    const budget = new ScanBudget(this.clock, this.limits.matchBudgetMs);
    let kind: CommandKind = 'regular';

    try {
      let split = 0;
      while (split < text.length && !isWhitespace(text[split])) {
        budget.step();
        split++;
      }
      const head = text.slice(0, split).toLowerCase();
      let argStart = split;
      while (argStart < text.length && isWhitespace(text[argStart])) {
        budget.step();
        argStart++;
      }
      const arg = text.slice(argStart);

      if (head.startsWith(MULTIZONE_MARKER)) {
        kind = 'multizone';
        return this.parseMultizoneMarker(text, budget);
      }

      kind = KEYWORD_KINDS.get(head) ?? 'regular';
      const outcome = this.parseForm(kind, head, arg, text, budget);
      budget.check();
      return outcome;
    } catch (err) {
      if (err instanceof ScanBudgetExceeded) {
        log.error(`Parse budget of ${this.limits.matchBudgetMs} ms exceeded for ${kind} command`);
        return fail(kind, `Parsing ${kind} command exceeded the ${this.limits.matchBudgetMs} ms budget`, 'timeout');
      }
      throw err;
    }
  }

  // --- Forms ---

  private parseForm(kind: CommandKind, head: string, arg: string, text: string, budget: ScanBudget): ValidationOutcome {
    switch (kind) {
      case 'wait':
        return this.parseWait(arg, budget);
      case 'if':
      case 'stop_if_not':
        return this.parseCondition(kind, head, arg, budget);
      case 'else':
      case 'endif':
        return arg.length === 0
          ? ok(kind, {})
          : fail(kind, `${head} takes no arguments`);
      case 'multizone':
        return this.parseMultizoneParams(arg, budget);
      case 'sequence_ref': {
        const name = this.parseName(kind, 'Sequence name', arg, budget);
        return typeof name === 'string' ? ok(kind, { sequenceName: name }) : name;
      }
      case 'button_ref': {
        if (arg.length === 0) return fail(kind, 'Button parameters cannot be empty');
        const groups = this.countTokens(arg, budget);
        if (groups > this.limits.maxMatchGroups) {
          return fail(kind, `Too many groups in button command (maximum ${this.limits.maxMatchGroups})`);
        }
        return ok(kind, { buttonParams: arg });
      }
      case 'tagged': {
        const tag = this.parseName(kind, 'Tag', arg, budget);
        return typeof tag === 'string' ? ok(kind, { tag }) : tag;
      }
      default:
        return ok('regular', { command: text });
    }
  }

  private parseWait(arg: string, budget: ScanBudget): ValidationOutcome {
    const usage = 'Invalid wait syntax. Use: wait <seconds>';
    if (arg.length === 0) return fail('wait', usage);

    let i = 0;
    const negative = arg[0] === '-';
    if (negative) i++;
    const intStart = i;
    while (i < arg.length && isDigit(arg[i])) {
      budget.step();
      i++;
    }
    if (i === intStart) return fail('wait', usage);
    if (i < arg.length && arg[i] === '.') {
      i++;
      const fracStart = i;
      while (i < arg.length && isDigit(arg[i])) {
        budget.step();
        i++;
      }
      if (i === fracStart) return fail('wait', usage);
    }
    if (i !== arg.length) return fail('wait', usage);

    const waitTime = Number(arg);
    if (!Number.isFinite(waitTime)) {
      return fail('wait', 'Invalid time format in wait command');
    }
    if (negative && waitTime !== 0) {
      return fail('wait', 'Wait time cannot be negative', 'range');
    }
    if (waitTime > this.limits.maxWaitSeconds) {
      return fail('wait', `Wait time exceeds the maximum (${this.limits.maxWaitSeconds} s)`, 'range');
    }
    return ok('wait', { waitTime: Math.abs(waitTime) });
  }

  private parseCondition(kind: 'if' | 'stop_if_not', head: string, arg: string, budget: ScanBudget): ValidationOutcome {
    if (arg.length === 0) return fail(kind, 'Condition cannot be empty');

    // Operands of && and || count as groups
    let groups = 1;
    for (let i = 0; i + 1 < arg.length; i++) {
      budget.step();
      const pair = arg[i] + arg[i + 1];
      if (pair === '&&' || pair === '||') {
        groups++;
        i++;
      }
    }
    if (groups > this.limits.maxMatchGroups) {
      return fail(kind, `Too many groups in ${head} condition (maximum ${this.limits.maxMatchGroups})`);
    }
    return ok(kind, { condition: arg });
  }

  private parseMultizoneParams(arg: string, budget: ScanBudget): ValidationOutcome {
    if (arg.length === 0) return fail('multizone', 'Multizone parameters cannot be empty');
    for (const ch of arg) {
      budget.step();
      if (!isAlnum(ch) && ch !== ',' && !isWhitespace(ch)) {
        return fail('multizone', 'Invalid multizone parameter format');
      }
    }
    if (this.countTokens(arg, budget) > this.limits.maxMatchGroups) {
      return fail('multizone', `Too many groups in multizone command (maximum ${this.limits.maxMatchGroups})`);
    }
    return ok('multizone', { params: arg });
  }

  private parseMultizoneMarker(text: string, budget: ScanBudget): ValidationOutcome {
    const base = text.slice(MULTIZONE_MARKER.length);
    if (base.length === 0) return fail('multizone', 'Multizone base command cannot be empty');
    for (const ch of base) {
      budget.step();
      if (!isNameChar(ch)) {
        return fail('multizone', 'Multizone base command contains invalid characters');
      }
    }
    budget.check();
    return ok('multizone', { baseCommand: base });
  }

  /** A single [A-Za-z0-9_-]+ argument, or the failure outcome */
  private parseName(kind: CommandKind, label: string, arg: string, budget: ScanBudget): string | ValidationOutcome {
    if (arg.length === 0) return fail(kind, `${label} cannot be empty`);
    for (const ch of arg) {
      budget.step();
      if (!isNameChar(ch)) {
        return fail(kind, `${label} contains invalid characters`);
      }
    }
    return arg;
  }

  private countTokens(arg: string, budget: ScanBudget): number {
    let count = 0;
    let inToken = false;
    for (const ch of arg) {
      budget.step();
      if (isWhitespace(ch)) {
        inToken = false;
      } else if (!inToken) {
        inToken = true;
        count++;
      }
    }
    return count;
  }
}
