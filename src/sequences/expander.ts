/**
 * Macro Expander
 *
 * Flattens a sequence into the command list the device actually receives.
 * Supports:
 *   - Nested sequences (bare name or `sequence <name>`)
 *   - Button macros (bare name or `button <name>`), substituted once
 *   - Cycle rejection: a reachability scan over the reference graph runs
 *     before any recursion, so direct and indirect self-references expand
 *     to nothing instead of looping
 *   - A depth cap; branches nested deeper expand to nothing
 *   - Per-call memoization, so a shared sub-sequence is expanded once
 */

import { getLogger } from '../logger';
import { SequenceParser } from './parser';
import { ButtonTable, CommandKind, SequenceTable } from './types';

const log = getLogger('Expander');

export const DEFAULT_MAX_EXPANSION_DEPTH = 20;

/** Table key for expandCommands(); the control character keeps it out of reach of stored names */
const ANONYMOUS_ROOT = '\u0000commands';

export interface ExpansionResult {
  commands: string[];
  /** Every sequence, button or bare name looked up while expanding */
  dependencies: Set<string>;
  /** True when the depth cap cut at least one branch */
  truncated: boolean;
  /** True when at least one reference was dropped as part of a cycle */
  cyclic: boolean;
}

/** Kinds passed through untouched */
const PASS_THROUGH: ReadonlySet<CommandKind> = new Set<CommandKind>([
  'wait',
  'if',
  'else',
  'endif',
  'stop_if_not',
  'multizone',
  'tagged',
]);

type Resolution =
  | { type: 'pass'; command: string }
  | { type: 'button'; command: string }
  | { type: 'sequence'; name: string };

interface MemoEntry {
  commands: string[];
  /** Levels of nesting below this sequence */
  height: number;
}

interface Expansion {
  sequences: SequenceTable;
  buttons: ButtonTable;
  dependencies: Set<string>;
  memo: Map<string, MemoEntry>;
  resolutions: Map<string, Resolution>;
  edges: Map<string, string[]>;
  cyclicNames: Set<string>;
  truncated: boolean;
  cyclic: boolean;
}

export class MacroExpander {
  private parser: SequenceParser;
  private maxDepth: number;

  constructor(parser: SequenceParser, maxDepth = DEFAULT_MAX_EXPANSION_DEPTH) {
    this.parser = parser;
    this.maxDepth = maxDepth;
  }

  get maxExpansionDepth(): number {
    return this.maxDepth;
  }

  /** Expand a sequence by name into a flat command list */
  expand(name: string, sequences: SequenceTable, buttons: ButtonTable, visiting: ReadonlySet<string> = new Set()): string[] {
    return this.expandWithDependencies(name, sequences, buttons, visiting).commands;
  }

  expandWithDependencies(
    name: string,
    sequences: SequenceTable,
    buttons: ButtonTable,
    visiting: ReadonlySet<string> = new Set(),
  ): ExpansionResult {
    const ctx: Expansion = {
      sequences,
      buttons,
      dependencies: new Set([name]),
      memo: new Map(),
      resolutions: new Map(),
      edges: new Map(),
      cyclicNames: new Set(),
      truncated: false,
      cyclic: false,
    };

    if (!sequences.has(name) || visiting.has(name)) {
      return { commands: [], dependencies: ctx.dependencies, truncated: false, cyclic: visiting.has(name) };
    }

    ctx.cyclicNames = this.findCyclicNames(name, ctx);
    const entry = this.expandName(name, 0, new Set(visiting), ctx);
    return {
      commands: entry ? entry.commands : [],
      dependencies: ctx.dependencies,
      truncated: ctx.truncated,
      cyclic: ctx.cyclic,
    };
  }

  /** Expand an unnamed command list against the stored sequences and buttons */
  expandCommands(commands: readonly string[], sequences: SequenceTable, buttons: ButtonTable): ExpansionResult {
    const overlay = new Map(sequences);
    overlay.set(ANONYMOUS_ROOT, commands);
    const result = this.expandWithDependencies(ANONYMOUS_ROOT, overlay, buttons);
    result.dependencies.delete(ANONYMOUS_ROOT);
    return result;
  }

  /** True when `name` can reach itself through sequence references */
  hasCycle(name: string, sequences: SequenceTable, buttons: ButtonTable): boolean {
    if (!sequences.has(name)) return false;
    const ctx: Expansion = {
      sequences,
      buttons,
      dependencies: new Set(),
      memo: new Map(),
      resolutions: new Map(),
      edges: new Map(),
      cyclicNames: new Set(),
      truncated: false,
      cyclic: false,
    };
    return this.findCyclicNames(name, ctx).has(name);
  }

  // --- Internal ---

  /** Returns null when the branch was dropped (cycle or depth) */
  private expandName(name: string, depth: number, visiting: Set<string>, ctx: Expansion): MemoEntry | null {
    if (depth > this.maxDepth) {
      ctx.truncated = true;
      log.warn(`Expansion depth ${this.maxDepth} exceeded at '${name}'`);
      return null;
    }
    if (visiting.has(name) || ctx.cyclicNames.has(name)) {
      ctx.cyclic = true;
      log.warn(`Cycle detected: '${name}' references itself, skipping`);
      return null;
    }

    const cached = ctx.memo.get(name);
    if (cached && depth + cached.height <= this.maxDepth) {
      return cached;
    }

    const items = ctx.sequences.get(name) ?? [];
    const commands: string[] = [];
    let height = 0;
    let complete = true;

    visiting.add(name);
    for (const item of items) {
      const resolution = this.resolve(item, ctx);
      if (resolution.type !== 'sequence') {
        commands.push(resolution.command);
        continue;
      }
      const child = this.expandName(resolution.name, depth + 1, visiting, ctx);
      if (child) {
        for (const command of child.commands) commands.push(command);
        height = Math.max(height, child.height + 1);
      } else {
        complete = false;
      }
    }
    visiting.delete(name);

    const entry: MemoEntry = { commands, height };
    // Results missing a branch depend on where they were reached from
    if (complete) ctx.memo.set(name, entry);
    return entry;
  }

  private resolve(item: string, ctx: Expansion): Resolution {
    const known = ctx.resolutions.get(item);
    if (known) return known;

    const resolution = this.resolveItem(item, ctx);
    ctx.resolutions.set(item, resolution);
    return resolution;
  }

  private resolveItem(item: string, ctx: Expansion): Resolution {
    const outcome = this.parser.classify(item);

    if (outcome.valid && PASS_THROUGH.has(outcome.kind)) {
      return { type: 'pass', command: item };
    }

    if (outcome.valid && outcome.kind === 'sequence_ref' && outcome.payload.sequenceName) {
      const target = outcome.payload.sequenceName;
      ctx.dependencies.add(target);
      return ctx.sequences.has(target) ? { type: 'sequence', name: target } : { type: 'pass', command: item };
    }

    if (outcome.valid && outcome.kind === 'button_ref' && outcome.payload.buttonParams) {
      const target = outcome.payload.buttonParams;
      ctx.dependencies.add(target);
      const command = ctx.buttons.get(target);
      return command !== undefined ? { type: 'button', command } : { type: 'pass', command: item };
    }

    if (!outcome.valid && outcome.kind !== 'regular' && outcome.kind !== 'unknown') {
      // Malformed control command: left for the validator to report
      return { type: 'pass', command: item };
    }

    const key = item.trim();
    ctx.dependencies.add(key);
    const button = ctx.buttons.get(key);
    if (button !== undefined) return { type: 'button', command: button };
    if (ctx.sequences.has(key)) return { type: 'sequence', name: key };
    return { type: 'pass', command: item };
  }

  /** Sequence names referenced by the items of `name` */
  private edgesOf(name: string, ctx: Expansion): string[] {
    const known = ctx.edges.get(name);
    if (known) return known;

    const targets: string[] = [];
    for (const item of ctx.sequences.get(name) ?? []) {
      const resolution = this.resolve(item, ctx);
      if (resolution.type === 'sequence') targets.push(resolution.name);
    }
    ctx.edges.set(name, targets);
    return targets;
  }

  /**
   * Names reachable from `root` that sit on a cycle.
   * Iterative Tarjan SCC: a name is cyclic when its component has more
   * than one member or it references itself.
   */
  private findCyclicNames(root: string, ctx: Expansion): Set<string> {
    const cyclic = new Set<string>();
    const indices = new Map<string, number>();
    const lowLinks = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const work: { node: string; next: number }[] = [];
    let counter = 0;

    const visit = (node: string): void => {
      indices.set(node, counter);
      lowLinks.set(node, counter);
      counter++;
      stack.push(node);
      onStack.add(node);
      work.push({ node, next: 0 });
    };

    visit(root);
    while (work.length > 0) {
      const frame = work[work.length - 1];
      const edges = this.edgesOf(frame.node, ctx);

      if (frame.next < edges.length) {
        const target = edges[frame.next++];
        if (!indices.has(target)) {
          visit(target);
        } else if (onStack.has(target)) {
          lowLinks.set(frame.node, Math.min(lowLinks.get(frame.node) ?? 0, indices.get(target) ?? 0));
        }
        continue;
      }

      work.pop();
      const low = lowLinks.get(frame.node) ?? 0;
      const parent = work[work.length - 1];
      if (parent) {
        lowLinks.set(parent.node, Math.min(lowLinks.get(parent.node) ?? 0, low));
      }

      if (low === indices.get(frame.node)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.node);

        if (component.length > 1 || edges.includes(frame.node)) {
          for (const name of component) cyclic.add(name);
        }
      }
    }

    return cyclic;
  }
}
