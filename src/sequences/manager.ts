/**
 * Sequence Manager
 *
 * Front door of the engine. Owns the sequence and button tables and wires
 * the parser, validator, expander, search index, zones and the two
 * execution paths together.
 *
 * Every mutation invalidates the cached expansions and validations that
 * depend on the changed name and rebuilds the search index, so no stale
 * result is ever served.
 *
 * Only one run is active at a time, in either path.
 *
 * Emits:
 *   'sequence-started'  (info: { name: string | null, total: number, async: boolean })
 *   'command-executed'  (result: CommandResult)
 *   'progress'          (progress: RunProgress)
 *   'sequence-finished' (outcome: RunOutcome, name: string | null)
 *   'paused'
 *   'resumed'
 *   'zone-status'       (id: number, status: ZoneStatus, previous: ZoneStatus)
 *   'error'             (message: string)
 */

import { EventEmitter } from 'events';
import { CacheStats, ResultCache } from '../cache/result-cache';
import { EngineConfig, EngineConfigInput, validateEngineConfig } from '../config-schema';
import { EngineErrorKind, errorMessage } from '../errors';
import { emitSafely } from '../events';
import { SequenceExecutor, rejectedOutcome } from '../execution/executor';
import { ResponseClassifier, DeviceTransport } from '../execution/response';
import { CommandResult, RunOutcome, RunProgress } from '../execution/types';
import { SequenceWorker, WorkerRunOptions } from '../execution/worker';
import { FlagStore } from '../flags/flag-store';
import { getLogger, setLogLevel } from '../logger';
import { ZoneManager } from '../zones/zone-manager';
import { ZoneSelection, ZoneState } from '../zones/types';
import { ExpansionResult, MacroExpander } from './expander';
import { SequenceParser } from './parser';
import { IndexStats, SearchIndex, SearchMode } from './search-index';
import { CommandKind, SequenceValidation } from './types';
import { CommandValidator } from './validator';

const log = getLogger('SequenceManager');

/** Estimated run time of a command that is not a wait */
const COMMAND_SECONDS = 0.1;

export interface SequenceManagerOptions {
  transport: DeviceTransport;
  flags?: FlagStore;
  config?: EngineConfigInput;
}

export interface ExecuteOptions extends WorkerRunOptions {
  /** Run on the background worker (pausable) instead of in the caller's flow */
  async?: boolean;
}

export interface SequenceInfo {
  name: string;
  commandCount: number;
  valid: boolean;
  errors: string[];
  kinds: Partial<Record<CommandKind, number>>;
  estimatedDurationSeconds: number;
  complexityScore: number;
}

export interface LoadResult {
  loaded: number;
  errors: string[];
}

export interface ManagerStatistics {
  sequences: number;
  buttons: number;
  runs: { started: number; completed: number; failed: number; cancelled: number };
  commands: { executed: number; failed: number; skipped: number };
  successRate: number;
  caches: CacheStats[];
  index: IndexStats;
}

function isValidName(name: string): boolean {
  return name.length > 0 && name.trim() === name && !/[\u0000-\u001f]/.test(name);
}

export class SequenceManager extends EventEmitter {
  readonly config: EngineConfig;
  readonly flags: FlagStore;
  readonly zones: ZoneManager;
  private parser: SequenceParser;
  private validator: CommandValidator;
  private expander: MacroExpander;
  private index: SearchIndex;
  private executor: SequenceExecutor;
  private worker: SequenceWorker;
  private sequences: Map<string, string[]> = new Map();
  private buttons: Map<string, string> = new Map();
  private expandCache: ResultCache<string[]>;
  private validateCache: ResultCache<SequenceValidation>;
  private activeName: string | null = null;
  private lastPath: SequenceExecutor;
  private runStats = { started: 0, completed: 0, failed: 0, cancelled: 0 };
  private commandStats = { executed: 0, failed: 0, skipped: 0 };

  constructor(options: SequenceManagerOptions) {
    super();
    this.config = validateEngineConfig(options.config);
    if (this.config.logging.level) setLogLevel(this.config.logging.level);
    this.flags = options.flags ?? new FlagStore();
    this.zones = new ZoneManager();

    this.parser = new SequenceParser(this.config.parser);
    this.validator = new CommandValidator(this.parser, {
      maxSequenceLength: this.config.sequences.maxSequenceLength,
      cacheCapacity: this.config.cache.validateCapacity,
    });
    this.expander = new MacroExpander(this.parser, this.config.sequences.maxExpansionDepth);
    this.index = new SearchIndex(this.parser, this.config.cache.searchCapacity);
    this.expandCache = new ResultCache(this.config.cache.expandCapacity, 'expand');
    this.validateCache = new ResultCache(this.config.cache.validateCapacity, 'validate-sequence');

    const transport = options.transport;
    const deps = {
      parser: this.parser,
      transport,
      flags: this.flags,
      zones: this.zones,
      config: this.config.execution,
    };
    this.executor = new SequenceExecutor(deps);
    this.worker = new SequenceWorker(deps);
    this.lastPath = this.executor;

    for (const path of [this.executor, this.worker]) {
      path.on('command-executed', (result: CommandResult) => this.onCommandExecuted(result));
      path.on('progress', (progress: RunProgress) => emitSafely(this, log, 'progress', progress));
      path.on('finished', (outcome: RunOutcome) => this.onFinished(outcome));
    }
    this.worker.on('paused', () => emitSafely(this, log, 'paused'));
    this.worker.on('resumed', () => emitSafely(this, log, 'resumed'));
    this.zones.on('zone-status', (...args: unknown[]) => emitSafely(this, log, 'zone-status', ...args));
  }

  /** Keyword matcher built from the configured response keywords */
  createResponseClassifier(): ResponseClassifier {
    return new ResponseClassifier(this.config.responses);
  }

  // --- Sequences ---

  addSequence(name: string, commands: readonly string[]): SequenceValidation {
    if (!isValidName(name)) {
      return this.reject(`Invalid sequence name '${name}'`);
    }
    if (commands.length === 0) {
      return this.reject(`Sequence '${name}' has no commands`);
    }
    const validation = this.validator.validateSequence(commands);
    if (!validation.ok) {
      log.warn(`Sequence '${name}' rejected: ${validation.errors.join('; ')}`);
      return validation;
    }

    this.sequences.set(name, [...commands]);
    this.invalidate([name]);
    log.debug(`Sequence '${name}' stored (${commands.length} commands)`);
    return { ok: true, errors: [] };
  }

  removeSequence(name: string): boolean {
    if (!this.sequences.delete(name)) return false;
    this.invalidate([name]);
    return true;
  }

  getSequence(name: string): string[] | undefined {
    const commands = this.sequences.get(name);
    return commands ? [...commands] : undefined;
  }

  getAllSequences(): Record<string, string[]> {
    return Object.fromEntries(Array.from(this.sequences, ([name, commands]): [string, string[]] => [name, [...commands]]));
  }

  /** Add many sequences at once; the index is rebuilt a single time */
  loadSequences(record: Record<string, readonly string[]>): LoadResult {
    const errors: string[] = [];
    const changed: string[] = [];

    for (const [name, commands] of Object.entries(record)) {
      if (!isValidName(name)) {
        errors.push(`Invalid sequence name '${name}'`);
        continue;
      }
      if (commands.length === 0) {
        errors.push(`Sequence '${name}' has no commands`);
        continue;
      }
      const validation = this.validator.validateSequence(commands);
      if (!validation.ok) {
        errors.push(...validation.errors.map(e => `${name}: ${e}`));
        continue;
      }
      this.sequences.set(name, [...commands]);
      changed.push(name);
    }

    this.invalidate(changed);
    log.info(`Loaded ${changed.length} sequences (${errors.length} errors)`);
    return { loaded: changed.length, errors };
  }

  // --- Buttons ---

  addButton(name: string, command: string): SequenceValidation {
    if (!isValidName(name)) {
      return this.reject(`Invalid button name '${name}'`);
    }
    const outcome = this.parser.classify(command);
    if (!outcome.valid) {
      return this.reject(`Button '${name}': ${outcome.error}`);
    }

    this.buttons.set(name, command.trim());
    this.invalidate([name]);
    return { ok: true, errors: [] };
  }

  removeButton(name: string): boolean {
    if (!this.buttons.delete(name)) return false;
    this.invalidate([name]);
    return true;
  }

  getButton(name: string): string | undefined {
    return this.buttons.get(name);
  }

  getAllButtons(): Record<string, string> {
    return Object.fromEntries(this.buttons);
  }

  loadButtons(record: Record<string, string>): LoadResult {
    const errors: string[] = [];
    const changed: string[] = [];

    for (const [name, command] of Object.entries(record)) {
      const outcome = this.parser.classify(command);
      if (!isValidName(name) || !outcome.valid) {
        errors.push(isValidName(name) ? `Button '${name}': ${outcome.error}` : `Invalid button name '${name}'`);
        continue;
      }
      this.buttons.set(name, command.trim());
      changed.push(name);
    }

    this.invalidate(changed);
    return { loaded: changed.length, errors };
  }

  // --- Analysis ---

  /** Flattened command list of a stored sequence */
  expand(name: string): string[] {
    const cached = this.expandCache.get(name);
    if (cached) return [...cached];

    const result = this.expander.expandWithDependencies(name, this.sequences, this.buttons);
    this.expandCache.set(name, result.commands, result.dependencies);
    return [...result.commands];
  }

  /** Structure, references and cycles of a stored sequence */
  validate(name: string): SequenceValidation {
    const cached = this.validateCache.get(name);
    if (cached) return { ok: cached.ok, errors: [...cached.errors] };

    const commands = this.sequences.get(name);
    if (!commands) return { ok: false, errors: [`Unknown sequence '${name}'`] };

    const errors = [
      ...this.validator.validateSequence(commands).errors,
      ...this.validator.validateReferences(commands, this.sequences, this.buttons),
    ];
    const expansion = this.expander.expandWithDependencies(name, this.sequences, this.buttons);
    if (expansion.cyclic) {
      errors.push(`Sequence '${name}' is part of a reference cycle`);
    }
    if (expansion.truncated) {
      errors.push(`Sequence '${name}' nests deeper than ${this.expander.maxExpansionDepth} levels`);
    }

    const result = { ok: errors.length === 0, errors };
    this.validateCache.set(name, result, expansion.dependencies);
    return { ok: result.ok, errors: [...errors] };
  }

  search(query: string, mode: SearchMode = 'contains', maxResults = 100): string[] {
    return this.index.search(query, mode, maxResults);
  }

  searchByKind(kind: CommandKind): string[] {
    return this.index.searchByKind(kind);
  }

  searchByKeyword(keyword: string): string[] {
    return this.index.searchByKeyword(keyword);
  }

  suggestions(prefix: string, maxSuggestions = 10): string[] {
    return this.index.suggestions(prefix, maxSuggestions);
  }

  sequenceInfo(name: string): SequenceInfo | null {
    const commands = this.sequences.get(name);
    if (!commands) return null;

    const kinds: Partial<Record<CommandKind, number>> = {};
    let seconds = 0;
    let complexity = 0;

    for (const command of commands) {
      const outcome = this.parser.classify(command);
      kinds[outcome.kind] = (kinds[outcome.kind] ?? 0) + 1;

      if (outcome.kind === 'wait') {
        seconds += outcome.payload.waitTime ?? 0;
      } else {
        seconds += COMMAND_SECONDS;
      }

      if (outcome.kind === 'if') {
        complexity += 2;
      } else if (outcome.kind === 'multizone') {
        complexity += 3;
      } else {
        complexity += 1;
      }
    }

    const validation = this.validate(name);
    return {
      name,
      commandCount: commands.length,
      valid: validation.ok,
      errors: validation.errors,
      kinds,
      estimatedDurationSeconds: Math.round(seconds * 1000) / 1000,
      complexityScore: complexity,
    };
  }

  // --- Execution ---

  /**
   * Run a stored sequence by name, or a command list. References are
   * expanded and the result validated before anything is sent.
   */
  execute(target: string | readonly string[], options: ExecuteOptions = {}): Promise<RunOutcome> {
    if (this.isRunning()) {
      return Promise.resolve(this.refuse('A sequence is already running'));
    }

    let name: string | null = null;
    let expansion: ExpansionResult;
    if (typeof target === 'string') {
      if (!this.sequences.has(target)) {
        return Promise.resolve(this.refuse(`Unknown sequence '${target}'`));
      }
      name = target;
      expansion = this.expander.expandWithDependencies(target, this.sequences, this.buttons);
    } else {
      expansion = this.expander.expandCommands(target, this.sequences, this.buttons);
    }
    const label = name !== null ? `'${name}'` : 'Command list';

    if (expansion.cyclic) {
      return Promise.resolve(this.refuse(`${label} is part of a reference cycle`));
    }
    if (expansion.truncated) {
      return Promise.resolve(this.refuse(`${label} nests deeper than ${this.expander.maxExpansionDepth} levels`));
    }

    const commands = expansion.commands;
    const validation = this.validator.validateSequence(commands);
    if (!validation.ok) {
      return Promise.resolve(this.refuse(`Validation failed: ${validation.errors.join('; ')}`, this.firstErrorKind(commands)));
    }

    this.activeName = name;
    this.runStats.started++;
    this.zones.resetZones();
    log.info(`Executing ${name ?? 'command list'} (${commands.length} commands${options.async ? ', background' : ''})`);
    emitSafely(this, log, 'sequence-started', { name, total: commands.length, async: options.async === true });

    const { async: background, onComplete, ...runOptions } = options;
    if (background) {
      this.lastPath = this.worker;
      this.worker.start(commands, { ...runOptions, onComplete });
      return this.worker.waitForCompletion();
    }
    this.lastPath = this.executor;
    return this.executor.execute(commands, runOptions).then(outcome => {
      if (onComplete) {
        try {
          onComplete(outcome);
        } catch (err) {
          log.error(`onComplete callback threw: ${errorMessage(err)}`);
        }
      }
      return outcome;
    });
  }

  isRunning(): boolean {
    return this.executor.isActive || this.worker.isActive;
  }

  /** Pause a background run before its next command */
  pause(): boolean {
    return this.worker.pause();
  }

  resume(): boolean {
    return this.worker.resume();
  }

  cancel(): boolean {
    return this.executor.cancel() || this.worker.cancel();
  }

  /** Progress of the active run, or of the last one */
  getProgress(): RunProgress {
    return this.lastPath.getProgress();
  }

  getResults(): CommandResult[] {
    return this.lastPath.getResults();
  }

  // --- Zones and flags ---

  setZones(ids: readonly number[]): ZoneSelection {
    const selection = this.zones.setZones(ids);
    if (!selection.ok) {
      log.warn(`Zone selection rejected: ${selection.error}`);
      this.reportError(selection.error);
    }
    return selection;
  }

  getZoneStatuses(): ZoneState[] {
    return this.zones.getZoneStatuses();
  }

  setFlag(name: string, value: boolean): void {
    this.flags.setFlag(name, value);
  }

  getFlag(name: string): boolean {
    return this.flags.getFlag(name);
  }

  // --- Housekeeping ---

  clearCache(): void {
    this.expandCache.clear();
    this.validateCache.clear();
    this.validator.clearCache();
    this.index.clearCache();
  }

  getStatistics(): ManagerStatistics {
    const { executed, failed } = this.commandStats;
    return {
      sequences: this.sequences.size,
      buttons: this.buttons.size,
      runs: { ...this.runStats },
      commands: { ...this.commandStats },
      successRate: executed === 0 ? 0 : (executed - failed) / executed,
      caches: [this.expandCache.stats(), this.validateCache.stats(), this.validator.cacheStats()],
      index: this.index.stats(),
    };
  }

  // --- Internal ---

  private invalidate(names: readonly string[]): void {
    for (const name of names) {
      this.expandCache.invalidateDependents(name);
      this.validateCache.invalidateDependents(name);
    }
    this.index.rebuild(this.sequences, this.buttons);
  }

  private reject(message: string): SequenceValidation {
    log.warn(message);
    return { ok: false, errors: [message] };
  }

  private refuse(message: string, errorKind: EngineErrorKind = 'structural'): RunOutcome {
    log.warn(`Execute refused: ${message}`);
    this.reportError(message);
    return { ...rejectedOutcome(message), errorKind };
  }

  /** 'error' is only emitted to listeners; an unheard 'error' event would throw */
  private reportError(message: string): void {
    if (this.listenerCount('error') > 0) {
      emitSafely(this, log, 'error', message);
    }
  }

  private firstErrorKind(commands: readonly string[]): EngineErrorKind {
    for (const command of commands) {
      const outcome = this.parser.classify(command);
      if (!outcome.valid) return outcome.errorKind ?? 'syntax';
    }
    return 'structural';
  }

  private onCommandExecuted(result: CommandResult): void {
    if (result.skipped) {
      this.commandStats.skipped++;
    } else {
      this.commandStats.executed++;
      if (!result.success) this.commandStats.failed++;
    }
    emitSafely(this, log, 'command-executed', result);
  }

  private onFinished(outcome: RunOutcome): void {
    this.runStats[outcome.status]++;
    const name = this.activeName;
    this.activeName = null;
    emitSafely(this, log, 'sequence-finished', outcome, name);
  }
}
