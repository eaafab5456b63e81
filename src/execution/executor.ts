/**
 * Sequence Executor
 *
 * Runs a flat command list to the end in the caller's flow: the promise
 * returned by execute() settles when the run is over. Any failed command
 * stops the run.
 *
 * Emits:
 *   'started'          (total: number)
 *   'command-executed' (result: CommandResult)
 *   'progress'         (progress: RunProgress)
 *   'status'           (status: RunStatus)
 *   'finished'         (outcome: RunOutcome)
 */

import { EventEmitter } from 'events';
import { errorMessage } from '../errors';
import { emitSafely } from '../events';
import { getLogger } from '../logger';
import { ConditionalContext } from '../sequences/conditional';
import { CancellationToken } from './cancellation';
import { CommandRunner, RunnerDependencies } from './runner';
import { CommandResult, RunOptions, RunOutcome, RunProgress, RunStatus } from './types';

const log = getLogger('Executor');

export type ExecutorDependencies = Omit<RunnerDependencies, 'token'> & { token?: CancellationToken };

export class SequenceExecutor extends EventEmitter {
  protected runner: CommandRunner;
  protected token: CancellationToken;
  protected _status: RunStatus = 'idle';
  private results: CommandResult[] = [];
  private current = 0;
  private total = 0;

  constructor(deps: ExecutorDependencies) {
    super();
    this.token = deps.token ?? new CancellationToken();
    this.runner = new CommandRunner({ ...deps, token: this.token });
  }

  get status(): RunStatus {
    return this._status;
  }

  get isActive(): boolean {
    return this._status === 'running' || this._status === 'paused';
  }

  /** Conditional state of the current (or last) run */
  get conditional(): ConditionalContext {
    return this.runner.conditional;
  }

  execute(commands: readonly string[], options: RunOptions = {}): Promise<RunOutcome> {
    if (this.isActive) {
      log.warn('Execute rejected: a run is already active');
      return Promise.resolve(rejectedOutcome('A sequence is already running'));
    }
    return this.runCommands(commands, options);
  }

  /** Cancel the active run; ignored when nothing runs */
  cancel(): boolean {
    if (!this.isActive) return false;
    log.info('Cancellation requested');
    return this.token.cancel();
  }

  getProgress(): RunProgress {
    return { current: this.current, total: this.total, status: this._status };
  }

  getResults(): CommandResult[] {
    return [...this.results];
  }

  // --- Hooks for the background worker ---

  /** Awaited before every command */
  protected async beforeCommand(): Promise<void> {
    return;
  }

  /** Whether a failed command lets the run go on */
  protected continueAfter(_result: CommandResult, _options: RunOptions): boolean {
    return false;
  }

  // --- Internal ---

  protected async runCommands(commands: readonly string[], options: RunOptions): Promise<RunOutcome> {
    const generation = this.token.reset();
    this.runner.reset();
    this.results = [];
    this.current = 0;
    this.total = commands.length;
    this.setStatus('running');
    log.info(`Run started: ${commands.length} commands`);
    emitSafely(this, log, 'started', commands.length);

    let timedOut = false;
    const timer = options.timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          log.warn(`Run exceeded ${options.timeoutMs} ms, cancelling`);
          this.token.cancel(generation);
        }, options.timeoutMs)
      : undefined;

    let failure: CommandResult | undefined;
    try {
      for (let i = 0; i < commands.length; i++) {
        await this.beforeCommand();
        if (this.token.isCancelled) break;

        const result = await this.runner.run(i, commands[i]);
        this.record(result);
        if (!result.success && !this.continueAfter(result, options)) {
          failure = result;
          break;
        }
      }
    } catch (err) {
      log.error(`Run aborted: ${errorMessage(err)}`);
      failure = {
        index: this.current,
        command: commands[this.current] ?? '',
        kind: 'unknown',
        success: false,
        skipped: false,
        message: `Run aborted: ${errorMessage(err)}`,
        critical: true,
        durationMs: 0,
      };
    } finally {
      clearTimeout(timer);
    }

    const outcome = this.buildOutcome(failure, timedOut, options);
    this.setStatus(outcome.status);
    if (outcome.success) {
      log.info(outcome.message);
    } else {
      log.warn(`Run ${outcome.status}: ${outcome.message}`);
    }
    emitSafely(this, log, 'finished', outcome);
    return outcome;
  }

  protected setStatus(status: RunStatus): void {
    if (this._status === status) return;
    this._status = status;
    emitSafely(this, log, 'status', status);
  }

  private record(result: CommandResult): void {
    this.results.push(result);
    this.current = result.index + 1;
    emitSafely(this, log, 'command-executed', result);
    emitSafely(this, log, 'progress', this.getProgress());
  }

  private buildOutcome(failure: CommandResult | undefined, timedOut: boolean, options: RunOptions): RunOutcome {
    const results = this.getResults();

    if (timedOut) {
      return {
        status: 'failed',
        success: false,
        message: `Run exceeded the ${options.timeoutMs} ms timeout`,
        failedCommand: failure?.command,
        errorKind: 'timeout',
        results,
      };
    }
    if (this.token.isCancelled || failure?.errorKind === 'cancelled') {
      return { status: 'cancelled', success: false, message: 'Run cancelled', failedCommand: failure?.command, errorKind: 'cancelled', results };
    }
    if (failure) {
      return {
        status: 'failed',
        success: false,
        message: failure.message,
        failedCommand: failure.command,
        response: failure.response,
        errorKind: failure.errorKind,
        results,
      };
    }
    if (!this.runner.isBalanced()) {
      return {
        status: 'failed',
        success: false,
        message: `Run ended with ${this.runner.conditional.depth} unclosed conditional block(s)`,
        errorKind: 'structural',
        results,
      };
    }

    const failed = results.filter(r => !r.success);
    if (failed.length > 0) {
      return {
        status: 'failed',
        success: false,
        message: `${failed.length} command(s) failed`,
        failedCommand: failed[0].command,
        errorKind: failed[0].errorKind,
        results,
      };
    }
    return { status: 'completed', success: true, message: `Completed ${results.length} commands`, results };
  }
}

/** Outcome of a run that never started */
export function rejectedOutcome(message: string): RunOutcome {
  return { status: 'failed', success: false, message, errorKind: 'structural', results: [] };
}
