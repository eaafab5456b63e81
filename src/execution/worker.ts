/**
 * Sequence Worker
 *
 * The background form of the executor. start() returns at once; the run
 * goes on while the caller keeps working, and the outcome arrives through
 * the 'finished' event, the onComplete callback and waitForCompletion().
 *
 * Adds to the executor:
 *   - pause / resume, checked before each command (waits on a promise)
 *   - continue-on-error for non-critical failures
 *
 * Emits (in addition to the executor's events):
 *   'paused'
 *   'resumed'
 */

import { ExecutionConfig } from '../config-schema';
import { errorMessage } from '../errors';
import { emitSafely } from '../events';
import { getLogger } from '../logger';
import { DEFAULT_EXECUTION_CONFIG } from './runner';
import { ExecutorDependencies, SequenceExecutor, rejectedOutcome } from './executor';
import { CommandResult, RunOptions, RunOutcome } from './types';

const log = getLogger('Worker');

export interface WorkerRunOptions extends RunOptions {
  /** Called once with the terminal outcome */
  onComplete?: (outcome: RunOutcome) => void;
}

export type StartResult = { started: true } | { started: false; error: string };

export class SequenceWorker extends SequenceExecutor {
  private paused = false;
  private resumeWaiters: Array<() => void> = [];
  private completion: Promise<RunOutcome> | null = null;
  private defaults: Pick<ExecutionConfig, 'continueOnError'>;

  constructor(deps: ExecutorDependencies) {
    super(deps);
    this.defaults = { continueOnError: deps.config?.continueOnError ?? DEFAULT_EXECUTION_CONFIG.continueOnError };
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /** Start a background run */
  start(commands: readonly string[], options: WorkerRunOptions = {}): StartResult {
    if (this.isActive) {
      log.warn('Start rejected: a run is already active');
      return { started: false, error: 'A sequence is already running' };
    }

    this.paused = false;
    this.completion = this.runCommands(commands, options).then(outcome => {
      if (options.onComplete) {
        try {
          options.onComplete(outcome);
        } catch (err) {
          log.error(`onComplete callback threw: ${errorMessage(err)}`);
        }
      }
      return outcome;
    });
    return { started: true };
  }

  /** Foreground form: start and wait for the outcome */
  execute(commands: readonly string[], options: WorkerRunOptions = {}): Promise<RunOutcome> {
    const started = this.start(commands, options);
    if (!started.started) return Promise.resolve(rejectedOutcome(started.error));
    return this.waitForCompletion();
  }

  /** Outcome of the current run, or of the last one when idle */
  waitForCompletion(): Promise<RunOutcome> {
    return this.completion ?? Promise.resolve(rejectedOutcome('No run has been started'));
  }

  pause(): boolean {
    if (this._status !== 'running') return false;
    this.paused = true;
    this.setStatus('paused');
    log.info('Run paused');
    emitSafely(this, log, 'paused');
    return true;
  }

  resume(): boolean {
    if (!this.paused) return false;
    this.paused = false;
    if (this._status === 'paused') this.setStatus('running');
    log.info('Run resumed');
    this.wakeWaiters();
    emitSafely(this, log, 'resumed');
    return true;
  }

  cancel(): boolean {
    const cancelled = super.cancel();
    this.paused = false;
    this.wakeWaiters();
    return cancelled;
  }

  protected async beforeCommand(): Promise<void> {
    while (this.paused && !this.token.isCancelled) {
      await new Promise<void>(resolve => {
        const unsubscribe = this.token.onCancel(resolve);
        this.resumeWaiters.push(() => {
          unsubscribe();
          resolve();
        });
      });
    }
  }

  protected continueAfter(result: CommandResult, options: RunOptions): boolean {
    if (result.critical) return false;
    return options.continueOnError ?? this.defaults.continueOnError;
  }

  private wakeWaiters(): void {
    const waiters = this.resumeWaiters;
    this.resumeWaiters = [];
    for (const wake of waiters) wake();
  }
}
