/**
 * Command Runner
 *
 * Per-command logic shared by the foreground executor and the background
 * worker. Commands are dispatched through a registry keyed by kind; each
 * handler may refuse a command before it runs (validate) and says whether
 * it still runs inside a suppressed conditional branch.
 *
 * Conditional keywords and stop_if_not run even while suppressed; every
 * other kind is parsed and then skipped.
 */

import { ExecutionConfig } from '../config-schema';
import {
  CancelledError,
  CommandSyntaxError,
  EngineErrorKind,
  StructuralError,
  TransportError,
  createEngineError,
  errorMessage,
  isEngineError,
} from '../errors';
import { FlagSource } from '../flags/flag-store';
import { getLogger } from '../logger';
import { ConditionalContext } from '../sequences/conditional';
import { SequenceParser } from '../sequences/parser';
import { CommandKind, ValidationOutcome } from '../sequences/types';
import { ZoneManager } from '../zones/zone-manager';
import { DispatchResult } from '../zones/types';
import { CancellationToken, sleepWithCancellation } from './cancellation';
import { DeviceTransport } from './response';
import { CommandResult } from './types';

const log = getLogger('Runner');

/** Failures of these kinds always stop a run */
const CRITICAL_KINDS: ReadonlySet<EngineErrorKind> = new Set<EngineErrorKind>(['transport', 'timeout', 'cancelled']);

export const DEFAULT_EXECUTION_CONFIG: ExecutionConfig = {
  waitSliceMs: 100,
  ackTimeoutMs: 5000,
  nestedIf: 'skip',
  continueOnError: false,
};

export interface CommandStep {
  index: number;
  command: string;
  outcome: ValidationOutcome;
}

export interface StepOutcome {
  success: boolean;
  message: string;
  response?: string;
  errorKind?: EngineErrorKind;
  /** Defaults to true for failures whose kind is transport, timeout or cancelled */
  critical?: boolean;
}

export interface CommandHandler {
  /** Runs inside a false conditional branch too */
  runsWhenSuppressed?: boolean;
  /** Refuse the command before it runs; returns the reason */
  validate?(step: CommandStep): string | null;
  process(step: CommandStep): Promise<StepOutcome>;
}

export interface RunnerDependencies {
  parser: SequenceParser;
  transport: DeviceTransport;
  flags: FlagSource;
  zones: ZoneManager;
  token: CancellationToken;
  config?: Partial<ExecutionConfig>;
}

export class CommandRunner {
  readonly conditional: ConditionalContext;
  private parser: SequenceParser;
  private transport: DeviceTransport;
  private zones: ZoneManager;
  private token: CancellationToken;
  private config: ExecutionConfig;
  private handlers: Map<CommandKind, CommandHandler>;

  constructor(deps: RunnerDependencies) {
    this.parser = deps.parser;
    this.transport = deps.transport;
    this.zones = deps.zones;
    this.token = deps.token;
    this.config = { ...DEFAULT_EXECUTION_CONFIG, ...deps.config };
    this.conditional = new ConditionalContext(deps.flags, this.config.nestedIf);
    this.handlers = this.createHandlers();
  }

  reset(): void {
    this.conditional.reset();
  }

  isBalanced(): boolean {
    return this.conditional.isBalanced();
  }

  async run(index: number, command: string): Promise<CommandResult> {
    const started = performance.now();
    const outcome = this.parser.classify(command);
    const finish = (step: StepOutcome, skipped = false): CommandResult => ({
      index,
      command,
      kind: outcome.kind,
      success: step.success,
      skipped,
      message: step.message,
      response: step.response,
      critical: !step.success && (step.critical ?? (step.errorKind !== undefined && CRITICAL_KINDS.has(step.errorKind))),
      errorKind: step.errorKind,
      durationMs: performance.now() - started,
    });

    const handler = this.handlers.get(outcome.kind);
    if (outcome.valid && handler && this.conditional.suppressed && !handler.runsWhenSuppressed) {
      log.debug(`Skipped (false branch): ${command}`);
      return finish({ success: true, message: 'Skipped: inside a false conditional branch' }, true);
    }

    try {
      if (!outcome.valid) {
        throw createEngineError(outcome.errorKind ?? 'syntax', `Command ${index + 1}: ${outcome.error}`, command);
      }
      if (!handler) {
        throw new CommandSyntaxError(`No handler for ${outcome.kind} commands`, command);
      }

      const step: CommandStep = { index, command, outcome };
      const refusal = handler.validate?.(step);
      if (refusal) {
        throw new StructuralError(refusal, command);
      }
      return finish(await handler.process(step));
    } catch (err) {
      if (isEngineError(err)) {
        log.warn(`Command ${index + 1} failed: ${err.message}`);
        const response = err instanceof TransportError ? err.response : undefined;
        return finish({ success: false, message: err.message, response, errorKind: err.kind });
      }
      log.error(`Command ${index + 1} threw: ${errorMessage(err)}`);
      return finish({ success: false, message: errorMessage(err), errorKind: 'transport' });
    }
  }

  /** Send one command and wait for its acknowledgement */
  async dispatch(command: string): Promise<DispatchResult> {
    if (this.token.isCancelled) {
      return { success: false, message: 'Operation cancelled', errorKind: 'cancelled' };
    }
    if (!this.transport.isConnected()) {
      return { success: false, message: 'Device not connected', errorKind: 'transport' };
    }

    let sent: boolean;
    try {
      sent = await this.transport.send(command);
    } catch (err) {
      log.error(`Send failed for "${command}": ${errorMessage(err)}`);
      return { success: false, message: `Send failed: ${errorMessage(err)}`, errorKind: 'transport' };
    }
    if (!sent) {
      return { success: false, message: `Failed to send "${command}"`, errorKind: 'transport' };
    }

    const ack = await this.transport.awaitAcknowledgement(this.config.ackTimeoutMs, this.token);
    switch (ack.status) {
      case 'success':
        return { success: true, message: 'Acknowledged', response: ack.response };
      case 'error_keyword':
        return { success: false, message: `Device reported an error: ${ack.response ?? ''}`, response: ack.response, errorKind: 'transport' };
      case 'timeout':
        return { success: false, message: `No acknowledgement within ${this.config.ackTimeoutMs} ms`, errorKind: 'timeout' };
      case 'cancelled':
        return { success: false, message: 'Operation cancelled', errorKind: 'cancelled' };
    }
  }

  // --- Handlers ---

  private createHandlers(): Map<CommandKind, CommandHandler> {
    const send: CommandHandler = {
      process: ({ command }) => this.send(command.trim()),
    };

    return new Map<CommandKind, CommandHandler>([
      ['regular', send],
      ['tagged', send],
      ['button_ref', send],
      ['sequence_ref', send],
      ['wait', { process: step => this.runWait(step) }],
      ['multizone', {
        validate: ({ outcome }) =>
          outcome.payload.baseCommand !== undefined && this.zones.activeZones().length === 0
            ? `No active zones for "${outcome.payload.baseCommand}"`
            : null,
        process: step => this.runMultizone(step),
      }],
      ['if', {
        runsWhenSuppressed: true,
        process: async ({ outcome }) => {
          const condition = outcome.payload.condition ?? '';
          this.conditional.enterIf(condition);
          const branch = this.conditional.suppressed ? 'skipped' : 'taken';
          return { success: true, message: `if ${condition}: branch ${branch}` };
        },
      }],
      ['else', {
        runsWhenSuppressed: true,
        process: async () => {
          this.conditional.enterElse();
          return { success: true, message: `else: branch ${this.conditional.suppressed ? 'skipped' : 'taken'}` };
        },
      }],
      ['endif', {
        runsWhenSuppressed: true,
        process: async () => {
          this.conditional.exitIf();
          return { success: true, message: 'endif' };
        },
      }],
      ['stop_if_not', {
        runsWhenSuppressed: true,
        process: async ({ outcome }) => {
          const condition = outcome.payload.condition ?? '';
          if (this.conditional.evaluate(condition)) {
            return { success: true, message: `Condition met: ${condition}` };
          }
          log.info(`Run stopped by stop_if_not: ${condition}`);
          return { success: false, critical: true, message: `Stopped by stop_if_not: ${condition}` };
        },
      }],
    ]);
  }

  /** Dispatch and throw the failure as its typed error */
  private async send(command: string): Promise<StepOutcome> {
    const result = await this.dispatch(command);
    if (!result.success) {
      throw createEngineError(result.errorKind ?? 'transport', result.message, command, result.response);
    }
    return { success: true, message: result.message, response: result.response };
  }

  private async runWait({ command, outcome }: CommandStep): Promise<StepOutcome> {
    const seconds = outcome.payload.waitTime ?? 0;
    log.debug(`Waiting ${seconds} s`);
    const completed = await sleepWithCancellation(seconds * 1000, this.token, this.config.waitSliceMs);
    if (!completed) {
      throw new CancelledError('Cancelled during wait', command);
    }
    return { success: true, message: `Waited ${seconds} s` };
  }

  private async runMultizone({ command, outcome }: CommandStep): Promise<StepOutcome> {
    const base = outcome.payload.baseCommand;
    if (base === undefined) {
      return this.send(command.trim());
    }

    const result = await this.zones.fanOut(base, cmd => this.dispatch(cmd), this.token);
    if (!result.success) {
      const message = result.failedCommand ? `${result.message} (while sending "${result.failedCommand}")` : result.message;
      throw createEngineError(result.errorKind ?? 'transport', message, result.failedCommand ?? command, result.response);
    }
    return { success: true, message: result.message, response: result.response };
  }
}
