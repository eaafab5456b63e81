/**
 * Execution barrel exports
 */

export type { RunStatus, TerminalStatus, CommandResult, RunOutcome, RunProgress, RunOptions } from './types';
export type { CancelListener } from './cancellation';
export { CancellationToken, sleepWithCancellation } from './cancellation';
export type { AckStatus, AckResult, DeviceTransport, ResponseClass } from './response';
export { ResponseClassifier, DEFAULT_RESPONSE_KEYWORDS } from './response';
export type { LineWriter, LineTransportOptions } from './line-transport';
export { LineTransport } from './line-transport';
export type { CommandStep, StepOutcome, CommandHandler, RunnerDependencies } from './runner';
export { CommandRunner, DEFAULT_EXECUTION_CONFIG } from './runner';
export type { ExecutorDependencies } from './executor';
export { SequenceExecutor, rejectedOutcome } from './executor';
export type { WorkerRunOptions, StartResult } from './worker';
export { SequenceWorker } from './worker';
