/**
 * Sequence Engine Errors
 *
 * Every failure the engine reports falls into one of these kinds.
 * Syntax, range and structural errors surface at validation time;
 * timeout, transport and cancellation errors surface while a run is in flight.
 */

export type EngineErrorKind =
  | 'syntax'
  | 'range'
  | 'timeout'
  | 'structural'
  | 'transport'
  | 'cancelled';

export abstract class SequenceEngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  /** Offending command text, when the error belongs to one command */
  readonly command?: string;

  constructor(message: string, command?: string) {
    super(message);
    this.name = new.target.name;
    this.command = command;
  }
}

/** Unrecognized or malformed command */
export class CommandSyntaxError extends SequenceEngineError {
  readonly kind = 'syntax' as const;
}

/** Numeric argument outside its allowed bounds */
export class CommandRangeError extends SequenceEngineError {
  readonly kind = 'range' as const;
}

/** Scan budget, acknowledgement or run timeout exceeded */
export class SequenceTimeoutError extends SequenceEngineError {
  readonly kind = 'timeout' as const;
}

/** Unbalanced conditional blocks, unknown references, bad zone selection */
export class StructuralError extends SequenceEngineError {
  readonly kind = 'structural' as const;
}

/** Device could not be reached, refused a command or answered with an error */
export class TransportError extends SequenceEngineError {
  readonly kind = 'transport' as const;

  /** Raw device response that triggered the failure, if any */
  readonly response?: string;

  constructor(message: string, command?: string, response?: string) {
    super(message, command);
    this.response = response;
  }
}

/** The run was cancelled on request */
export class CancelledError extends SequenceEngineError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'Operation cancelled', command?: string) {
    super(message, command);
  }
}

/** Build the error class for a kind; `response` is kept on transport errors */
export function createEngineError(
  kind: EngineErrorKind,
  message: string,
  command?: string,
  response?: string,
): SequenceEngineError {
  switch (kind) {
    case 'syntax':
      return new CommandSyntaxError(message, command);
    case 'range':
      return new CommandRangeError(message, command);
    case 'timeout':
      return new SequenceTimeoutError(message, command);
    case 'structural':
      return new StructuralError(message, command);
    case 'transport':
      return new TransportError(message, command, response);
    case 'cancelled':
      return new CancelledError(message, command);
  }
}

export function isEngineError(err: unknown): err is SequenceEngineError {
  return err instanceof SequenceEngineError;
}

/** Message text of anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
