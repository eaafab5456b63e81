import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { errorMessage } from './errors';

/**
 * Emit without letting a throwing listener unwind the caller.
 * Listener failures are logged and the emit reports false.
 */
export function emitSafely(emitter: EventEmitter, log: Logger, event: string, ...args: unknown[]): boolean {
  try {
    return emitter.emit(event, ...args);
  } catch (err) {
    log.error(`Listener for '${event}' threw: ${errorMessage(err)}`);
    return false;
  }
}
