/**
 * Line Transport
 *
 * Adapts any source that emits 'line' events (a readline interface over a
 * serial port, a socket splitter, the device emulator) plus a write
 * function into a DeviceTransport.
 *
 * Lines that arrive while nobody is waiting are buffered so a device that
 * answers faster than the caller can start awaiting is not missed. The
 * buffer is cleared on every send; a late answer to an earlier command can
 * never acknowledge the next one.
 */

import { EventEmitter } from 'events';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';
import { CancellationToken } from './cancellation';
import { AckResult, DeviceTransport, ResponseClassifier } from './response';

const log = getLogger('LineTransport');

export type LineWriter = (line: string) => boolean | Promise<boolean>;

export interface LineTransportOptions {
  classifier?: ResponseClassifier;
  /** Lines kept while no acknowledgement is awaited */
  bufferSize?: number;
}

type LineWaiter = (line: string) => void;

export class LineTransport implements DeviceTransport {
  private source: EventEmitter;
  private write: LineWriter;
  private classifier: ResponseClassifier;
  private bufferSize: number;
  private pending: string[] = [];
  private waiter: LineWaiter | null = null;
  private connected = true;

  constructor(source: EventEmitter, write: LineWriter, options: LineTransportOptions = {}) {
    this.source = source;
    this.write = write;
    this.classifier = options.classifier ?? new ResponseClassifier();
    this.bufferSize = options.bufferSize ?? 64;

    this.source.on('line', (line: string) => this.handleLine(line));
    this.source.on('close', () => {
      this.connected = false;
      log.warn('Device link closed');
    });
    this.source.on('open', () => {
      this.connected = true;
      log.info('Device link open');
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  async send(command: string): Promise<boolean> {
    if (!this.connected) {
      log.warn(`Cannot send "${command}": not connected`);
      return false;
    }
    this.pending = [];
    try {
      const written = await this.write(command);
      log.debug(`-> ${command}`);
      return written;
    } catch (err) {
      log.error(`Write failed for "${command}": ${errorMessage(err)}`);
      return false;
    }
  }

  awaitAcknowledgement(timeoutMs: number, token?: CancellationToken): Promise<AckResult> {
    while (this.pending.length > 0) {
      const line = this.pending.shift();
      const result = line === undefined ? null : this.match(line);
      if (result) return Promise.resolve(result);
    }
    if (token?.isCancelled) return Promise.resolve({ status: 'cancelled' });

    return new Promise(resolve => {
      let unsubscribe: () => void = () => undefined;

      const finish = (result: AckResult): void => {
        clearTimeout(timer);
        unsubscribe();
        this.waiter = null;
        resolve(result);
      };

      const timer = setTimeout(() => finish({ status: 'timeout' }), timeoutMs);
      if (token) unsubscribe = token.onCancel(() => finish({ status: 'cancelled' }));

      this.waiter = (line: string) => {
        const result = this.match(line);
        if (result) finish(result);
      };
    });
  }

  private handleLine(line: string): void {
    log.debug(`<- ${line}`);
    if (this.waiter) {
      this.waiter(line);
      return;
    }
    this.pending.push(line);
    if (this.pending.length > this.bufferSize) this.pending.shift();
  }

  private match(line: string): AckResult | null {
    switch (this.classifier.classify(line)) {
      case 'success':
        return { status: 'success', response: line };
      case 'error':
        return { status: 'error_keyword', response: line };
      default:
        return null;
    }
  }
}
