/**
 * DeviceEmulator: in-process stand-in for a serial command device
 *
 * Speaks the same line protocol as the hardware: every written command is
 * logged and answered with one or more lines after an optional latency.
 * Replies can be scripted per command, writes can be made to fail, and the
 * link can be closed and reopened.
 *
 * Emits:
 *   'line'  (line: string)   device output
 *   'open'
 *   'close'
 */

import { EventEmitter } from 'events';
import { getLogger } from '../logger';
import { LineTransport, LineTransportOptions } from '../execution/line-transport';

const log = getLogger('Emulator');

export interface EmulatorLogEntry {
  timestamp: number;
  action: string;
  details: string;
}

/** Lines sent back for a command; null or [] means no answer */
export type EmulatorReply = string | string[] | null;

export interface DeviceEmulatorOptions {
  name?: string;
  /** Delay before replies are emitted */
  latencyMs?: number;
  /** Reply for commands without a scripted one */
  defaultReply?: EmulatorReply;
}

export class DeviceEmulator extends EventEmitter {
  readonly name: string;
  private open = true;
  private latencyMs: number;
  private defaultReply: EmulatorReply;
  private replies: Map<string, EmulatorReply> = new Map();
  private failingWrites: Set<string> = new Set();
  private commands: string[] = [];
  private pendingTimers: Set<ReturnType<typeof setTimeout>> = new Set();
  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize = 200;

  constructor(options: DeviceEmulatorOptions = {}) {
    super();
    this.name = options.name ?? 'device';
    this.latencyMs = options.latencyMs ?? 0;
    this.defaultReply = options.defaultReply === undefined ? 'OK' : options.defaultReply;
  }

  isOpen(): boolean {
    return this.open;
  }

  /** Script the answer to one exact command */
  reply(command: string, response: EmulatorReply): this {
    this.replies.set(command, response);
    return this;
  }

  /** Make writes of this exact command fail */
  failWrites(command: string): this {
    this.failingWrites.add(command);
    return this;
  }

  setDefaultReply(response: EmulatorReply): void {
    this.defaultReply = response;
  }

  write(command: string): boolean {
    if (!this.open) {
      this.record('WriteRejected', `${command} (link closed)`);
      return false;
    }
    if (this.failingWrites.has(command)) {
      this.record('WriteFailed', command);
      return false;
    }

    this.commands.push(command);
    this.record('Command', command);

    const reply = this.replies.has(command) ? this.replies.get(command) : this.defaultReply;
    const lines = reply === null || reply === undefined ? [] : Array.isArray(reply) ? reply : [reply];
    if (lines.length > 0) this.schedule(lines);
    return true;
  }

  /** Push unsolicited device output */
  emitLine(line: string): void {
    this.record('Output', line);
    this.emit('line', line);
  }

  connect(): void {
    this.open = true;
    this.record('Connect', 'Emulator connected (virtual)');
    this.emit('open');
  }

  disconnect(): void {
    this.open = false;
    for (const timer of this.pendingTimers) clearTimeout(timer);
    this.pendingTimers.clear();
    this.record('Disconnect', 'Emulator disconnected');
    this.emit('close');
  }

  /** Commands accepted so far, in order */
  received(): string[] {
    return [...this.commands];
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  clearLog(): void {
    this._log = [];
    this.commands = [];
  }

  /** A DeviceTransport wired to this emulator */
  createTransport(options: LineTransportOptions = {}): LineTransport {
    return new LineTransport(this, line => this.write(line), options);
  }

  private schedule(lines: string[]): void {
    const timer = setTimeout(() => {
      this.pendingTimers.delete(timer);
      for (const line of lines) this.emitLine(line);
    }, this.latencyMs);
    this.pendingTimers.add(timer);
  }

  private record(action: string, details: string): void {
    this._log.push({ timestamp: Date.now(), action, details });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
    log.debug(`[${this.name}] ${action}: ${details}`);
  }
}
