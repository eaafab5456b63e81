/**
 * Device Responses
 *
 * The transport contract the executors talk to, and the keyword matcher
 * that turns raw device lines into acknowledgements.
 */

import { ResponseKeywords } from '../config-schema';
import { CancellationToken } from './cancellation';

export type AckStatus = 'success' | 'error_keyword' | 'timeout' | 'cancelled';

export interface AckResult {
  status: AckStatus;
  /** Raw line that decided the status */
  response?: string;
}

/** Serial-style device link: one command in flight at a time */
export interface DeviceTransport {
  isConnected(): boolean;
  /** Returns false when the command could not be written */
  send(command: string): boolean | Promise<boolean>;
  /** Wait for the next line carrying a success or error keyword */
  awaitAcknowledgement(timeoutMs: number, token?: CancellationToken): Promise<AckResult>;
}

export type ResponseClass = 'success' | 'error' | 'other';

export const DEFAULT_RESPONSE_KEYWORDS: ResponseKeywords = {
  successKeywords: ['ok', 'complete', 'completed', 'done'],
  errorKeywords: ['err', 'error', 'fail'],
};

export class ResponseClassifier {
  private successKeywords: string[];
  private errorKeywords: string[];

  constructor(keywords: Partial<ResponseKeywords> = {}) {
    const merged = { ...DEFAULT_RESPONSE_KEYWORDS, ...keywords };
    this.successKeywords = merged.successKeywords.map(k => k.toLowerCase());
    this.errorKeywords = merged.errorKeywords.map(k => k.toLowerCase());
  }

  /** Case-insensitive substring match; error keywords win */
  classify(line: string): ResponseClass {
    const text = line.toLowerCase();
    if (this.errorKeywords.some(k => text.includes(k))) return 'error';
    if (this.successKeywords.some(k => text.includes(k))) return 'success';
    return 'other';
  }
}
