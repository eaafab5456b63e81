/**
 * Sequence Types
 *
 * A sequence is a named, ordered list of command strings written in the
 * device mini-language. Commands may reference other sequences and button
 * macros, open conditional blocks, wait, or fan out over zones.
 */

import type { EngineErrorKind } from '../errors';

/** Every command classifies as exactly one of these */
export type CommandKind =
  | 'regular'
  | 'wait'
  | 'sequence_ref'
  | 'button_ref'
  | 'if'
  | 'else'
  | 'endif'
  | 'stop_if_not'
  | 'multizone'
  | 'tagged'
  | 'unknown';

export const COMMAND_KINDS: readonly CommandKind[] = [
  'regular',
  'wait',
  'sequence_ref',
  'button_ref',
  'if',
  'else',
  'endif',
  'stop_if_not',
  'multizone',
  'tagged',
  'unknown',
];

/** Kinds that open, switch or close a conditional block */
export const CONDITIONAL_KINDS: ReadonlySet<CommandKind> = new Set<CommandKind>(['if', 'else', 'endif']);

/** Parsed arguments of a command; which fields are set depends on the kind */
export interface CommandPayload {
  command?: string;         // regular: the trimmed command text
  waitTime?: number;        // wait: seconds
  condition?: string;       // if / stop_if_not
  params?: string;          // multizone <params>: raw mask parameters
  baseCommand?: string;     // og_multizone-<base>: command fanned out over zones
  sequenceName?: string;    // sequence <name>
  buttonParams?: string;    // button <params>
  tag?: string;             // tagged <tag>
}

/** Result of classifying one command */
export interface ValidationOutcome {
  valid: boolean;
  error: string;
  kind: CommandKind;
  payload: CommandPayload;
  /** Category of the failure, set only when valid is false */
  errorKind?: EngineErrorKind;
}

/** Result of validating a whole command list */
export interface SequenceValidation {
  ok: boolean;
  errors: string[];
}

/** name -> ordered command list */
export type SequenceTable = ReadonlyMap<string, readonly string[]>;

/** name -> single command string */
export type ButtonTable = ReadonlyMap<string, string>;

/** Prefix that marks a command fanned out over all active zones */
export const MULTIZONE_MARKER = 'og_multizone-';
