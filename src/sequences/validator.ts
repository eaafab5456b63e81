/**
 * Structural validation of command lists.
 *
 * Classifies every command and checks that conditional blocks balance.
 * Results are pure functions of the list (and the parser limits), so they
 * are cached by list content until the limits change.
 */

import { ResultCache, CacheStats } from '../cache/result-cache';
import { getLogger } from '../logger';
import { SequenceParser } from './parser';
import { ButtonTable, SequenceTable, SequenceValidation } from './types';

const log = getLogger('Validator');

export interface ValidatorOptions {
  maxSequenceLength: number;
  cacheCapacity: number;
}

const DEFAULT_OPTIONS: ValidatorOptions = {
  maxSequenceLength: 10000,
  cacheCapacity: 10000,
};

export class CommandValidator {
  private parser: SequenceParser;
  private options: ValidatorOptions;
  private cache: ResultCache<SequenceValidation>;

  constructor(parser: SequenceParser, options: Partial<ValidatorOptions> = {}) {
    this.parser = parser;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.cache = new ResultCache(this.options.cacheCapacity, 'validate');
  }

  get maxSequenceLength(): number {
    return this.options.maxSequenceLength;
  }

  validateSequence(commands: readonly string[]): SequenceValidation {
    if (commands.length > this.options.maxSequenceLength) {
      return {
        ok: false,
        errors: [`Sequence too long (maximum ${this.options.maxSequenceLength} commands)`],
      };
    }

    const key = JSON.stringify(commands);
    const cached = this.cache.get(key);
    if (cached) return { ok: cached.ok, errors: [...cached.errors] };

    const result = this.check(commands);
    this.cache.set(key, result);
    if (!result.ok) {
      log.debug(`Sequence rejected with ${result.errors.length} error(s)`);
    }
    return { ok: result.ok, errors: [...result.errors] };
  }

  /** Explicit `sequence <name>` / `button <name>` references to unknown names */
  validateReferences(commands: readonly string[], sequences: SequenceTable, buttons: ButtonTable): string[] {
    const errors: string[] = [];
    commands.forEach((command, i) => {
      const outcome = this.parser.classify(command);
      if (!outcome.valid) return;

      const sequenceName = outcome.payload.sequenceName;
      if (outcome.kind === 'sequence_ref' && sequenceName && !sequences.has(sequenceName)) {
        errors.push(`Command ${i + 1}: unknown sequence '${sequenceName}'`);
      }
      const buttonName = outcome.payload.buttonParams;
      if (outcome.kind === 'button_ref' && buttonName && !buttons.has(buttonName)) {
        errors.push(`Command ${i + 1}: unknown button '${buttonName}'`);
      }
    });
    return errors;
  }

  /** Cached results depend on parser limits; call after changing them */
  clearCache(): void {
    this.cache.clear();
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  private check(commands: readonly string[]): SequenceValidation {
    const errors: string[] = [];
    const openIfs: number[] = [];

    commands.forEach((command, i) => {
      const position = i + 1;
      const outcome = this.parser.classify(command);
      if (!outcome.valid) {
        errors.push(`Command ${position}: ${outcome.error}`);
        return;
      }

      switch (outcome.kind) {
        case 'if':
          openIfs.push(position);
          break;
        case 'else':
          if (openIfs.length === 0) {
            errors.push(`Command ${position}: else without matching if`);
          }
          break;
        case 'endif':
          if (openIfs.pop() === undefined) {
            errors.push(`Command ${position}: endif without matching if`);
          }
          break;
        default:
          break;
      }
    });

    for (const position of openIfs) {
      errors.push(`Unclosed conditional starting at command ${position}`);
    }

    return { ok: errors.length === 0, errors };
  }
}
