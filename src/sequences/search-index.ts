/**
 * Search Index
 *
 * Inverted indexes over every stored sequence and button:
 *   command text -> owners
 *   kind         -> owners
 *   keyword      -> owners   (lowercase words, non-word characters stripped, length >= 2)
 *   pattern      -> owners   (wait_numeric, if_flag, multizone_command)
 *
 * Owners are sequence names, and `button:<name>` for buttons. The index is
 * rebuilt whole after every mutation and the search cache is cleared with
 * it. Results are sorted so repeated searches return the same order.
 */

import { CacheStats, ResultCache } from '../cache/result-cache';
import { getLogger } from '../logger';
import { SequenceParser } from './parser';
import { ButtonTable, CommandKind, SequenceTable } from './types';

const log = getLogger('SearchIndex');

export type SearchMode = 'exact' | 'contains' | 'starts_with' | 'keyword' | 'full_text';

export const SEARCH_MODES: readonly SearchMode[] = ['exact', 'contains', 'starts_with', 'keyword', 'full_text'];

export const BUTTON_OWNER_PREFIX = 'button:';

export interface IndexStats {
  commands: number;
  kinds: number;
  keywords: number;
  patterns: number;
  owners: number;
  searches: number;
  cache: CacheStats;
}

const MIN_KEYWORD_LENGTH = 2;
const NON_WORD = /[^A-Za-z0-9_]/g;

type Postings = Map<string, Set<string>>;

function post<K>(index: Map<K, Set<string>>, key: K, owner: string): void {
  const owners = index.get(key);
  if (owners) {
    owners.add(owner);
  } else {
    index.set(key, new Set([owner]));
  }
}

/** Lowercase words of a command, stripped of non-word characters */
export function extractKeywords(command: string): Set<string> {
  const keywords = new Set<string>();
  for (const word of command.toLowerCase().split(/\s+/)) {
    const clean = word.replace(NON_WORD, '');
    if (clean.length >= MIN_KEYWORD_LENGTH) keywords.add(clean);
  }
  return keywords;
}

export class SearchIndex {
  private parser: SequenceParser;
  private commands: Postings = new Map();
  private kinds: Map<CommandKind, Set<string>> = new Map();
  private keywords: Postings = new Map();
  private patterns: Postings = new Map();
  private owners: Set<string> = new Set();
  private cache: ResultCache<string[]>;
  private searches = 0;

  constructor(parser: SequenceParser, cacheCapacity = 1000) {
    this.parser = parser;
    this.cache = new ResultCache(cacheCapacity, 'search');
  }

  rebuild(sequences: SequenceTable, buttons: ButtonTable): void {
    this.commands = new Map();
    this.kinds = new Map();
    this.keywords = new Map();
    this.patterns = new Map();
    this.owners = new Set();
    this.cache.clear();

    for (const [name, commands] of sequences) {
      for (const command of commands) this.indexCommand(name, command, true);
    }
    for (const [name, command] of buttons) {
      this.indexCommand(`${BUTTON_OWNER_PREFIX}${name}`, command, false);
    }
    log.debug(`Index rebuilt: ${this.commands.size} commands, ${this.keywords.size} keywords, ${this.owners.size} owners`);
  }

  search(query: string, mode: SearchMode = 'contains', maxResults = 100): string[] {
    const text = query.trim();
    if (text.length === 0 || maxResults <= 0) return [];

    this.searches++;
    const key = `${mode}:${maxResults}:${text}`;
    const cached = this.cache.get(key);
    if (cached) return [...cached];

    const results = this.execute(text, mode, maxResults);
    this.cache.set(key, results);
    return [...results];
  }

  searchByKind(kind: CommandKind): string[] {
    return sorted(this.kinds.get(kind));
  }

  searchByKeyword(keyword: string): string[] {
    return sorted(this.keywords.get(keyword.trim().toLowerCase()));
  }

  /** Commands, then keywords, starting with `prefix` (at least two characters) */
  suggestions(prefix: string, maxSuggestions = 10): string[] {
    const partial = prefix.trim().toLowerCase();
    if (partial.length < MIN_KEYWORD_LENGTH) return [];

    const found: string[] = [];
    for (const source of [this.commands, this.keywords]) {
      const matches = Array.from(source.keys())
        .filter(candidate => candidate.toLowerCase().startsWith(partial))
        .sort();
      for (const match of matches) {
        if (found.length >= maxSuggestions) return found;
        if (!found.includes(match)) found.push(match);
      }
    }
    return found.slice(0, maxSuggestions);
  }

  clearCache(): void {
    this.cache.clear();
  }

  stats(): IndexStats {
    return {
      commands: this.commands.size,
      kinds: this.kinds.size,
      keywords: this.keywords.size,
      patterns: this.patterns.size,
      owners: this.owners.size,
      searches: this.searches,
      cache: this.cache.stats(),
    };
  }

  // --- Internal ---

  private indexCommand(owner: string, command: string, withPatterns: boolean): void {
    const text = command.trim();
    const outcome = this.parser.classify(text);

    this.owners.add(owner);
    post(this.commands, text, owner);
    post(this.kinds, outcome.kind, owner);
    for (const keyword of extractKeywords(text)) post(this.keywords, keyword, owner);

    if (!withPatterns || !outcome.valid) return;
    if (outcome.kind === 'wait') post(this.patterns, 'wait_numeric', owner);
    if (outcome.kind === 'if' && outcome.payload.condition && !/\s/.test(outcome.payload.condition)) {
      post(this.patterns, 'if_flag', owner);
    }
    if (outcome.kind === 'multizone' && outcome.payload.baseCommand) {
      post(this.patterns, 'multizone_command', owner);
    }
  }

  private execute(text: string, mode: SearchMode, maxResults: number): string[] {
    const lower = text.toLowerCase();
    const results = new Set<string>();
    const collect = (index: Postings, match: (key: string) => boolean): void => {
      for (const [key, owners] of index) {
        if (match(key)) owners.forEach(owner => results.add(owner));
      }
    };

    switch (mode) {
      case 'exact':
        this.commands.get(text)?.forEach(owner => results.add(owner));
        break;
      case 'contains':
        collect(this.commands, key => key.toLowerCase().includes(lower));
        break;
      case 'starts_with':
        collect(this.commands, key => key.toLowerCase().startsWith(lower));
        break;
      case 'keyword':
        this.keywords.get(lower)?.forEach(owner => results.add(owner));
        break;
      case 'full_text':
        collect(this.commands, key => key.toLowerCase().includes(lower));
        collect(this.keywords, key => key.includes(lower));
        collect(this.patterns, key => key.includes(lower));
        break;
    }

    return sorted(results).slice(0, maxResults);
  }
}

function sorted(owners: Set<string> | undefined): string[] {
  return owners ? Array.from(owners).sort() : [];
}
