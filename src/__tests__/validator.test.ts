import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CommandValidator } from '../sequences/validator';
import { SequenceParser } from '../sequences/parser';

function createTestValidator(maxSequenceLength?: number) {
  return new CommandValidator(new SequenceParser(), maxSequenceLength ? { maxSequenceLength } : {});
}

/** Every list of up to `length` items drawn from `alphabet` */
function allLists(alphabet: string[], length: number): string[][] {
  const lists: string[][] = [[]];
  let frontier: string[][] = [[]];
  for (let n = 0; n < length; n++) {
    const next: string[][] = [];
    for (const prefix of frontier) {
      for (const item of alphabet) next.push([...prefix, item]);
    }
    lists.push(...next);
    frontier = next;
  }
  return lists;
}

describe('CommandValidator', () => {
  it('should accept an empty list', () => {
    assert.deepStrictEqual(createTestValidator().validateSequence([]), { ok: true, errors: [] });
  });

  it('should accept balanced blocks', () => {
    const result = createTestValidator().validateSequence(['if flag:a', 'c', 'else', 'd', 'endif']);
    assert.deepStrictEqual(result, { ok: true, errors: [] });
  });

  it('should report unclosed blocks by their opening index', () => {
    const result = createTestValidator().validateSequence(['c', 'if flag:a', 'if flag:b', 'endif']);
    assert.deepStrictEqual(result, { ok: false, errors: ['Unclosed conditional starting at command 2'] });
  });

  it('should report an endif without an if', () => {
    const result = createTestValidator().validateSequence(['c', 'endif']);
    assert.deepStrictEqual(result.errors, ['Command 2: endif without matching if']);
  });

  it('should report an else without an if', () => {
    const result = createTestValidator().validateSequence(['else']);
    assert.deepStrictEqual(result.errors, ['Command 1: else without matching if']);
  });

  it('should prefix command errors with the 1-based index', () => {
    const result = createTestValidator().validateSequence(['ok', 'wait -1', 'if']);
    assert.deepStrictEqual(result.errors, [
      'Command 2: Wait time cannot be negative',
      'Command 3: Condition cannot be empty',
    ]);
  });

  it('should reject lists over the length limit with a single error', () => {
    const result = createTestValidator(3).validateSequence(['a', 'b', 'c', 'd']);
    assert.deepStrictEqual(result, { ok: false, errors: ['Sequence too long (maximum 3 commands)'] });
  });

  it('should serve repeated lists from the cache', () => {
    const validator = createTestValidator();
    validator.validateSequence(['a', 'b']);
    const second = validator.validateSequence(['a', 'b']);
    assert.strictEqual(second.ok, true);

    const stats = validator.cacheStats();
    assert.strictEqual(stats.hits, 1);
    assert.strictEqual(stats.misses, 1);
  });

  it('should not share cached results between lists that join to the same text', () => {
    const validator = createTestValidator();
    assert.deepStrictEqual(validator.validateSequence(['if flag:a', 'endif']), { ok: true, errors: [] });
    assert.deepStrictEqual(validator.validateSequence(['if flag:a\nendif']), {
      ok: false,
      errors: ['Unclosed conditional starting at command 1'],
    });
  });

  it('should fail exactly when an if or endif is unmatched', () => {
    const validator = createTestValidator();
    for (const list of allLists(['if flag:a', 'endif', 'c'], 6)) {
      let depth = 0;
      let balanced = true;
      for (const command of list) {
        if (command === 'if flag:a') depth++;
        if (command === 'endif') {
          if (depth === 0) balanced = false;
          else depth--;
        }
      }
      balanced = balanced && depth === 0;
      assert.strictEqual(validator.validateSequence(list).ok, balanced, list.join(' | '));
    }
  });

  it('should report references to unknown sequences and buttons', () => {
    const errors = createTestValidator().validateReferences(
      ['sequence known', 'sequence ghost', 'button power', 'button nope', 'plain'],
      new Map([['known', ['x']]]),
      new Map([['power', 'PWR']]),
    );
    assert.deepStrictEqual(errors, [
      "Command 2: unknown sequence 'ghost'",
      "Command 4: unknown button 'nope'",
    ]);
  });
});
