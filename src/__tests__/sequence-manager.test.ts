import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as delay } from 'node:timers/promises';
import { SequenceManager } from '../sequences/manager';
import { DeviceEmulator } from '../emulators/device-emulator';
import { FlagStore } from '../flags/flag-store';
import { RunOutcome } from '../execution/types';

// --- Test helpers ---

function createTestManager(flags: Record<string, boolean> = {}) {
  const device = new DeviceEmulator();
  const store = new FlagStore(flags);
  const manager = new SequenceManager({
    transport: device.createTransport(),
    flags: store,
    config: { execution: { ackTimeoutMs: 200, waitSliceMs: 20 } },
  });
  return { manager, device, store };
}

// --- Tests ---

describe('SequenceManager', () => {
  describe('Sequences', () => {
    it('should store a valid sequence and hand out copies', () => {
      const { manager } = createTestManager();

      assert.deepStrictEqual(manager.addSequence('intro', ['power on', 'wait 2']), { ok: true, errors: [] });
      const copy = manager.getSequence('intro');
      copy?.push('mutated');

      assert.deepStrictEqual(manager.getSequence('intro'), ['power on', 'wait 2']);
      assert.deepStrictEqual(manager.getAllSequences(), { intro: ['power on', 'wait 2'] });
    });

    it('should reject an invalid sequence without storing it', () => {
      const { manager } = createTestManager();

      assert.deepStrictEqual(manager.addSequence('broken', ['if ready', 'a']), {
        ok: false,
        errors: ['Unclosed conditional starting at command 1'],
      });
      assert.strictEqual(manager.getSequence('broken'), undefined);
    });

    it('should reject an empty sequence and a blank name', () => {
      const { manager } = createTestManager();

      assert.deepStrictEqual(manager.addSequence('empty', []), {
        ok: false,
        errors: ["Sequence 'empty' has no commands"],
      });
      assert.deepStrictEqual(manager.addSequence(' padded', ['a']), {
        ok: false,
        errors: ["Invalid sequence name ' padded'"],
      });
    });

    it('should load a batch and report the entries it skipped', () => {
      const { manager } = createTestManager();

      const result = manager.loadSequences({ a: ['x'], b: ['else'], '': ['y'] });

      assert.deepStrictEqual(result, {
        loaded: 1,
        errors: ['b: Command 1: else without matching if', "Invalid sequence name ''"],
      });
      assert.deepStrictEqual(Object.keys(manager.getAllSequences()), ['a']);
    });

    it('should keep validation results apart for lists that join to the same text', () => {
      const { manager } = createTestManager();

      assert.deepStrictEqual(manager.addSequence('x', ['if flag:a', 'endif']), { ok: true, errors: [] });
      assert.deepStrictEqual(manager.addSequence('y', ['if flag:a\nendif']), {
        ok: false,
        errors: ['Unclosed conditional starting at command 1'],
      });
      assert.strictEqual(manager.getSequence('y'), undefined);
    });

    it('should report whether a removal found the sequence', () => {
      const { manager } = createTestManager();
      manager.addSequence('a', ['x']);

      assert.strictEqual(manager.removeSequence('a'), true);
      assert.strictEqual(manager.removeSequence('a'), false);
    });
  });

  describe('Buttons', () => {
    it('should substitute a button and forget it once removed', () => {
      const { manager } = createTestManager();
      assert.deepStrictEqual(manager.addButton('mute', 'mute all'), { ok: true, errors: [] });
      manager.addSequence('quiet', ['button mute', 'mute']);

      assert.deepStrictEqual(manager.expand('quiet'), ['mute all', 'mute all']);

      manager.removeButton('mute');
      assert.deepStrictEqual(manager.expand('quiet'), ['button mute', 'mute']);
      assert.strictEqual(manager.getButton('mute'), undefined);
    });

    it('should reject a button whose command does not parse', () => {
      const { manager } = createTestManager();

      const result = manager.addButton('pause', 'wait -1');

      assert.deepStrictEqual(result, { ok: false, errors: ["Button 'pause': Wait time cannot be negative"] });
      assert.deepStrictEqual(manager.getAllButtons(), {});
    });

    it('should load a batch of buttons and report the entries it skipped', () => {
      const { manager } = createTestManager();
      manager.addSequence('quiet', ['mute']);

      const result = manager.loadButtons({ mute: 'mute all', bad: 'wait -1', '': 'x' });

      assert.deepStrictEqual(result, {
        loaded: 1,
        errors: ["Button 'bad': Wait time cannot be negative", "Invalid button name ''"],
      });
      assert.deepStrictEqual(manager.getAllButtons(), { mute: 'mute all' });
      assert.deepStrictEqual(manager.expand('quiet'), ['mute all']);
    });
  });

  describe('Expansion cache', () => {
    it('should follow a redefined sub-sequence', () => {
      const { manager } = createTestManager();
      manager.addSequence('inner', ['a']);
      manager.addSequence('outer', ['inner', 'b']);
      assert.deepStrictEqual(manager.expand('outer'), ['a', 'b']);

      manager.addSequence('inner', ['c', 'd']);

      assert.deepStrictEqual(manager.expand('outer'), ['c', 'd', 'b']);
    });

    it('should never serve a stale expansion after a removal', () => {
      const { manager } = createTestManager();
      manager.addSequence('inner', ['a']);
      manager.addSequence('outer', ['inner', 'b']);
      assert.deepStrictEqual(manager.expand('outer'), ['a', 'b']);

      manager.removeSequence('inner');

      assert.deepStrictEqual(manager.expand('outer'), ['inner', 'b']);
    });

    it('should pick up a sequence defined after the first lookup', () => {
      const { manager } = createTestManager();
      manager.addSequence('outer', ['later', 'b']);
      assert.deepStrictEqual(manager.expand('outer'), ['later', 'b']);

      manager.addSequence('later', ['x']);

      assert.deepStrictEqual(manager.expand('outer'), ['x', 'b']);
    });

    it('should count repeated expansions as cache hits', () => {
      const { manager } = createTestManager();
      manager.addSequence('a', ['x']);
      manager.expand('a');
      manager.expand('a');

      const expandStats = manager.getStatistics().caches.find(c => c.name === 'expand');
      assert.strictEqual(expandStats?.hits, 1);
      assert.strictEqual(expandStats?.misses, 1);
    });
  });

  describe('validate', () => {
    it('should report an unknown name', () => {
      const { manager } = createTestManager();
      assert.deepStrictEqual(manager.validate('nope'), { ok: false, errors: ["Unknown sequence 'nope'"] });
    });

    it('should report references to unknown sequences until they exist', () => {
      const { manager } = createTestManager();
      manager.addSequence('show', ['sequence ghost', 'x']);

      assert.deepStrictEqual(manager.validate('show'), {
        ok: false,
        errors: ["Command 1: unknown sequence 'ghost'"],
      });

      manager.addSequence('ghost', ['y']);
      assert.deepStrictEqual(manager.validate('show'), { ok: true, errors: [] });
    });

    it('should report a reference cycle', () => {
      const { manager } = createTestManager();
      manager.addSequence('a', ['b']);
      manager.addSequence('b', ['a']);

      assert.deepStrictEqual(manager.validate('a'), {
        ok: false,
        errors: ["Sequence 'a' is part of a reference cycle"],
      });
    });
  });

  describe('Search', () => {
    it('should search the stored sequences and buttons', () => {
      const { manager } = createTestManager();
      manager.addSequence('intro', ['power on', 'volume 5']);
      manager.addButton('power', 'power on');

      assert.deepStrictEqual(manager.search('power on', 'exact'), ['button:power', 'intro']);
      assert.deepStrictEqual(manager.searchByKeyword('volume'), ['intro']);
      assert.deepStrictEqual(manager.suggestions('vo'), ['volume 5', 'volume']);

      manager.removeSequence('intro');
      assert.deepStrictEqual(manager.search('power on', 'exact'), ['button:power']);
      assert.deepStrictEqual(manager.searchByKind('regular'), ['button:power']);
    });
  });

  describe('sequenceInfo', () => {
    it('should summarize kinds, duration and complexity', () => {
      const { manager } = createTestManager();
      manager.addSequence('intro', ['power on', 'wait 2', 'if ready', 'volume 5', 'endif', 'og_multizone-mute']);

      assert.deepStrictEqual(manager.sequenceInfo('intro'), {
        name: 'intro',
        commandCount: 6,
        valid: true,
        errors: [],
        kinds: { regular: 2, wait: 1, if: 1, endif: 1, multizone: 1 },
        estimatedDurationSeconds: 2.5,
        complexityScore: 9,
      });
    });

    it('should return null for an unknown sequence', () => {
      const { manager } = createTestManager();
      assert.strictEqual(manager.sequenceInfo('nope'), null);
    });
  });

  describe('Execution', () => {
    it('should run a stored sequence with its references expanded', async () => {
      const { manager, device } = createTestManager();
      manager.addSequence('warmup', ['power on', 'wait 0.02']);
      manager.addSequence('show', ['warmup', 'if ready', 'volume 5', 'endif', 'power off']);

      const outcome = await manager.execute('show');

      assert.strictEqual(outcome.status, 'completed');
      assert.strictEqual(outcome.message, 'Completed 6 commands');
      assert.deepStrictEqual(device.received(), ['power on', 'power off']);
    });

    it('should take the branch when the flag is set', async () => {
      const { manager, device } = createTestManager({ ready: true });

      await manager.execute(['if ready', 'volume 5', 'else', 'volume 0', 'endif']);

      assert.deepStrictEqual(device.received(), ['volume 5']);
    });

    it('should read flags changed through the manager', async () => {
      const { manager, device, store } = createTestManager();

      manager.setFlag('ready', true);
      await manager.execute(['if ready', 'go', 'endif']);

      assert.strictEqual(store.getFlag('ready'), true);
      assert.strictEqual(manager.getFlag('ready'), true);
      assert.deepStrictEqual(device.received(), ['go']);
    });

    it('should expand references inside a command list', async () => {
      const { manager, device } = createTestManager();
      manager.addSequence('warmup', ['power on']);
      manager.addButton('mute', 'mute all');

      const outcome = await manager.execute(['warmup', 'mute', 'go']);

      assert.strictEqual(outcome.status, 'completed');
      assert.deepStrictEqual(device.received(), ['power on', 'mute all', 'go']);
    });

    it('should fan a marked command out over the active zones', async () => {
      const { manager, device } = createTestManager();
      assert.deepStrictEqual(manager.setZones([3, 1]), { ok: true });

      const outcome = await manager.execute(['og_multizone-mute']);

      assert.strictEqual(outcome.status, 'completed');
      assert.deepStrictEqual(device.received(), ['multizone 0001', 'mute', 'multizone 0100', 'mute']);
      assert.deepStrictEqual(manager.getZoneStatuses(), [
        { id: 1, status: 'completed', progress: 1 },
        { id: 2, status: 'inactive', progress: 0 },
        { id: 3, status: 'completed', progress: 1 },
        { id: 4, status: 'inactive', progress: 0 },
      ]);
    });

    it('should reject an invalid zone selection', () => {
      const { manager } = createTestManager();
      const errors: string[] = [];
      manager.on('error', (message: string) => errors.push(message));

      assert.deepStrictEqual(manager.setZones([1, 5]), { ok: false, error: 'Invalid zone 5 (zones are 1-4)' });
      assert.deepStrictEqual(errors, ['Invalid zone 5 (zones are 1-4)']);
    });

    it('should refuse an unknown sequence without sending anything', async () => {
      const { manager, device } = createTestManager();
      const errors: string[] = [];
      manager.on('error', (message: string) => errors.push(message));

      const outcome = await manager.execute('ghost');

      assert.deepStrictEqual(outcome, {
        status: 'failed',
        success: false,
        message: "Unknown sequence 'ghost'",
        errorKind: 'structural',
        results: [],
      });
      assert.deepStrictEqual(errors, ["Unknown sequence 'ghost'"]);
      assert.deepStrictEqual(device.received(), []);
    });

    it('should refuse a cyclic sequence', async () => {
      const { manager, device } = createTestManager();
      manager.addSequence('a', ['x', 'b']);
      manager.addSequence('b', ['a']);

      const outcome = await manager.execute('a');

      assert.strictEqual(outcome.status, 'failed');
      assert.strictEqual(outcome.message, "'a' is part of a reference cycle");
      assert.deepStrictEqual(device.received(), []);
    });

    it('should validate a command list before sending any of it', async () => {
      const { manager, device } = createTestManager();

      const outcome = await manager.execute(['go', 'wait -1']);

      assert.strictEqual(outcome.message, 'Validation failed: Command 2: Wait time cannot be negative');
      assert.strictEqual(outcome.errorKind, 'range');
      assert.deepStrictEqual(device.received(), []);
    });

    it('should refuse an unbalanced command list as structural', async () => {
      const { manager } = createTestManager();

      const outcome = await manager.execute(['if ready', 'go']);

      assert.strictEqual(outcome.message, 'Validation failed: Unclosed conditional starting at command 1');
      assert.strictEqual(outcome.errorKind, 'structural');
    });

    it('should allow one run at a time', async () => {
      const { manager } = createTestManager();

      const first = manager.execute(['wait 0.05', 'go']);
      const second = await manager.execute(['other']);

      assert.strictEqual(second.message, 'A sequence is already running');
      assert.strictEqual((await first).status, 'completed');
    });

    it('should hand a foreground outcome to onComplete', async () => {
      const { manager } = createTestManager();
      const seen: RunOutcome[] = [];

      const outcome = await manager.execute(['a'], { onComplete: o => seen.push(o) });

      assert.strictEqual(seen.length, 1);
      assert.strictEqual(seen[0], outcome);
    });

    it('should announce the start and finish of a named run', async () => {
      const { manager } = createTestManager();
      manager.addSequence('intro', ['a', 'b']);
      const started: unknown[] = [];
      const finished: [RunOutcome, string | null][] = [];
      manager.on('sequence-started', (info: unknown) => started.push(info));
      manager.on('sequence-finished', (outcome: RunOutcome, name: string | null) => finished.push([outcome, name]));

      await manager.execute('intro');

      assert.deepStrictEqual(started, [{ name: 'intro', total: 2, async: false }]);
      assert.strictEqual(finished.length, 1);
      assert.strictEqual(finished[0][0].status, 'completed');
      assert.strictEqual(finished[0][1], 'intro');
    });
  });

  describe('Background runs', () => {
    it('should pause, resume and report progress', async () => {
      const { manager, device } = createTestManager();
      const events: string[] = [];
      manager.on('paused', () => events.push('paused'));
      manager.on('resumed', () => events.push('resumed'));

      const run = manager.execute(['a', 'wait 0.02', 'b'], { async: true });
      assert.strictEqual(manager.pause(), true);
      await delay(60);

      assert.deepStrictEqual(device.received(), ['a']);
      assert.strictEqual(manager.getProgress().status, 'paused');

      manager.resume();
      const outcome = await run;

      assert.strictEqual(outcome.status, 'completed');
      assert.deepStrictEqual(device.received(), ['a', 'b']);
      assert.deepStrictEqual(manager.getProgress(), { current: 3, total: 3, status: 'completed' });
      assert.strictEqual(manager.getResults().length, 3);
      assert.deepStrictEqual(events, ['paused', 'resumed']);
    });

    it('should cancel a long wait', async () => {
      const { manager } = createTestManager();

      const run = manager.execute(['wait 10'], { async: true });
      await delay(30);
      assert.strictEqual(manager.isRunning(), true);
      assert.strictEqual(manager.cancel(), true);

      const outcome = await run;
      assert.strictEqual(outcome.status, 'cancelled');
      assert.strictEqual(manager.isRunning(), false);
    });

    it('should not pause a foreground run', async () => {
      const { manager } = createTestManager();

      const run = manager.execute(['wait 0.02']);
      assert.strictEqual(manager.pause(), false);
      await run;
    });
  });

  it('should build a response classifier from the configured keywords', () => {
    const device = new DeviceEmulator();
    const manager = new SequenceManager({
      transport: device.createTransport(),
      config: { responses: { successKeywords: ['ready'] } },
    });

    const classifier = manager.createResponseClassifier();
    assert.strictEqual(classifier.classify('READY now'), 'success');
    assert.strictEqual(classifier.classify('OK'), 'other');
    assert.strictEqual(classifier.classify('fail'), 'error');
  });

  it('should count runs and commands', async () => {
    const { manager } = createTestManager();

    await manager.execute(['a', 'if ready', 'b', 'endif']);
    await manager.execute('ghost');

    const stats = manager.getStatistics();
    assert.deepStrictEqual(stats.runs, { started: 1, completed: 1, failed: 0, cancelled: 0 });
    assert.deepStrictEqual(stats.commands, { executed: 3, failed: 0, skipped: 1 });
    assert.strictEqual(stats.successRate, 1);
  });
});
