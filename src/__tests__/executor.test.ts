import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as delay } from 'node:timers/promises';
import { SequenceExecutor } from '../execution/executor';
import { SequenceParser } from '../sequences/parser';
import { FlagStore } from '../flags/flag-store';
import { ZoneManager } from '../zones/zone-manager';
import { DeviceEmulator } from '../emulators/device-emulator';

// --- Test helpers ---

function createTestExecutor(flags: Record<string, boolean> = {}) {
  const device = new DeviceEmulator();
  const zones = new ZoneManager();
  const executor = new SequenceExecutor({
    parser: new SequenceParser(),
    transport: device.createTransport(),
    flags: new FlagStore(flags),
    zones,
    config: { ackTimeoutMs: 200, waitSliceMs: 20 },
  });
  return { executor, device, zones };
}

// --- Tests ---

describe('SequenceExecutor', () => {
  describe('Dispatch', () => {
    it('should send every command and wait in between', async () => {
      const { executor, device } = createTestExecutor();

      const outcome = await executor.execute(['power on', 'wait 0.05', 'volume 5']);

      assert.strictEqual(outcome.status, 'completed');
      assert.strictEqual(outcome.success, true);
      assert.strictEqual(outcome.message, 'Completed 3 commands');
      assert.strictEqual(outcome.results.length, 3);
      assert.deepStrictEqual(device.received(), ['power on', 'volume 5']);
      assert.strictEqual(outcome.results[0].response, 'OK');
      assert.strictEqual(executor.status, 'completed');
    });

    it('should stop at a device error and report the raw response', async () => {
      const { executor, device } = createTestExecutor();
      device.reply('bad', 'ERROR 42');

      const outcome = await executor.execute(['ok', 'bad', 'never']);

      assert.strictEqual(outcome.status, 'failed');
      assert.strictEqual(outcome.failedCommand, 'bad');
      assert.strictEqual(outcome.response, 'ERROR 42');
      assert.strictEqual(outcome.errorKind, 'transport');
      assert.strictEqual(outcome.message, 'Device reported an error: ERROR 42');
      assert.deepStrictEqual(device.received(), ['ok', 'bad']);
    });

    it('should fail a command that is never acknowledged', async () => {
      const { executor, device } = createTestExecutor();
      device.reply('silent', null);

      const outcome = await executor.execute(['silent']);

      assert.strictEqual(outcome.errorKind, 'timeout');
      assert.strictEqual(outcome.message, 'No acknowledgement within 200 ms');
      assert.strictEqual(outcome.results[0].critical, true);
    });

    it('should fail when the device is disconnected', async () => {
      const { executor, device } = createTestExecutor();
      device.disconnect();

      const outcome = await executor.execute(['x']);

      assert.strictEqual(outcome.message, 'Device not connected');
      assert.strictEqual(outcome.errorKind, 'transport');
    });
  });

  describe('Conditionals', () => {
    it('should dispatch only the taken branch', async () => {
      const { executor, device } = createTestExecutor({ a: true });

      const outcome = await executor.execute(['if flag:a', 'x', 'else', 'y', 'endif', 'z']);

      assert.strictEqual(outcome.success, true);
      assert.deepStrictEqual(device.received(), ['x', 'z']);
      assert.strictEqual(outcome.results[3].skipped, true);
      assert.strictEqual(outcome.results[3].success, true);
    });

    it('should keep an inner branch suppressed under a false outer one', async () => {
      const { executor, device } = createTestExecutor({ a: true });

      const outcome = await executor.execute(['if flag:no', 'if flag:a', 'x', 'endif', 'y', 'endif', 'z']);

      assert.strictEqual(outcome.success, true);
      assert.deepStrictEqual(device.received(), ['z']);
    });

    it('should stop the run when stop_if_not is false', async () => {
      const { executor, device } = createTestExecutor();

      const outcome = await executor.execute(['a', 'stop_if_not flag:ready', 'b']);

      assert.strictEqual(outcome.status, 'failed');
      assert.strictEqual(outcome.message, 'Stopped by stop_if_not: flag:ready');
      assert.strictEqual(outcome.failedCommand, 'stop_if_not flag:ready');
      assert.deepStrictEqual(device.received(), ['a']);
    });

    it('should check stop_if_not inside a suppressed branch too', async () => {
      const { executor, device } = createTestExecutor();

      const outcome = await executor.execute(['if flag:no', 'stop_if_not flag:no', 'endif', 'b']);

      assert.strictEqual(outcome.status, 'failed');
      assert.deepStrictEqual(device.received(), []);
    });

    it('should fail a run that ends inside an open block', async () => {
      const { executor } = createTestExecutor({ a: true });

      const outcome = await executor.execute(['if flag:a', 'x']);

      assert.strictEqual(outcome.status, 'failed');
      assert.strictEqual(outcome.message, 'Run ended with 1 unclosed conditional block(s)');
      assert.strictEqual(outcome.errorKind, 'structural');
    });

    it('should stop at an else without an if', async () => {
      const { executor, device } = createTestExecutor();

      const outcome = await executor.execute(['x', 'else', 'y']);

      assert.strictEqual(outcome.message, 'else without matching if');
      assert.strictEqual(outcome.errorKind, 'structural');
      assert.strictEqual(outcome.results[1].critical, false);
      assert.deepStrictEqual(device.received(), ['x']);
    });

    it('should report an invalid command with its position', async () => {
      const { executor } = createTestExecutor();

      const outcome = await executor.execute(['x', 'wait -1']);

      assert.strictEqual(outcome.message, 'Command 2: Wait time cannot be negative');
      assert.strictEqual(outcome.errorKind, 'range');
    });
  });

  describe('Zones', () => {
    it('should fan a marked command out over the active zones', async () => {
      const { executor, device, zones } = createTestExecutor();
      zones.setZones([1, 3]);

      const outcome = await executor.execute(['og_multizone-power_on']);

      assert.strictEqual(outcome.success, true);
      assert.deepStrictEqual(device.received(), ['multizone 0001', 'power_on', 'multizone 0100', 'power_on']);
      assert.strictEqual(zones.getZoneStatus(1), 'completed');
      assert.strictEqual(zones.getZoneStatus(3), 'completed');
    });

    it('should leave earlier zones completed when a later mask send fails', async () => {
      const { executor, device, zones } = createTestExecutor();
      zones.setZones([1, 2]);
      device.failWrites('multizone 0010');

      const outcome = await executor.execute(['og_multizone-power_on']);

      assert.strictEqual(outcome.success, false);
      assert.strictEqual(outcome.errorKind, 'transport');
      assert.strictEqual(zones.getZoneStatus(1), 'completed');
      assert.strictEqual(zones.getZoneStatus(2), 'error');
      assert.deepStrictEqual(device.received(), ['multizone 0001', 'power_on']);
    });

    it('should refuse a fan-out without active zones', async () => {
      const { executor, device } = createTestExecutor();

      const outcome = await executor.execute(['og_multizone-power_on']);

      assert.strictEqual(outcome.message, 'No active zones for "power_on"');
      assert.deepStrictEqual(device.received(), []);
    });

    it('should send raw multizone commands as they are', async () => {
      const { executor, device } = createTestExecutor();

      await executor.execute(['multizone 0101']);

      assert.deepStrictEqual(device.received(), ['multizone 0101']);
    });
  });

  describe('Cancellation and timeouts', () => {
    it('should end a long wait promptly after cancel', async () => {
      const { executor } = createTestExecutor();
      const running = executor.execute(['wait 10']);

      await delay(30);
      const cancelledAt = Date.now();
      assert.strictEqual(executor.cancel(), true);
      const outcome = await running;

      assert.ok(Date.now() - cancelledAt < 200);
      assert.strictEqual(outcome.status, 'cancelled');
      assert.strictEqual(outcome.errorKind, 'cancelled');
    });

    it('should fail a run that exceeds its timeout', async () => {
      const { executor } = createTestExecutor();

      const outcome = await executor.execute(['wait 10'], { timeoutMs: 50 });

      assert.strictEqual(outcome.status, 'failed');
      assert.strictEqual(outcome.errorKind, 'timeout');
      assert.strictEqual(outcome.message, 'Run exceeded the 50 ms timeout');
    });

    it('should reject a second run while one is active', async () => {
      const { executor } = createTestExecutor();
      const first = executor.execute(['wait 0.05']);

      const second = await executor.execute(['x']);
      assert.strictEqual(second.success, false);
      assert.strictEqual(second.message, 'A sequence is already running');

      assert.strictEqual((await first).status, 'completed');
    });

    it('should ignore cancel when idle', () => {
      const { executor } = createTestExecutor();
      assert.strictEqual(executor.cancel(), false);
    });
  });

  it('should keep running when a listener throws', async () => {
    const { executor } = createTestExecutor();
    executor.on('command-executed', () => {
      throw new Error('listener failure');
    });

    const outcome = await executor.execute(['a', 'b']);

    assert.strictEqual(outcome.status, 'completed');
  });
});
