import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as delay } from 'node:timers/promises';
import { DeviceEmulator } from '../emulators/device-emulator';

function createTestEmulator(latencyMs = 0) {
  const device = new DeviceEmulator({ name: 'test', latencyMs });
  const lines: string[] = [];
  device.on('line', (line: string) => lines.push(line));
  return { device, lines };
}

describe('DeviceEmulator', () => {
  it('should answer every command with OK by default', async () => {
    const { device, lines } = createTestEmulator();

    assert.strictEqual(device.write('power on'), true);
    assert.deepStrictEqual(lines, []);
    await delay(5);

    assert.deepStrictEqual(lines, ['OK']);
    assert.deepStrictEqual(device.received(), ['power on']);
  });

  it('should play scripted multi-line replies', async () => {
    const { device, lines } = createTestEmulator();
    device.reply('home', ['BUSY', 'DONE']).reply('mute', null);

    device.write('home');
    device.write('mute');
    await delay(5);

    assert.deepStrictEqual(lines, ['BUSY', 'DONE']);
  });

  it('should fail scripted writes without recording them', () => {
    const { device } = createTestEmulator();
    device.failWrites('eject');

    assert.strictEqual(device.write('eject'), false);
    assert.deepStrictEqual(device.received(), []);
    assert.strictEqual(device.getLog()[0].action, 'WriteFailed');
  });

  it('should refuse writes and drop pending replies when disconnected', async () => {
    const { device, lines } = createTestEmulator(20);
    const events: string[] = [];
    device.on('close', () => events.push('close'));
    device.on('open', () => events.push('open'));

    device.write('x');
    device.disconnect();
    assert.strictEqual(device.write('y'), false);
    await delay(40);
    assert.deepStrictEqual(lines, []);

    device.connect();
    assert.strictEqual(device.isOpen(), true);
    assert.deepStrictEqual(events, ['close', 'open']);
  });

  it('should cap the activity log', () => {
    const { device } = createTestEmulator();
    device.setDefaultReply(null);
    for (let i = 0; i < 250; i++) device.write(`cmd ${i}`);

    const log = device.getLog();
    assert.strictEqual(log.length, 200);
    assert.strictEqual(log[0].details, 'cmd 50');
  });

  it('should drive a transport', async () => {
    const { device } = createTestEmulator();
    const transport = device.createTransport();

    assert.strictEqual(await transport.send('ping'), true);
    assert.deepStrictEqual(await transport.awaitAcknowledgement(100), { status: 'success', response: 'OK' });
  });
});
