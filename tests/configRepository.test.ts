import assert from 'node:assert/strict';
import { test } from './testHarness';
import {
  ConfigRepository,
  defaultConnection,
  defaultTiming,
  normalizeConfig,
} from '../src/application/config/configRepository';
import { MemoryStorage } from './fakes/memoryStorage';

const FILE = '/tmp/beolink-test/config.json';
const JID = '2714.1200304.28000001@products.bang-olufsen.com';

test('a missing config file is created with defaults', async () => {
  const storage = new MemoryStorage();
  const config = await new ConfigRepository(storage, FILE).load();

  assert.deepEqual(config.devices, []);
  assert.deepEqual(config.timing, defaultTiming());
  assert.deepEqual(config.connection, defaultConnection());
  assert.equal(config.discovery.enabled, true);
  assert.ok(storage.files.has(FILE));
});

test('complete files are loaded without being rewritten', async () => {
  const storage = new MemoryStorage();
  storage.files.set(FILE, {
    devices: [{ serial: '28000001', host: '192.0.2.1', jid: JID, name: 'Living Room' }],
    timing: { longPressMs: 1000, veryLongPressMs: 2000, wheelQuietMs: 100, controls: {} },
    connection: {},
    discovery: { enabled: false },
    updatedAt: '2024-01-01T00:00:00.000Z',
  });
  const config = await new ConfigRepository(storage, FILE).load();

  assert.equal(storage.writes, 0);
  assert.deepEqual(config.devices, [{ serial: '28000001', host: '192.0.2.1', jid: JID, name: 'Living Room' }]);
  assert.equal(config.timing.veryLongPressMs, 2000);
  assert.equal(config.connection.notificationPort, 9339);
  assert.equal(config.discovery.enabled, false);
  assert.equal(config.updatedAt, '2024-01-01T00:00:00.000Z');
});

test('malformed and duplicate device entries are dropped', () => {
  const { config, filled } = normalizeConfig({
    devices: [
      'nope',
      { serial: '28000001', host: '192.0.2.1', jid: JID, model: ' Beosound Balance ' },
      { serial: '28000001', host: '192.0.2.9', jid: JID },
      { serial: '28000002', host: '192.0.2.2', jid: 'not-a-jid' },
      { serial: '28000003', jid: JID },
    ],
  });

  assert.equal(filled, true);
  assert.deepEqual(config.devices, [
    { serial: '28000001', host: '192.0.2.1', jid: JID, model: 'Beosound Balance' },
  ]);
});

test('invalid timing and connection values fall back to defaults', () => {
  const { config } = normalizeConfig({
    devices: [],
    timing: {
      longPressMs: -5,
      veryLongPressMs: '3000',
      controls: { standby: { longPressMs: 800, veryLongPressMs: 0 }, broken: 3 },
    },
    connection: { reconnectBaseMs: 5000, reconnectMaxMs: 1000, reconnectJitterMs: 0 },
    discovery: {},
  });

  assert.deepEqual(config.timing, {
    longPressMs: 1500,
    veryLongPressMs: 1500,
    wheelQuietMs: 250,
    controls: { standby: { longPressMs: 800 } },
  });
  assert.equal(config.connection.reconnectBaseMs, 5000);
  assert.equal(config.connection.reconnectMaxMs, 5000);
  assert.equal(config.connection.reconnectJitterMs, 0);
  assert.equal(config.discovery.enabled, true);
});

test('update persists changes and refreshes the timestamp only on change', async () => {
  const storage = new MemoryStorage();
  storage.files.set(FILE, {
    devices: [],
    timing: {},
    connection: {},
    discovery: {},
    updatedAt: '2024-01-01T00:00:00.000Z',
  });
  const repository = new ConfigRepository(storage, FILE);
  await repository.load();

  const unchanged = await repository.update(() => undefined);
  assert.equal(unchanged.updatedAt, '2024-01-01T00:00:00.000Z');

  const changed = await repository.update((config) => {
    config.devices.push({ serial: '28000001', host: '192.0.2.1', jid: JID });
  });
  assert.notEqual(changed.updatedAt, '2024-01-01T00:00:00.000Z');
  assert.deepEqual(repository.getDevices(), [{ serial: '28000001', host: '192.0.2.1', jid: JID }]);
  assert.throws(() => new ConfigRepository(storage, '/elsewhere.json').get(), /configuration not loaded/);
});
