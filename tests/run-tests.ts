import 'tsconfig-paths/register';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test, tests } from './testHarness';
import { logManager } from '../src/shared/logging/logger';
import './architecture/importBoundaries.test';
import './buttonEventClassifier.test';
import './wheelDebouncer.test';
import './decodeFrame.test';
import './notificationDispatcher.test';
import './connectionSupervisor.test';
import './beolinkGroupCoordinator.test';
import './deviceRuntime.test';
import './configRepository.test';
import './mozartRestClient.test';
import './mozartDiscovery.test';
import './controlApi.test';
import './runtimeShutdown.test';
import { loadConfig } from '../src/config';
import { loadEnvironment } from '../src/config/environment';
import { createRuntimePorts } from '../src/runtime/ports';

logManager.configure({ level: 'none' });

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'beolink-bridge-tests-'));
  try {
    return await fn(tempDir);
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
}

test('environment overrides are parsed with fallbacks', () => {
  const env = loadEnvironment({
    NODE_ENV: 'staging',
    BEOLINK_LOG_LEVEL: ' DEBUG ',
    BEOLINK_LOG_JSON: 'yes',
    BEOLINK_HTTP_PORT: '80000',
    BEOLINK_HTTP_HOST: '127.0.0.1',
    BEOLINK_DISCOVERY: 'off',
  });

  assert.equal(env.nodeEnv, 'development');
  assert.equal(env.logLevel, 'debug');
  assert.equal(env.logJson, true);
  assert.equal(env.httpPort, 7190);
  assert.equal(env.httpHost, '127.0.0.1');
  assert.equal(env.discoveryEnabled, true);
  assert.equal(loadEnvironment({ BEOLINK_DISCOVERY: 'false' }).discoveryEnabled, false);
});

test('config is created in the data dir and recovers from corrupt JSON', async () => {
  await withTempDir(async (dir) => {
    const config = loadConfig({ BEOLINK_DATA_DIR: dir });
    assert.equal(config.configFile, path.join(dir, 'config.json'));

    const ports = createRuntimePorts({ configFile: config.configFile });
    const first = await ports.config.load();
    assert.deepEqual(first.devices, []);
    const written: unknown = JSON.parse(await fs.readFile(config.configFile, 'utf-8'));
    assert.ok(typeof written === 'object' && written !== null && 'connection' in written);

    await fs.writeFile(config.configFile, '{bad-json');
    const next = await ports.config.load();
    assert.deepEqual(next.devices, []);
    assert.equal(next.connection.notificationPort, 9339);
    const rewritten: unknown = JSON.parse(await fs.readFile(config.configFile, 'utf-8'));
    assert.ok(typeof rewritten === 'object' && rewritten !== null && 'devices' in rewritten);
  });
});

async function run(): Promise<void> {
  let failures = 0;
  for (const { name, fn } of tests) {
    try {
      await fn();
      console.log(`ok - ${name}`);
    } catch (error) {
      failures += 1;
      console.error(`not ok - ${name}`);
      console.error(error);
    }
  }
  if (failures > 0) {
    process.exitCode = 1;
  }
}

void run();
