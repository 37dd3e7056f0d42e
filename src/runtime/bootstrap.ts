import { loadConfig } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import { HttpService } from '@/adapters/http/httpService';
import { MdnsService } from '@/adapters/discovery/mdnsService';
import { MozartDiscovery } from '@/adapters/discovery/mozartDiscovery';
import { MozartRestClient } from '@/adapters/mozart/mozartRestClient';
import { MozartNotificationConnector } from '@/adapters/mozart/mozartNotificationTransport';
import { DeviceDirectory } from '@/application/devices/deviceDirectory';
import { DeviceManager } from '@/application/devices/deviceManager';
import { DeviceRuntime } from '@/application/devices/deviceRuntime';
import { createRuntimePorts } from '@/runtime/ports';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

const SERVICE_STOP_TIMEOUT_MS = 6000;

export function createRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
  const config = loadConfig(env);
  logManager.configure({ level: config.env.logLevel, json: config.env.logJson });
  const ports = createRuntimePorts({ configFile: config.configFile });
  const directory = new DeviceDirectory();
  let deviceManager: DeviceManager | null = null;
  let httpService: HttpService | null = null;
  let mdnsService: MdnsService | null = null;
  let discovery: MozartDiscovery | null = null;

  async function startServices(): Promise<void> {
    const log = createLogger('Server');
    log.info('starting beolink bridge', { env: config.env.nodeEnv, configFile: config.configFile });
    const bridgeConfig = await ports.config.load();
    const { connection } = bridgeConfig;

    const api = new MozartRestClient({ requestTimeoutMs: connection.requestTimeoutMs });
    const connector = new MozartNotificationConnector({
      port: connection.notificationPort,
      heartbeatIntervalMs: connection.heartbeatIntervalMs,
      heartbeatTimeoutMs: connection.heartbeatTimeoutMs,
      connectTimeoutMs: connection.requestTimeoutMs,
    });
    const manager = new DeviceManager(
      directory,
      (device) =>
        new DeviceRuntime({
          device,
          config: bridgeConfig,
          api,
          connector,
          directory,
          clock: ports.clock,
        }),
    );
    deviceManager = manager;
    manager.start(bridgeConfig.devices);

    if (config.env.discoveryEnabled && bridgeConfig.discovery.enabled) {
      mdnsService = new MdnsService();
      discovery = new MozartDiscovery(mdnsService, directory);
      discovery.start();
    } else {
      log.info('mdns discovery disabled');
    }

    httpService = new HttpService(config.http, { devices: manager, directory });
    await httpService.start();

    log.info('startup complete', { devices: bridgeConfig.devices.length });
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Server');
    const services: LifecycleService[] = [];
    const http = httpService;
    if (http) {
      services.push({ name: 'http', stop: () => http.stop() });
    }
    const mdns = mdnsService;
    const browser = discovery;
    if (mdns) {
      services.push({
        name: 'mdns',
        stop: async () => {
          browser?.stop();
          mdns.shutdown();
        },
      });
    }
    const manager = deviceManager;
    if (manager) {
      services.push({ name: 'devices', stop: () => manager.stop() });
    }

    await Promise.all(
      services.map((service) => stopWithTimeout(service.name, service.stop, SERVICE_STOP_TIMEOUT_MS, log)),
    );

    httpService = null;
    mdnsService = null;
    discovery = null;
    deviceManager = null;
  }

  return {
    start: startServices,
    stop: stopServices,
  };
}
