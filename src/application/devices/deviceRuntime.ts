import type { ClockPort } from '@/ports/ClockPort';
import type { DeviceApiPort } from '@/ports/DeviceApiPort';
import type { TransportConnector } from '@/ports/NotificationTransport';
import type { BridgeConfig, DeviceConfig } from '@/domain/config/types';
import type { ConnectionState } from '@/domain/device/events';
import type { DeviceStateSnapshot } from '@/domain/device/state';
import type { TopologySnapshot } from '@/domain/beolink/topology';
import { ButtonEventClassifier } from '@/application/controls/buttonEventClassifier';
import { WheelDebouncer } from '@/application/controls/wheelDebouncer';
import { DeviceStateStore } from '@/application/state/deviceStateStore';
import { BeolinkGroupCoordinator } from '@/application/beolink/beolinkGroupCoordinator';
import { NotificationDispatcher } from '@/application/notifications/notificationDispatcher';
import { ConnectionSupervisor } from '@/application/connection/connectionSupervisor';
import { DeviceEventBus } from '@/application/devices/deviceEventBus';
import type { DeviceDirectory } from '@/application/devices/deviceDirectory';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type DeviceRuntimeOptions = {
  device: DeviceConfig;
  config: Pick<BridgeConfig, 'timing' | 'connection'>;
  api: DeviceApiPort;
  connector: TransportConnector;
  directory: DeviceDirectory;
  clock: ClockPort;
  random?: () => number;
};

export interface DeviceRuntimeSnapshot {
  serial: string;
  jid: string;
  host: string;
  name: string | null;
  model: string | null;
  connection: ConnectionState;
  available: boolean;
  topology: TopologySnapshot;
  state: DeviceStateSnapshot;
}

/**
 * Everything that runs for one configured device: the supervised notification stream, the
 * classifiers fed by it, the state store and the Beolink coordinator.
 */
export class DeviceRuntime {
  public readonly events: DeviceEventBus;
  public readonly state = new DeviceStateStore();
  public readonly classifier: ButtonEventClassifier;
  public readonly debouncer: WheelDebouncer;
  public readonly coordinator: BeolinkGroupCoordinator;
  public readonly dispatcher: NotificationDispatcher;
  public readonly supervisor: ConnectionSupervisor;
  private readonly log: ComponentLogger;
  private readonly requests = new AbortController();
  private readonly background = new Set<Promise<void>>();
  private readonly detach: Array<() => void> = [];

  constructor(private readonly options: DeviceRuntimeOptions) {
    const { device, config, clock } = options;
    this.log = createLogger('Devices', 'Runtime').child(null, { serial: device.serial });
    this.events = new DeviceEventBus(device.serial);

    this.classifier = new ButtonEventClassifier({
      clock,
      timing: config.timing,
      onEscalation: (event) => this.events.emit('button', event),
      log: this.log.child('Buttons'),
    });
    this.debouncer = new WheelDebouncer({
      clock,
      quietMs: config.timing.wheelQuietMs,
      onRotation: (event) => this.events.emit('rotation', event),
      log: this.log.child('Wheel'),
    });
    this.coordinator = new BeolinkGroupCoordinator({
      device,
      api: options.api,
      directory: options.directory,
      state: this.state,
      onTopologyChanged: (snapshot) => this.events.emit('topology', snapshot),
      signal: this.requests.signal,
      log: this.log.child('Beolink'),
    });
    this.dispatcher = new NotificationDispatcher(
      {
        button: (notification) => {
          const events = this.classifier.classify(notification.controlId, notification.state, clock.now());
          events.forEach((event) => this.events.emit('button', event));
        },
        wheel: (notification) => {
          const flushed = this.debouncer.accumulate(notification.controlId, notification.delta, clock.now());
          if (flushed) {
            this.events.emit('rotation', flushed);
          }
        },
        beolink: (notification) => this.coordinator.applyNotification(notification),
        state: (notification) => {
          this.state.apply(notification);
          if (notification.kind === 'software_update_state') {
            this.refreshSoftwareVersion();
          }
        },
      },
      this.log.child('Notifications'),
    );
    this.supervisor = new ConnectionSupervisor({
      host: device.host,
      connector: options.connector,
      clock,
      session: (transport, signal) => this.dispatcher.run(transport, signal),
      backoff: {
        baseMs: config.connection.reconnectBaseMs,
        maxMs: config.connection.reconnectMaxMs,
        jitterMs: config.connection.reconnectJitterMs,
        random: options.random,
      },
      onStateChange: (state) => this.events.emit('connection', { state }),
      onAvailabilityChange: (available) => this.events.emit('availability', { available }),
      onConnected: () => this.refreshSoftwareVersion(),
      onDisconnected: () => {
        this.classifier.reset();
        this.debouncer.reset();
      },
      log: this.log.child('Connection'),
    });
    this.detach.push(this.state.subscribe((change) => this.events.emit('state', change)));
  }

  public get device(): DeviceConfig {
    return this.options.device;
  }

  public start(): void {
    this.detach.push(
      this.options.directory.attachSession(this.options.device.jid, () => this.coordinator.leadingSession()),
    );
    this.supervisor.start();
    this.log.info('device runtime started', { host: this.options.device.host });
  }

  public async stop(): Promise<void> {
    this.requests.abort();
    await this.supervisor.stop();
    this.classifier.reset();
    this.debouncer.reset();
    await this.coordinator.idle();
    await Promise.all([...this.background]);
    this.detach.splice(0).forEach((unsubscribe) => unsubscribe());
    this.log.info('device runtime stopped');
  }

  public snapshot(): DeviceRuntimeSnapshot {
    const { device } = this.options;
    return {
      serial: device.serial,
      jid: device.jid,
      host: device.host,
      name: device.name ?? null,
      model: device.model ?? null,
      connection: this.supervisor.getState(),
      available: this.supervisor.isAvailable(),
      topology: this.coordinator.snapshot(),
      state: this.state.snapshot(),
    };
  }

  private refreshSoftwareVersion(): void {
    if (this.requests.signal.aborted) {
      return;
    }
    const task = bestEffort(
      async () => {
        const status = await this.options.api.getSoftwareStatus(this.options.device.host, this.requests.signal);
        this.state.setSoftwareVersion(status.softwareVersion);
      },
      { fallback: undefined, log: this.log, label: 'software version refresh failed' },
    );
    this.background.add(task);
    void task.finally(() => this.background.delete(task));
  }
}
