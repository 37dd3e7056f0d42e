import type { DeviceConfig } from '@/domain/config/types';
import type { DeviceRuntime } from '@/application/devices/deviceRuntime';
import type { DeviceDirectory } from '@/application/devices/deviceDirectory';
import type { AnyDeviceEvent } from '@/application/devices/deviceEventBus';
import { createLogger } from '@/shared/logging/logger';

export type DeviceRuntimeFactory = (device: DeviceConfig) => DeviceRuntime;

export interface DeviceRegistry {
  list(): DeviceRuntime[];
  get(serial: string): DeviceRuntime | null;
}

/**
 * Owns one `DeviceRuntime` per configured device, keyed by serial.
 */
export class DeviceManager implements DeviceRegistry {
  private readonly log = createLogger('Devices', 'Manager');
  private readonly runtimes = new Map<string, DeviceRuntime>();
  private readonly listeners = new Set<(event: AnyDeviceEvent) => void>();
  private readonly detach: Array<() => void> = [];

  constructor(
    private readonly directory: DeviceDirectory,
    private readonly createRuntime: DeviceRuntimeFactory,
  ) {}

  public start(devices: readonly DeviceConfig[]): void {
    for (const device of devices) {
      if (this.runtimes.has(device.serial)) {
        this.log.warn('duplicate device serial skipped', { serial: device.serial });
        continue;
      }
      this.directory.register({
        jid: device.jid,
        host: device.host,
        serial: device.serial,
        name: device.name ?? null,
        model: device.model ?? null,
        origin: 'config',
      });
      const runtime = this.createRuntime(device);
      this.runtimes.set(device.serial, runtime);
      this.detach.push(runtime.events.onAny((event) => this.forward(event)));
      runtime.start();
    }
    this.log.info('device runtimes started', { count: this.runtimes.size });
  }

  public list(): DeviceRuntime[] {
    return [...this.runtimes.values()];
  }

  public get(serial: string): DeviceRuntime | null {
    return this.runtimes.get(serial) ?? null;
  }

  /** Receives events from every device bus. */
  public subscribe(listener: (event: AnyDeviceEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public async stop(): Promise<void> {
    const runtimes = this.list();
    const results = await Promise.allSettled(runtimes.map((runtime) => runtime.stop()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.log.warn('device runtime stop failed', { serial: runtimes[index]?.device.serial, message });
      }
    });
    this.detach.splice(0).forEach((unsubscribe) => unsubscribe());
    this.runtimes.clear();
    this.listeners.clear();
  }

  private forward(event: AnyDeviceEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.log.warn('device event listener failed', { serial: event.serial, event: event.event, message });
      }
    }
  }
}
