import { EventEmitter } from 'node:events';
import type { DeviceEventMap, DeviceEventName } from '@/domain/device/events';
import { createLogger } from '@/shared/logging/logger';

export type AnyDeviceEvent = {
  serial: string;
  event: DeviceEventName;
  payload: DeviceEventMap[DeviceEventName];
};

const ANY = Symbol('any');

/**
 * Typed publish/subscribe channel for one device. A throwing subscriber is logged and skipped.
 */
export class DeviceEventBus {
  private readonly log = createLogger('Devices', 'Events');
  private readonly emitter = new EventEmitter();

  constructor(public readonly serial: string) {
    this.emitter.setMaxListeners(0);
  }

  public on<K extends DeviceEventName>(
    event: K,
    listener: (payload: DeviceEventMap[K]) => void,
  ): () => void {
    const guarded = (payload: DeviceEventMap[K]): void => {
      try {
        listener(payload);
      } catch (error) {
        this.reportListenerError(event, error);
      }
    };
    this.emitter.on(event, guarded);
    return () => this.emitter.off(event, guarded);
  }

  public onAny(listener: (event: AnyDeviceEvent) => void): () => void {
    const guarded = (event: AnyDeviceEvent): void => {
      try {
        listener(event);
      } catch (error) {
        this.reportListenerError(event.event, error);
      }
    };
    this.emitter.on(ANY, guarded);
    return () => this.emitter.off(ANY, guarded);
  }

  public emit<K extends DeviceEventName>(event: K, payload: DeviceEventMap[K]): void {
    this.emitter.emit(event, payload);
    const envelope: AnyDeviceEvent = { serial: this.serial, event, payload };
    this.emitter.emit(ANY, envelope);
  }

  public clear(): void {
    this.emitter.removeAllListeners();
  }

  private reportListenerError(event: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.log.warn('device event listener failed', { serial: this.serial, event, message });
  }
}
