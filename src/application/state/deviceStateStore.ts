import type { StateNotification } from '@/domain/device/notifications';
import {
  emptyDeviceState,
  type DeviceStateChange,
  type DeviceStateField,
  type DeviceStateSnapshot,
} from '@/domain/device/state';

type StateListener = (change: DeviceStateChange) => void;

/**
 * Latest attribute values reported by one device. Emits a change only when a field really changed.
 */
export class DeviceStateStore {
  private state: DeviceStateSnapshot = emptyDeviceState();
  private readonly listeners = new Set<StateListener>();

  public apply(notification: StateNotification): void {
    switch (notification.kind) {
      case 'source_change':
        this.set('source', { ...notification.source });
        return;
      case 'volume':
        this.set('volume', {
          level: notification.level,
          muted: notification.muted ?? this.state.volume?.muted ?? false,
          maximum: notification.maximum ?? this.state.volume?.maximum ?? 100,
        });
        return;
      case 'playback_state':
        this.set('playback', { ...this.state.playback, state: notification.state });
        return;
      case 'playback_progress':
        this.set('playback', { ...this.state.playback, progress: notification.progress });
        return;
      case 'software_update_state':
        this.set('softwareUpdate', {
          state: notification.state,
          secondsRemaining: notification.secondsRemaining ?? null,
        });
        return;
      case 'battery':
        this.set('battery', {
          level: notification.level,
          isCharging: notification.isCharging ?? false,
        });
        return;
    }
  }

  public setSoftwareVersion(version: string): void {
    this.set('softwareVersion', version);
  }

  public snapshot(): DeviceStateSnapshot {
    return {
      source: this.state.source ? { ...this.state.source } : null,
      volume: this.state.volume ? { ...this.state.volume } : null,
      playback: { ...this.state.playback },
      softwareUpdate: this.state.softwareUpdate ? { ...this.state.softwareUpdate } : null,
      softwareVersion: this.state.softwareVersion,
      battery: this.state.battery ? { ...this.state.battery } : null,
    };
  }

  public subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private set<K extends DeviceStateField>(field: K, value: DeviceStateSnapshot[K]): void {
    if (JSON.stringify(this.state[field]) === JSON.stringify(value)) {
      return;
    }
    this.state = { ...this.state, [field]: value };
    const change: DeviceStateChange = { field, snapshot: this.snapshot() };
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
