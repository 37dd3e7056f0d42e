import type { ButtonEvent, RotationEvent } from '@/domain/device/controls';
import type { DeviceStateChange } from '@/domain/device/state';
import type { TopologySnapshot } from '@/domain/beolink/topology';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'stopped';

/**
 * Events a device runtime publishes to entity projections and the control API.
 */
export type DeviceEventMap = {
  button: ButtonEvent;
  rotation: RotationEvent;
  topology: TopologySnapshot;
  availability: { available: boolean };
  connection: { state: ConnectionState };
  state: DeviceStateChange;
};

export type DeviceEventName = keyof DeviceEventMap;
