/**
 * A Mozart device managed by the bridge. Immutable while its runtime is alive.
 */
export interface DeviceConfig {
  serial: string;
  host: string;
  jid: string;
  model?: string;
  name?: string;
}

export interface ControlTimingConfig {
  longPressMs: number;
  veryLongPressMs: number;
}

export interface TimingConfig {
  /** Hold time before a press escalates to a long press. */
  longPressMs: number;
  /** Additional hold time after the long press before it escalates again. */
  veryLongPressMs: number;
  wheelQuietMs: number;
  controls: Record<string, Partial<ControlTimingConfig>>;
}

export interface ConnectionConfig {
  notificationPort: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  reconnectJitterMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  requestTimeoutMs: number;
}

export interface DiscoveryConfig {
  enabled: boolean;
}

export interface BridgeConfig {
  devices: DeviceConfig[];
  timing: TimingConfig;
  connection: ConnectionConfig;
  discovery: DiscoveryConfig;
  updatedAt: string;
}
