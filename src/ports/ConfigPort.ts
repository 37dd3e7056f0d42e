import type { BridgeConfig, DeviceConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<BridgeConfig>;
  getConfig(): BridgeConfig;
  getDevices(): DeviceConfig[];
  updateConfig(
    mutator: (config: BridgeConfig) => void | Promise<void>,
  ): Promise<BridgeConfig>;
}

export type { BridgeConfig, DeviceConfig };
