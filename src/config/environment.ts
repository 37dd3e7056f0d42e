import path from 'node:path';
import { parseLogLevel, type LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  logJson: boolean;
  httpPort: number;
  httpHost: string;
  dataDir: string;
  discoveryEnabled: boolean;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  nodeEnv: 'development',
  logLevel: 'info',
  logJson: false,
  httpPort: 7190,
  httpHost: '0.0.0.0',
  dataDir: path.resolve(process.cwd(), 'data'),
  discoveryEnabled: true,
};

function parseNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] {
  return value === 'production' || value === 'test' ? value : DEFAULT_ENVIRONMENT.nodeEnv;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = value?.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no') return false;
  return fallback;
}

function parsePort(value: string | undefined, fallback: number): number {
  const port = Number(value);
  return value && Number.isInteger(port) && port >= 0 && port <= 65535 ? port : fallback;
}

/**
 * Reads `NODE_ENV`, `BEOLINK_LOG_LEVEL`, `BEOLINK_LOG_JSON`, `BEOLINK_HTTP_HOST`,
 * `BEOLINK_HTTP_PORT`, `BEOLINK_DATA_DIR` and `BEOLINK_DISCOVERY`.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    logLevel: parseLogLevel(env.BEOLINK_LOG_LEVEL, DEFAULT_ENVIRONMENT.logLevel),
    logJson: parseFlag(env.BEOLINK_LOG_JSON, DEFAULT_ENVIRONMENT.logJson),
    httpPort: parsePort(env.BEOLINK_HTTP_PORT, DEFAULT_ENVIRONMENT.httpPort),
    httpHost: env.BEOLINK_HTTP_HOST?.trim() || DEFAULT_ENVIRONMENT.httpHost,
    dataDir: env.BEOLINK_DATA_DIR?.trim() ? path.resolve(env.BEOLINK_DATA_DIR) : DEFAULT_ENVIRONMENT.dataDir,
    discoveryEnabled: parseFlag(env.BEOLINK_DISCOVERY, DEFAULT_ENVIRONMENT.discoveryEnabled),
  };
}
