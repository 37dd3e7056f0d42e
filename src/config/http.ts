import type { EnvironmentConfig } from '@/config/environment';

/**
 * Runtime options for the control API server.
 */
export interface HttpServerConfig {
  port: number;
  host: string;
}

export function buildHttpServerConfig(env: EnvironmentConfig): HttpServerConfig {
  return {
    port: env.httpPort,
    host: env.httpHost,
  };
}
