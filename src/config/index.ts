import path from 'node:path';
import { loadEnvironment } from '@/config/environment';
import { buildHttpServerConfig } from '@/config/http';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const environment = loadEnvironment(env);
  return {
    env: environment,
    http: buildHttpServerConfig(environment),
    configFile: path.join(environment.dataDir, 'config.json'),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
