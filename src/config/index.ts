import { loadEnvironment, type EnvironmentConfig } from '@/config/environment';
import { resolveFromCwd } from '@/shared/utils/file';

/**
 * Aggregates the environment into the runtime configuration, with file paths made absolute.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const environment: EnvironmentConfig = loadEnvironment(env);
  return {
    ...environment,
    stationsFile: resolveFromCwd(environment.stationsFile),
    stateFile: resolveFromCwd(environment.stateFile),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
