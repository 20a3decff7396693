import { loadEnvironment } from '@/config/environment';
import type { LoggingConfig } from '@/domain/config/types';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env) => ({
  env: loadEnvironment(env),
});

export type AppConfig = ReturnType<typeof loadConfig>;

/** Environment wins over the stored logging section. */
export function resolveLogging(app: AppConfig, stored: LoggingConfig): LoggingConfig {
  return {
    level: app.env.logLevel ?? stored.level,
    json: app.env.logJson ?? stored.json,
  };
}
