import path from 'node:path';
import { isLogLevel, type LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 * Unset values leave the stored configuration in charge.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel?: LogLevel;
  logJson?: boolean;
  configPath: string;
}

function parseNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] {
  return value === 'production' || value === 'test' ? value : 'development';
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const level = env.RECORDER_LOG_LEVEL?.trim().toLowerCase();
  const configPath = env.RECORDER_CONFIG?.trim();
  return {
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    logLevel: isLogLevel(level) ? level : undefined,
    logJson: parseBoolean(env.RECORDER_LOG_JSON),
    configPath: configPath
      ? path.resolve(configPath)
      : path.resolve(process.cwd(), 'data', 'config.json'),
  };
}
