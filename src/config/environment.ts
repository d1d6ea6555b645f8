import type { LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  logLevel: LogLevel;
  logJson: boolean;
  /** Pause between loop iterations that moved no audio. */
  idleSleepMs: number;
  commandQueueCapacity: number;
  discoveryTimeoutMs: number;
  /** Upper bound for the transport disconnect at teardown. */
  disconnectTimeoutMs: number;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  logLevel: 'info',
  logJson: false,
  idleSleepMs: 2,
  commandQueueCapacity: 16,
  discoveryTimeoutMs: 3000,
  disconnectTimeoutMs: 2000,
};

/**
 * Returns the static environment configuration (ENV overrides are not supported).
 */
export function loadEnvironment(): EnvironmentConfig {
  return { ...DEFAULT_ENVIRONMENT };
}
