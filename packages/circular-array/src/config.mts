import { LOGGER_LEVELS } from '@dequekit/logger';

import type { LoggerLevels } from '@dequekit/logger';

/**
 * Settings for the default diagnostics logger
 */
export interface DiagnosticsConfig {
  level: LoggerLevels;
  silent: boolean;
}

export const DEFAULT_DIAGNOSTICS_CONFIG: Readonly<DiagnosticsConfig> = {
  level: 'warn',
  silent: false,
};

const isLoggerLevel = (value: string): value is LoggerLevels =>
  LOGGER_LEVELS.some((level) => level === value);

/**
 * Reads `CIRCULAR_ARRAY_LOG_LEVEL` and `CIRCULAR_ARRAY_LOG_SILENT`.
 * Unknown levels fall back to the default.
 */
export function resolveDiagnosticsConfig(
  env: Record<string, string | undefined> = process.env
): DiagnosticsConfig {
  const level = env.CIRCULAR_ARRAY_LOG_LEVEL?.trim().toLowerCase();
  const silent = env.CIRCULAR_ARRAY_LOG_SILENT?.trim().toLowerCase();

  return {
    level: level !== undefined && isLoggerLevel(level) ? level : DEFAULT_DIAGNOSTICS_CONFIG.level,
    silent: silent === undefined ? DEFAULT_DIAGNOSTICS_CONFIG.silent : silent === 'true' || silent === '1',
  };
}
