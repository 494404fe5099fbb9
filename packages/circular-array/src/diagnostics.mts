import { loggerFactory, LOGGER_LEVELS } from '@dequekit/logger';

import { resolveDiagnosticsConfig } from './config.mjs';

import type { BaseLogger } from '@dequekit/logger';

let activeLogger: BaseLogger | undefined;

const createDefaultLogger = (): BaseLogger => {
  const config = resolveDiagnosticsConfig();
  const { logger } = loggerFactory({
    level: config.level,
    levels: [...LOGGER_LEVELS],
    silent: config.silent,
    appInfo: false,
  });
  return logger;
};

/**
 * Logger receiving storage reallocation events.
 * Built from the environment on first use unless one was set.
 */
export const getDiagnosticsLogger = (): BaseLogger => (activeLogger ??= createDefaultLogger());

/**
 * Routes diagnostics to `logger`; call without arguments to go back to the default.
 */
export const setDiagnosticsLogger = (logger?: BaseLogger): void => {
  activeLogger = logger;
};
