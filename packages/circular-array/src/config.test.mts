import { describe, it, expect } from 'vitest';

import { DEFAULT_DIAGNOSTICS_CONFIG, resolveDiagnosticsConfig } from './config.mjs';

describe('resolveDiagnosticsConfig', () => {
  it('should use the defaults for an empty environment', () => {
    expect(resolveDiagnosticsConfig({})).toEqual(DEFAULT_DIAGNOSTICS_CONFIG);
    expect(resolveDiagnosticsConfig({})).toEqual({ level: 'warn', silent: false });
  });

  it('should read the level and silence flag', () => {
    expect(
      resolveDiagnosticsConfig({
        CIRCULAR_ARRAY_LOG_LEVEL: ' DEBUG ',
        CIRCULAR_ARRAY_LOG_SILENT: '1',
      })
    ).toEqual({ level: 'debug', silent: true });
    expect(resolveDiagnosticsConfig({ CIRCULAR_ARRAY_LOG_SILENT: 'true' }).silent).toBe(true);
    expect(resolveDiagnosticsConfig({ CIRCULAR_ARRAY_LOG_SILENT: 'false' }).silent).toBe(false);
  });

  it('should fall back to the default level for unknown names', () => {
    expect(resolveDiagnosticsConfig({ CIRCULAR_ARRAY_LOG_LEVEL: 'verbose' }).level).toBe('warn');
  });
});
