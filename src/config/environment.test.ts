import { describe, expect, it } from 'vitest';
import { RateUnit } from '../domain/enums';
import { ConfigurationError } from '../domain/errors';
import { baseConfig } from './baseConfig';
import { loadRuntimeConfig, parseEnvironment } from './environment';

describe('environment configuration', () => {
  it('uses the defaults for an empty environment', () => {
    const runtime = loadRuntimeConfig({});
    expect(runtime.engine).toEqual(baseConfig);
    expect(runtime.logging).toEqual({ level: 'info', pretty: false });
  });

  it('applies engine overrides from the environment', () => {
    const runtime = loadRuntimeConfig({
      RECOVERY_RATE: '0.4',
      POLICY_STEP_HIKE_BPS: '10',
      PD_HORIZONS: '2, 7',
      RATE_UNIT: 'decimal',
      LOG_LEVEL: 'debug',
      LOG_PRETTY: 'true',
    });
    expect(runtime.engine.recoveryRate).toBe(0.4);
    expect(runtime.engine.stepSizes).toEqual({ hike: 0.001, cut: -0.0025 });
    expect(runtime.engine.pdHorizonsYears).toEqual([2, 5, 7]);
    expect(runtime.engine.rateUnit).toBe(RateUnit.Decimal);
    expect(runtime.logging).toEqual({ level: 'debug', pretty: true });
  });

  it('treats blank variables as unset', () => {
    expect(parseEnvironment({ RECOVERY_RATE: '', LOG_LEVEL: '  ' }).RECOVERY_RATE).toBeUndefined();
  });

  it('fails fast on malformed values', () => {
    expect(() => loadRuntimeConfig({ RECOVERY_RATE: 'ten percent' })).toThrow(ConfigurationError);
    expect(() => loadRuntimeConfig({ PD_HORIZONS: '1;5' })).toThrow(ConfigurationError);
    expect(() => loadRuntimeConfig({ RATE_UNIT: 'bps' })).toThrow(ConfigurationError);
    expect(() => loadRuntimeConfig({ RECOVERY_RATE: '1.2' })).toThrow('recoveryRate must be in [0, 1), got 1.2');
  });
});
