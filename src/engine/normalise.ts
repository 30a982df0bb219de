import { EngineConfig } from '../domain/config';
import { ConfigurationError } from '../domain/errors';
import { baseConfig } from '../config/baseConfig';

export const CURRENT_CONFIG_VERSION = 'v1';
export const RANKING_HORIZON_YEARS = 5;

export type PartialEngineConfig = Partial<Omit<EngineConfig, 'stepSizes'>> & {
  stepSizes?: Partial<EngineConfig['stepSizes']>;
};

export function checkConfig(config: EngineConfig): string[] {
  const errors: string[] = [];

  if (!Number.isFinite(config.recoveryRate) || config.recoveryRate < 0 || config.recoveryRate >= 1) {
    errors.push(`recoveryRate must be in [0, 1), got ${config.recoveryRate}`);
  }
  if (!Number.isFinite(config.stepSizes.hike) || config.stepSizes.hike <= 0) {
    errors.push(`stepSizes.hike must be positive, got ${config.stepSizes.hike}`);
  }
  if (!Number.isFinite(config.stepSizes.cut) || config.stepSizes.cut >= 0) {
    errors.push(`stepSizes.cut must be negative, got ${config.stepSizes.cut}`);
  }
  config.pdHorizonsYears.forEach((h) => {
    if (!Number.isFinite(h) || h <= 0) errors.push(`pdHorizonsYears entries must be positive, got ${h}`);
  });
  if (!Number.isInteger(config.overnightTenorDays) || config.overnightTenorDays < 0) {
    errors.push(`overnightTenorDays must be a non-negative integer, got ${config.overnightTenorDays}`);
  }
  if (!(config.consistencyTolerance >= 0)) {
    errors.push(`consistencyTolerance must be non-negative, got ${config.consistencyTolerance}`);
  }

  return errors;
}

/**
 * Merges a partial config onto `baseConfig`, sorts and de-duplicates the PD horizons (the ranking
 * horizon is always present) and rejects anything `checkConfig` flags.
 */
export const normaliseConfig = (raw: PartialEngineConfig = {}): EngineConfig => {
  const horizons = raw.pdHorizonsYears ?? baseConfig.pdHorizonsYears;
  const config: EngineConfig = {
    ...baseConfig,
    ...raw,
    version: raw.version ?? CURRENT_CONFIG_VERSION,
    stepSizes: {
      ...baseConfig.stepSizes,
      ...(raw.stepSizes ?? {}),
    },
    pdHorizonsYears: [...new Set([...horizons, RANKING_HORIZON_YEARS])].sort((a, b) => a - b),
  };

  const errors = checkConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid engine configuration: ${errors.join('; ')}`, { issues: errors });
  }
  return Object.freeze(config);
};
