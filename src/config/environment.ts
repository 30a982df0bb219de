/**
 * Environment configuration.
 *
 * Reads engine overrides and logging settings from `process.env` (or any env-shaped record) and
 * fails fast with a `ConfigurationError` that lists every bad variable.
 */
import { z } from 'zod';
import { EngineConfig } from '../domain/config';
import { RateUnit } from '../domain/enums';
import { ConfigurationError } from '../domain/errors';
import { normaliseConfig, PartialEngineConfig } from '../engine/normalise';

const optionalNumber = z.coerce.number().finite().optional();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

export const EnvironmentSchema = z.object({
  RECOVERY_RATE: optionalNumber,
  POLICY_STEP_HIKE_BPS: optionalNumber,
  POLICY_STEP_CUT_BPS: optionalNumber,
  PD_HORIZONS: z
    .string()
    .regex(/^\s*\d+(\.\d+)?(\s*,\s*\d+(\.\d+)?)*\s*$/, 'expected a comma-separated list of years')
    .optional()
    .transform((v) => (v === undefined ? undefined : v.split(',').map((h) => Number(h.trim())))),
  RATE_UNIT: z.nativeEnum(RateUnit).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: booleanFlag,
});

export type Environment = z.infer<typeof EnvironmentSchema>;

export interface LoggingConfig {
  level: Environment['LOG_LEVEL'];
  pretty: boolean;
}

export interface RuntimeConfig {
  engine: EngineConfig;
  logging: LoggingConfig;
}

const BPS = 10_000;

export function parseEnvironment(env: Record<string, string | undefined>): Environment {
  // Blank variables (FOO= in a .env file) count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const result = EnvironmentSchema.safeParse(present);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, { issues });
}

export function loadRuntimeConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  const parsed = parseEnvironment(env);

  const overrides: PartialEngineConfig = {};
  if (parsed.RECOVERY_RATE !== undefined) overrides.recoveryRate = parsed.RECOVERY_RATE;
  if (parsed.PD_HORIZONS !== undefined) overrides.pdHorizonsYears = parsed.PD_HORIZONS;
  if (parsed.RATE_UNIT !== undefined) overrides.rateUnit = parsed.RATE_UNIT;
  if (parsed.POLICY_STEP_HIKE_BPS !== undefined || parsed.POLICY_STEP_CUT_BPS !== undefined) {
    overrides.stepSizes = {};
    if (parsed.POLICY_STEP_HIKE_BPS !== undefined) overrides.stepSizes.hike = parsed.POLICY_STEP_HIKE_BPS / BPS;
    if (parsed.POLICY_STEP_CUT_BPS !== undefined) overrides.stepSizes.cut = parsed.POLICY_STEP_CUT_BPS / BPS;
  }

  return {
    engine: normaliseConfig(overrides),
    logging: { level: parsed.LOG_LEVEL, pretty: parsed.LOG_PRETTY },
  };
}
