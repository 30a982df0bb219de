import { RateUnit } from './enums';
import { PolicyStepSizes } from './rates';

export interface EngineConfig {
  version: string;
  recoveryRate: number;
  stepSizes: PolicyStepSizes;
  pdHorizonsYears: number[];
  overnightTenorDays: number;
  consistencyTolerance: number;
  rateUnit: RateUnit;
}
