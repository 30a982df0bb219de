import { EngineConfig } from '../domain/config';
import { RateUnit } from '../domain/enums';

export const baseConfig: EngineConfig = {
  version: 'v1',
  // Japanese senior unsecured corporates have historically recovered little in default.
  recoveryRate: 0.1,
  stepSizes: {
    hike: 0.0025,
    cut: -0.0025,
  },
  pdHorizonsYears: [1, 3, 5, 10],
  overnightTenorDays: 1,
  consistencyTolerance: 0.05,
  rateUnit: RateUnit.Percent,
};
