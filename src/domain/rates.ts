import { BoundaryHit } from './enums';

export interface PolicyStepSizes {
  hike: number;
  cut: number;
}

export interface ClippedProbability {
  raw: number;
  value: number;
  boundary: BoundaryHit;
}

export interface NoChangeConsistency {
  derived: number;
  independent: number;
  discrepancy: number;
  consistent: boolean;
  /** Tenor the independent estimate was read from; null when the curve has none past `postTenorDays`. */
  checkTenorDays: number | null;
}

export interface RateProbabilityResult {
  pNoChange: number;
  pHike: number;
  pCut: number;
  raw: {
    pNoChange: number;
    pHike: number;
    pCut: number;
  };
  boundary: {
    pNoChange: BoundaryHit;
    pHike: BoundaryHit;
    pCut: BoundaryHit;
  };
  meetingDate: string;
  daysToMeeting: number;
  postTenorDays: number;
  currentRate: number;
  postRate: number;
  impliedRate: number;
  stepSizes: PolicyStepSizes;
  consistency: NoChangeConsistency;
}
