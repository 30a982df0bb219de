export interface PdCurvePoint {
  horizonYears: number;
  pd: number;
}

export interface HazardRate {
  value: number;
  clamped: boolean;
}

export interface IssuerCreditProfile {
  issuerId: string;
  bondCount: number;
  avgMaturityYears: number;
  spread: number;
  hazardRate: number;
  hazardClamped: boolean;
  pd5y: number;
  pdCurve: PdCurvePoint[];
}
