/**
 * Aggregation step.
 *
 * `buildSnapshot` composes the two model outputs into one frozen `MetricsSnapshot`;
 * `evaluateMarketData` runs a whole cycle (adapter -> rate model + credit model -> snapshot);
 * `MetricsAggregator` is the read surface handed to the presentation layer and only swaps in a new
 * snapshot when a cycle completes without error.
 */
import { IssuerCreditProfile } from '../domain/credit';
import { EngineConfig } from '../domain/config';
import { BoundaryHit } from '../domain/enums';
import { MarketMetricsError } from '../domain/errors';
import { RateProbabilityResult } from '../domain/rates';
import { MetricsSnapshot, SnapshotFlags } from '../domain/snapshot';
import { baseConfig } from '../config/baseConfig';
import { createLogger, Logger } from '../observability/logger';
import { cloneMetricsSnapshot, deepFreeze } from './clone';
import { computeCreditProfiles, rankIssuers } from './creditRiskModel';
import { checkCreditInvariants, checkRateInvariants } from './invariants';
import { normaliseMarketData } from './marketDataAdapter';
import { computeRateProbabilities } from './rateProbabilityModel';
import { InMemorySnapshotStore, SnapshotStore } from './snapshotStore';

export interface SnapshotOptions {
  version?: string;
}

export interface EvaluationOptions extends SnapshotOptions {
  watchList?: string[];
}

const toTimestamp = (asOf: Date | string): string => (typeof asOf === 'string' ? asOf : asOf.toISOString());

const summariseFlags = (rateResult: RateProbabilityResult, ranked: IssuerCreditProfile[]): SnapshotFlags => ({
  // A directional probability floored at 0 only means the market leans the other way; a cap means
  // the curve prices more than one full step, which the single-meeting model cannot represent.
  rateBoundaryHit:
    rateResult.boundary.pHike === BoundaryHit.Cap ||
    rateResult.boundary.pCut === BoundaryHit.Cap ||
    rateResult.boundary.pNoChange !== BoundaryHit.None,
  clampedIssuers: ranked.filter((p) => p.hazardClamped).map((p) => p.issuerId),
  warnings: [...checkRateInvariants(rateResult), ...checkCreditInvariants(ranked)],
});

export const buildSnapshot = (
  rateResult: RateProbabilityResult,
  creditProfiles: IssuerCreditProfile[],
  asOf: Date | string,
  options: SnapshotOptions = {}
): MetricsSnapshot => {
  const ranked = rankIssuers(creditProfiles);
  const snapshot: MetricsSnapshot = {
    asOf: toTimestamp(asOf),
    ...(options.version !== undefined ? { version: options.version } : {}),
    rateResult,
    creditProfiles: ranked,
    flags: summariseFlags(rateResult, ranked),
  };
  return deepFreeze(cloneMetricsSnapshot(snapshot));
};

export const evaluateMarketData = (
  raw: unknown,
  config: EngineConfig,
  asOf: Date | string,
  options: EvaluationOptions = {}
): MetricsSnapshot => {
  const market = normaliseMarketData(raw, config);
  const rateResult = computeRateProbabilities(market.oisCurve, market.meeting, config.stepSizes, {
    overnightTenorDays: config.overnightTenorDays,
    consistencyTolerance: config.consistencyTolerance,
  });
  const creditProfiles = computeCreditProfiles(market.bondQuotes, market.governmentCurve, config.recoveryRate, {
    pdHorizonsYears: config.pdHorizonsYears,
    issuers: options.watchList,
  });
  return buildSnapshot(rateResult, creditProfiles, asOf, { version: options.version });
};

export interface AggregatorDependencies {
  logger?: Logger;
  store?: SnapshotStore;
  clock?: () => Date;
  watchList?: string[];
}

export class MetricsAggregator {
  private config: EngineConfig;
  private published: MetricsSnapshot | undefined;
  private readonly logger: Logger;
  private readonly store: SnapshotStore;
  private readonly clock: () => Date;
  private readonly watchList?: string[];

  constructor(config: EngineConfig = baseConfig, deps: AggregatorDependencies = {}) {
    this.config = config;
    this.logger = (deps.logger ?? createLogger()).child({ component: 'metrics-aggregator' });
    this.store = deps.store ?? new InMemorySnapshotStore();
    this.clock = deps.clock ?? (() => new Date());
    this.watchList = deps.watchList;
  }

  setConfig(config: EngineConfig) {
    this.config = config;
  }

  /**
   * Runs one evaluation cycle over `raw`. The published snapshot (and the store) only change once
   * every step has succeeded; a failure is logged and re-thrown.
   */
  evaluate(raw: unknown, version?: string): MetricsSnapshot {
    let snapshot: MetricsSnapshot;
    try {
      snapshot = evaluateMarketData(raw, this.config, this.clock(), { version, watchList: this.watchList });
    } catch (error) {
      const code = error instanceof MarketMetricsError ? error.code : 'UNEXPECTED';
      this.logger.error({ err: error, code, version }, 'evaluation failed; keeping previous snapshot');
      throw error;
    }

    if (version !== undefined) this.store.save(version, snapshot);
    this.published = snapshot;

    if (snapshot.flags.rateBoundaryHit || snapshot.flags.clampedIssuers.length > 0) {
      this.logger.warn(
        {
          version,
          rateBoundary: snapshot.rateResult.boundary,
          clampedIssuers: snapshot.flags.clampedIssuers,
        },
        'clamped estimates in snapshot'
      );
    }
    snapshot.flags.warnings.forEach((warning) => this.logger.warn({ version }, warning));
    this.logger.info(
      {
        version,
        meetingDate: snapshot.rateResult.meetingDate,
        pHike: snapshot.rateResult.pHike,
        pCut: snapshot.rateResult.pCut,
        issuers: snapshot.creditProfiles.length,
      },
      'snapshot published'
    );
    return snapshot;
  }

  current(): MetricsSnapshot | undefined {
    return this.published;
  }

  asOfVersion(version: string): MetricsSnapshot | undefined {
    return this.store.get(version);
  }

  versions(): string[] {
    return this.store.versions();
  }
}
