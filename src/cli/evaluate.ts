/**
 * Evaluates one market-data document and prints the resulting snapshot.
 *
 *   npm run evaluate -- data/market_data.json [--version 2025-11-21] [--dashboard]
 */
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { loadRuntimeConfig, RuntimeConfig } from '../config/environment';
import { MarketMetricsError } from '../domain/errors';
import { buildDashboardView } from '../engine/dashboardView';
import { normaliseMarketData } from '../engine/marketDataAdapter';
import { MetricsAggregator } from '../engine/metricsAggregator';
import { serializeSnapshot } from '../engine/serialize';
import { createLogger, Logger } from '../observability/logger';
import { formatBps, formatPct } from '../utils/formatters';

export interface CliIo {
  env: Record<string, string | undefined>;
  readFile: (path: string) => string;
  write: (text: string) => void;
  logger?: Logger;
}

const defaultIo: CliIo = {
  env: process.env,
  readFile: (path) => readFileSync(path, 'utf8'),
  write: (text) => {
    process.stdout.write(text);
  },
};

const USAGE = 'usage: evaluate <market_data.json> [--version <label>] [--dashboard]';

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      version: { type: 'string' },
      dashboard: { type: 'boolean', default: false },
    },
  });

export function runEvaluate(argv: string[], io: CliIo = defaultIo): number {
  let runtime: RuntimeConfig;
  try {
    runtime = loadRuntimeConfig(io.env);
  } catch (error) {
    (io.logger ?? createLogger()).error({ err: error }, 'invalid configuration');
    return 1;
  }
  const logger = io.logger ?? createLogger({ level: runtime.logging.level, pretty: runtime.logging.pretty });

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    logger.error({ err: error }, USAGE);
    return 2;
  }
  const { values, positionals } = args;

  const [path] = positionals;
  if (!path) {
    logger.error(USAGE);
    return 2;
  }

  try {
    const raw: unknown = JSON.parse(io.readFile(path));
    const aggregator = new MetricsAggregator(runtime.engine, { logger });
    const snapshot = aggregator.evaluate(raw, values.version);

    const output = values.dashboard
      ? buildDashboardView(snapshot, normaliseMarketData(raw, runtime.engine))
      : serializeSnapshot(snapshot);
    io.write(`${JSON.stringify(output, null, 2)}\n`);

    const riskiest = snapshot.creditProfiles[0];
    logger.info(
      `next meeting ${snapshot.rateResult.meetingDate}: hike ${formatPct(snapshot.rateResult.pHike, 1)}, ` +
        `cut ${formatPct(snapshot.rateResult.pCut, 1)}` +
        (riskiest
          ? `; riskiest issuer ${riskiest.issuerId} (5y PD ${formatPct(riskiest.pd5y)}, spread ${formatBps(riskiest.spread)})`
          : '')
    );
    return 0;
  } catch (error) {
    // Engine failures were already logged by the aggregator; this covers reading and parsing the file.
    if (!(error instanceof MarketMetricsError)) logger.error({ err: error, path }, 'could not load market data');
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = runEvaluate(process.argv.slice(2));
}
