/**
 * Funding analysis script
 *
 * Loads yearly funding figures from a CSV file, derives metrics, and writes
 * processed data, chart series and the dashboard description to OUTPUT_DIR.
 *
 * Usage:
 *   FUNDING_DATA_PATH=data/funding.csv OUTPUT_DIR=output tsx scripts/analyze-funding.ts
 */

import path from 'node:path';

import { createConfig, parseEnv } from '../src/infra/config/env.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  FUNDING_PERIODS,
  createFsReportSink,
  createFundingCsvRepo,
  runFundingAnalysis,
} from '../src/modules/funding-metrics/index.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger(config.logger);

  const dataPath = path.resolve(process.cwd(), config.analysis.dataPath);
  const outputDir = path.resolve(process.cwd(), config.analysis.outputDir);

  logger.info({ dataPath, outputDir }, 'Starting funding analysis');

  const result = await runFundingAnalysis({
    source: createFundingCsvRepo({ filePath: dataPath }),
    sink: createFsReportSink({ outputDir }),
    logger,
  });

  if (result.isErr()) {
    logger.fatal({ error: result.error }, result.error.message);
    process.exitCode = 1;
    return;
  }

  const { report, artifacts } = result.value;

  for (const period of FUNDING_PERIODS) {
    const aggregate = report.periodSummary[period];
    if (aggregate === undefined) continue;
    logger.info(
      {
        period,
        years: aggregate.years,
        meanNominalGbpMillions: aggregate.meanNominalGbpMillions,
        meanGovernmentDependencyPct: aggregate.meanGovernmentDependencyPct,
        meanDiversificationIndex: aggregate.meanDiversificationIndex,
      },
      'Period summary'
    );
  }

  logger.info({ headlines: report.narrative.headlines }, 'Narrative');
  logger.info({ count: artifacts.length, outputDir }, 'Files saved');
};

await main().catch((error: unknown) => {
  console.error((error as Error).message);
  process.exit(1);
});
