import { err, ok, type Result } from 'neverthrow';

import { buildChartSeries } from './build-chart-series.js';
import { buildDashboard } from './build-dashboard.js';
import { buildNarrative } from './build-narrative.js';
import { deriveMetrics } from './derive-metrics.js';
import { summarizePeriods } from './summarize-periods.js';

import type { FundingAnalysisError } from '../errors.js';
import type { FundingRecordSource, FundingReportSink } from '../ports.js';
import type { FundingReport } from '../types.js';
import type { Logger } from 'pino';

export interface RunFundingAnalysisDeps {
  source: FundingRecordSource;
  sink: FundingReportSink;
  logger: Logger;
}

export interface FundingAnalysisOutcome {
  report: FundingReport;
  artifacts: string[];
}

/**
 * Run the whole analysis: load → derive → summarize → chart → export.
 *
 * The report is only written once every step has succeeded.
 */
export const runFundingAnalysis = async (
  deps: RunFundingAnalysisDeps
): Promise<Result<FundingAnalysisOutcome, FundingAnalysisError>> => {
  const log = deps.logger.child({ usecase: 'run-funding-analysis' });

  const recordsResult = await deps.source.loadAll();
  if (recordsResult.isErr()) {
    log.error({ error: recordsResult.error }, 'Failed to load funding records');
    return err(recordsResult.error);
  }
  const records = recordsResult.value;
  log.info({ count: records.length }, 'Loaded funding records');

  const metricsResult = deriveMetrics(records);
  if (metricsResult.isErr()) {
    log.error({ error: metricsResult.error }, 'Failed to derive metrics');
    return err(metricsResult.error);
  }
  const metrics = metricsResult.value;

  const summaryResult = summarizePeriods(records, metrics);
  if (summaryResult.isErr()) {
    return err(summaryResult.error);
  }

  const chartsResult = buildChartSeries(records, metrics);
  if (chartsResult.isErr()) {
    log.error({ error: chartsResult.error }, 'Failed to build chart series');
    return err(chartsResult.error);
  }

  const narrativeResult = buildNarrative(records);
  if (narrativeResult.isErr()) {
    log.error({ error: narrativeResult.error }, 'Failed to build narrative');
    return err(narrativeResult.error);
  }

  const firstYear = records[0]?.year ?? narrativeResult.value.latestYear;
  const dashboardResult = buildDashboard(chartsResult.value, narrativeResult.value, firstYear);
  if (dashboardResult.isErr()) {
    return err(dashboardResult.error);
  }

  const report: FundingReport = {
    records,
    metrics,
    periodSummary: summaryResult.value,
    charts: chartsResult.value,
    narrative: narrativeResult.value,
    dashboard: dashboardResult.value,
  };

  const writeResult = await deps.sink.write(report);
  if (writeResult.isErr()) {
    log.error({ error: writeResult.error }, 'Failed to write report');
    return err(writeResult.error);
  }

  log.info({ artifacts: writeResult.value.length }, 'Funding analysis complete');

  return ok({ report, artifacts: writeResult.value });
};
