// Repository / sink
export {
  createFundingCsvRepo,
  parseFundingRow,
  type FundingCsvRepoOptions,
} from './shell/repo/csv-repo.js';
export {
  createFsReportSink,
  toMetricsCsv,
  toRecordsCsv,
  type FsReportSinkOptions,
} from './shell/export/fs-report-sink.js';
export type { FundingRecordSource, FundingReportSink } from './core/ports.js';

// Pure metric functions
export {
  classifyPeriod,
  diversificationIndex,
  governmentDependency,
  realChangePct,
} from './core/logic.js';

// Use cases
export { deriveMetrics, validateRecordSequence } from './core/usecases/derive-metrics.js';
export { summarizePeriods } from './core/usecases/summarize-periods.js';
export { buildChartSeries } from './core/usecases/build-chart-series.js';
export { buildNarrative } from './core/usecases/build-narrative.js';
export { buildDashboard } from './core/usecases/build-dashboard.js';
export {
  runFundingAnalysis,
  type RunFundingAnalysisDeps,
  type FundingAnalysisOutcome,
} from './core/usecases/run-funding-analysis.js';

// Types
export {
  FUNDING_PERIODS,
  type FundingRecord,
  type FundingPeriod,
  type DerivedMetrics,
  type PeriodAggregate,
  type PeriodSummary,
  type ChartId,
  type ChartDefinition,
  type ChartSeries,
  type ChartDataPoint,
  type FundingNarrative,
  type Dashboard,
  type DashboardPanel,
  type FundingReport,
} from './core/types.js';

// Errors
export {
  createDivisionError,
  type DivisionError,
  type DivisionQuantity,
  type FundingMetricsError,
  type FundingRepoError,
  type FundingSinkError,
  type FundingAnalysisError,
} from './core/errors.js';
