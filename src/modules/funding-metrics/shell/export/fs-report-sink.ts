import fs from 'node:fs/promises';
import path from 'node:path';

import { stringify } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '../../../../common/types/errors.js';
import { FUNDING_CSV_COLUMNS } from '../../core/types.js';

import type { FundingSinkError } from '../../core/errors.js';
import type { FundingReportSink } from '../../core/ports.js';
import type { DerivedMetrics, FundingRecord, FundingReport } from '../../core/types.js';
import type { Decimal } from 'decimal.js';

export interface FsReportSinkOptions {
  outputDir: string;
}

const METRICS_CSV_COLUMNS = [
  ...FUNDING_CSV_COLUMNS,
  'period',
  'diversification_index',
  'government_dependency',
  'real_change_pct',
] as const;

type CsvRow = Record<string, string>;

/** Plain notation; empty cell for a missing value. */
const formatDecimal = (value: Decimal | null): string => (value === null ? '' : value.toFixed());

const toRecordRow = (record: FundingRecord): CsvRow => ({
  year: String(record.year),
  nominal_gbp_millions: formatDecimal(record.nominalGbpMillions),
  gia_gbp_millions: formatDecimal(record.giaGbpMillions),
  voluntary_gbp_millions: formatDecimal(record.voluntaryGbpMillions),
  investment_gbp_millions: formatDecimal(record.investmentGbpMillions),
  services_gbp_millions: formatDecimal(record.servicesGbpMillions),
  other_gbp_millions: formatDecimal(record.otherGbpMillions),
  total_y2000_gbp_millions: formatDecimal(record.totalY2000GbpMillions),
  gia_as_percent_of_peak_gia: formatDecimal(record.giaAsPercentOfPeakGia),
});

const toMetricsRow = (record: FundingRecord, metrics: DerivedMetrics): CsvRow => ({
  ...toRecordRow(record),
  period: metrics.period,
  diversification_index: formatDecimal(metrics.diversificationIndex),
  government_dependency: formatDecimal(metrics.governmentDependency),
  real_change_pct: formatDecimal(metrics.realChangePct),
});

export const toRecordsCsv = (records: readonly FundingRecord[]): string =>
  stringify(records.map(toRecordRow), { header: true, columns: [...FUNDING_CSV_COLUMNS] });

export const toMetricsCsv = (
  records: readonly FundingRecord[],
  metrics: readonly DerivedMetrics[]
): Result<string, ValidationError> => {
  if (records.length !== metrics.length) {
    return err(
      createValidationError(
        `Expected one metrics row per record, got ${String(metrics.length)} for ${String(records.length)}`,
        'metrics'
      )
    );
  }

  const rows: CsvRow[] = [];
  for (const [index, record] of records.entries()) {
    const row = metrics[index];
    if (row?.year !== record.year) {
      return err(
        createValidationError(
          `No metrics row lines up with the record for year ${String(record.year)}`,
          'year',
          record.year
        )
      );
    }
    rows.push(toMetricsRow(record, row));
  }

  return ok(stringify(rows, { header: true, columns: [...METRICS_CSV_COLUMNS] }));
};

/**
 * Writes a funding report under `outputDir`:
 *
 *   data/processed/records.csv   parsed input records
 *   data/processed/metrics.csv   records joined with derived metrics
 *   outputs/charts/<chartId>.json
 *   outputs/dashboard.json
 */
export const createFsReportSink = (options: FsReportSinkOptions): FundingReportSink => {
  const root = path.resolve(options.outputDir);

  const writeFile = async (
    relativePath: string,
    contents: string
  ): Promise<Result<string, FundingSinkError>> => {
    const target = path.join(root, relativePath);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, contents, 'utf8');
      return ok(target);
    } catch (error) {
      return err({
        type: 'WriteError',
        message: `Failed to write ${target}: ${(error as Error).message}`,
        path: target,
      });
    }
  };

  return {
    async write(report: FundingReport): Promise<Result<string[], FundingSinkError>> {
      const metricsCsv = toMetricsCsv(report.records, report.metrics);
      if (metricsCsv.isErr()) {
        return err(metricsCsv.error);
      }

      const files: [string, string][] = [
        [path.join('data', 'processed', 'records.csv'), toRecordsCsv(report.records)],
        [path.join('data', 'processed', 'metrics.csv'), metricsCsv.value],
        ...report.charts.map((chart): [string, string] => [
          path.join('outputs', 'charts', `${chart.chartId}.json`),
          JSON.stringify(chart, null, 2),
        ]),
        [
          path.join('outputs', 'dashboard.json'),
          JSON.stringify(
            {
              dashboard: report.dashboard,
              narrative: report.narrative,
              periodSummary: report.periodSummary,
            },
            null,
            2
          ),
        ],
      ];

      const written: string[] = [];
      for (const [relativePath, contents] of files) {
        const result = await writeFile(relativePath, contents);
        if (result.isErr()) {
          return err(result.error);
        }
        written.push(result.value);
      }

      return ok(written);
    },
  };
};
