import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '../../../../common/types/errors.js';
import { mean, roundTo } from '../logic.js';

import type {
  DerivedMetrics,
  FundingPeriod,
  FundingRecord,
  PeriodAggregate,
  PeriodSummary,
} from '../types.js';

interface PeriodBucket {
  nominal: Decimal[];
  dependency: Decimal[];
  diversification: Decimal[];
}

const HUNDRED = new Decimal(100);

/**
 * Aggregate derived metrics per period.
 *
 * For each period present in the input:
 * - mean nominal funding, 1 decimal
 * - mean government dependency as a percentage, 1 decimal
 * - mean diversification index, 3 decimals
 *
 * `records` and `metrics` must describe the same years in the same order.
 */
export const summarizePeriods = (
  records: readonly FundingRecord[],
  metrics: readonly DerivedMetrics[]
): Result<PeriodSummary, ValidationError> => {
  if (records.length !== metrics.length) {
    return err(
      createValidationError(
        `Expected one metrics row per record, got ${String(metrics.length)} for ${String(records.length)}`,
        'metrics'
      )
    );
  }

  const buckets = new Map<FundingPeriod, PeriodBucket>();

  for (const [index, row] of metrics.entries()) {
    const record = records[index];
    if (record?.year !== row.year) {
      return err(
        createValidationError(
          `Metrics for year ${String(row.year)} are not aligned with the funding records`,
          'year',
          row.year
        )
      );
    }

    let bucket = buckets.get(row.period);
    if (bucket === undefined) {
      bucket = { nominal: [], dependency: [], diversification: [] };
      buckets.set(row.period, bucket);
    }

    bucket.nominal.push(record.nominalGbpMillions);
    bucket.dependency.push(row.governmentDependency);
    bucket.diversification.push(row.diversificationIndex);
  }

  const summary: PeriodSummary = {};
  for (const [period, bucket] of buckets) {
    const aggregate: PeriodAggregate = {
      years: bucket.nominal.length,
      meanNominalGbpMillions: roundTo(mean(bucket.nominal), 1),
      meanGovernmentDependencyPct: roundTo(mean(bucket.dependency).mul(HUNDRED), 1),
      meanDiversificationIndex: roundTo(mean(bucket.diversification), 3),
    };
    summary[period] = aggregate;
  }

  return ok(summary);
};
