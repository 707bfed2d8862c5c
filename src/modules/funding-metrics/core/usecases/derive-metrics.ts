import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '../../../../common/types/errors.js';
import {
  classifyPeriod,
  diversificationIndex,
  governmentDependency,
  realChangePct,
} from '../logic.js';

import type { FundingMetricsError } from '../errors.js';
import type { DerivedMetrics, FundingRecord } from '../types.js';
import type { Decimal } from 'decimal.js';

const AMOUNT_FIELDS = [
  'giaGbpMillions',
  'voluntaryGbpMillions',
  'investmentGbpMillions',
  'servicesGbpMillions',
  'otherGbpMillions',
  'nominalGbpMillions',
  'totalY2000GbpMillions',
] as const;

const isBelowZero = (value: Decimal): boolean => value.isNegative() && !value.isZero();

const findNegativeAmount = (record: FundingRecord): string | undefined => {
  const field = AMOUNT_FIELDS.find((name) => isBelowZero(record[name]));
  if (field !== undefined) {
    return field;
  }
  const share = record.giaAsPercentOfPeakGia;
  return share !== null && isBelowZero(share) ? 'giaAsPercentOfPeakGia' : undefined;
};

/**
 * Checks the input contract: non-empty, integer years, strictly ascending,
 * no negative amounts. Strict ordering also rules out duplicate years.
 */
export const validateRecordSequence = (
  records: readonly FundingRecord[]
): Result<readonly FundingRecord[], ValidationError> => {
  if (records.length === 0) {
    return err(createValidationError('At least one funding record is required', 'records'));
  }

  let previousYear: number | undefined;
  for (const record of records) {
    if (!Number.isInteger(record.year)) {
      return err(createValidationError('Year must be an integer', 'year', record.year));
    }
    if (previousYear !== undefined) {
      if (record.year === previousYear) {
        return err(
          createValidationError(`Duplicate year ${String(record.year)}`, 'year', record.year)
        );
      }
      if (record.year < previousYear) {
        return err(
          createValidationError(
            `Years must be sorted ascending: ${String(record.year)} follows ${String(previousYear)}`,
            'year',
            record.year
          )
        );
      }
    }
    const negativeField = findNegativeAmount(record);
    if (negativeField !== undefined) {
      return err(
        createValidationError(
          `${negativeField} must not be negative for year ${String(record.year)}`,
          negativeField,
          record.year
        )
      );
    }
    previousYear = record.year;
  }

  return ok(records);
};

/**
 * Derive per-year metrics in a single forward pass.
 *
 * Processing:
 * 1. Validate ordering of the input sequence
 * 2. For each record: period, diversification index, government dependency
 * 3. Percent change against the previous record's real total
 *
 * The first failing year stops the pass; no partial output is returned.
 */
export const deriveMetrics = (
  records: readonly FundingRecord[]
): Result<DerivedMetrics[], FundingMetricsError> => {
  const validated = validateRecordSequence(records);
  if (validated.isErr()) {
    return err(validated.error);
  }

  const metrics: DerivedMetrics[] = [];

  for (const [index, record] of records.entries()) {
    const diversification = diversificationIndex(record);
    if (diversification.isErr()) {
      return err(diversification.error);
    }

    const dependency = governmentDependency(record);
    if (dependency.isErr()) {
      return err(dependency.error);
    }

    const realChange = realChangePct(records, index);
    if (realChange.isErr()) {
      return err(realChange.error);
    }

    metrics.push({
      year: record.year,
      period: classifyPeriod(record.year),
      diversificationIndex: diversification.value,
      governmentDependency: dependency.value,
      realChangePct: realChange.value,
    });
  }

  return ok(metrics);
};
