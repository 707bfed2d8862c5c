import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '../../../common/types/errors.js';
import { createDivisionError, type DivisionError } from './errors.js';

import type { FundingPeriod, FundingRecord } from './types.js';

const ONE = new Decimal(1);
const HUNDRED = new Decimal(100);

/**
 * Classifies a calendar year into one of the three analysis periods.
 * Boundaries are inclusive: 2007 is Pre-Crisis, 2008 and 2015 are Austerity Era,
 * 2016 is Recovery Era.
 */
export function classifyPeriod(year: number): FundingPeriod {
  if (year <= 2007) return 'Pre-Crisis';
  if (year <= 2015) return 'Austerity Era';
  return 'Recovery Era';
}

/**
 * The four income categories used for the concentration measure.
 * "Other" income is excluded.
 */
export function incomeComponents(record: FundingRecord): Decimal[] {
  return [
    record.giaGbpMillions,
    record.voluntaryGbpMillions,
    record.investmentGbpMillions,
    record.servicesGbpMillions,
  ];
}

/**
 * 1 minus the sum of squared income shares (Herfindahl-style concentration).
 * Ranges from 0 (single source) to 0.75 (four equal sources).
 */
export function diversificationIndex(record: FundingRecord): Result<Decimal, DivisionError> {
  const components = incomeComponents(record);
  const total = Decimal.sum(...components);

  if (total.isZero()) {
    return err(createDivisionError(record.year, 'income_total'));
  }

  const concentration = components.reduce(
    (acc, component) => acc.plus(component.div(total).pow(2)),
    new Decimal(0)
  );

  return ok(ONE.minus(concentration));
}

/**
 * Share of nominal funding that comes from grant-in-aid.
 */
export function governmentDependency(record: FundingRecord): Result<Decimal, DivisionError> {
  if (record.nominalGbpMillions.isZero()) {
    return err(createDivisionError(record.year, 'nominal_total'));
  }
  return ok(record.giaGbpMillions.div(record.nominalGbpMillions));
}

/**
 * Year-over-year percentage change of the inflation-adjusted total.
 * The first record has no predecessor and yields null.
 *
 * Note: This assumes records are sorted chronologically.
 */
export function realChangePct(
  records: readonly FundingRecord[],
  index: number
): Result<Decimal | null, DivisionError | ValidationError> {
  const current = records[index];
  if (current === undefined) {
    return err(
      createValidationError(
        `Index ${String(index)} is outside a sequence of ${String(records.length)} records`,
        'index',
        index
      )
    );
  }

  const previous = index > 0 ? records[index - 1] : undefined;
  if (previous === undefined) {
    return ok(null);
  }

  const prevReal = previous.totalY2000GbpMillions;
  if (prevReal.isZero()) {
    return err(createDivisionError(current.year, 'previous_real_total'));
  }

  return ok(current.totalY2000GbpMillions.minus(prevReal).div(prevReal).mul(HUNDRED));
}

/**
 * Arithmetic mean of a non-empty list of decimals.
 */
export function mean(values: readonly Decimal[]): Decimal {
  return Decimal.sum(...values).div(values.length);
}

export function roundTo(value: Decimal, decimalPlaces: number): number {
  return value.toDecimalPlaces(decimalPlaces, Decimal.ROUND_HALF_UP).toNumber();
}
