import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createMissingValueError,
  createValidationError,
} from '../../../../common/types/errors.js';
import { createDivisionError, type FundingMetricsError } from '../errors.js';
import { roundTo } from '../logic.js';

import type { FundingNarrative, FundingRecord } from '../types.js';

const HUNDRED = new Decimal(100);

/**
 * Earliest record holding the highest services income.
 */
const findServicesPeak = (records: readonly FundingRecord[]): FundingRecord | undefined => {
  let peak: FundingRecord | undefined;
  for (const record of records) {
    if (peak === undefined || record.servicesGbpMillions.greaterThan(peak.servicesGbpMillions)) {
      peak = record;
    }
  }
  return peak;
};

const governmentHeadline = (belowPeakPct: number): string =>
  belowPeakPct > 0 ? `Still ${String(belowPeakPct)}% below historical peak` : 'At historical peak';

const servicesHeadline = (declinePct: number): string =>
  declinePct > 0 ? `${String(declinePct)}% decline since peak` : 'At peak level';

const purchasingPowerHeadline = (changePct: number, sinceYear: number): string =>
  changePct < 0
    ? `Real-terms funding down ${String(Math.abs(changePct))}% since ${String(sinceYear)}`
    : `Real-terms funding up ${String(changePct)}% since ${String(sinceYear)}`;

/**
 * Headline figures for the most recent year of the sequence.
 *
 * The latest year must carry a GIA-as-share-of-peak value; a missing value
 * fails the narrative instead of falling back to a default.
 */
export const buildNarrative = (
  records: readonly FundingRecord[]
): Result<FundingNarrative, FundingMetricsError> => {
  const first = records[0];
  const latest = records[records.length - 1];
  const servicesPeak = findServicesPeak(records);
  if (first === undefined || latest === undefined || servicesPeak === undefined) {
    return err(createValidationError('At least one funding record is required', 'records'));
  }

  const giaShare = latest.giaAsPercentOfPeakGia;
  if (giaShare === null) {
    return err(createMissingValueError('gia_as_percent_of_peak_gia', latest.year));
  }

  const peakServices = servicesPeak.servicesGbpMillions;
  if (peakServices.isZero()) {
    return err(createDivisionError(servicesPeak.year, 'services_peak'));
  }

  const firstReal = first.totalY2000GbpMillions;
  if (firstReal.isZero()) {
    return err(createDivisionError(first.year, 'first_real_total'));
  }

  const giaBelowPeakPct = roundTo(new Decimal(1).minus(giaShare).mul(HUNDRED), 0);
  const servicesDeclineFromPeakPct = roundTo(
    peakServices.minus(latest.servicesGbpMillions).div(peakServices).mul(HUNDRED),
    0
  );
  const realChangeSinceStartPct = roundTo(
    latest.totalY2000GbpMillions.minus(firstReal).div(firstReal).mul(HUNDRED),
    1
  );

  return ok({
    latestYear: latest.year,
    giaPercentOfPeak: giaShare.toNumber(),
    giaBelowPeakPct,
    servicesPeakYear: servicesPeak.year,
    servicesPeakGbpMillions: peakServices.toNumber(),
    servicesLatestGbpMillions: latest.servicesGbpMillions.toNumber(),
    servicesDeclineFromPeakPct,
    realChangeSinceStartPct,
    headlines: {
      government: governmentHeadline(giaBelowPeakPct),
      services: servicesHeadline(servicesDeclineFromPeakPct),
      purchasingPower: purchasingPowerHeadline(realChangeSinceStartPct, first.year),
    },
  });
};
