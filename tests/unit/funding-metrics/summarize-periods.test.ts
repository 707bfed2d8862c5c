import { describe, expect, it } from 'vitest';

import { deriveMetrics } from '@/modules/funding-metrics/core/usecases/derive-metrics.js';
import { summarizePeriods } from '@/modules/funding-metrics/core/usecases/summarize-periods.js';

import { makeFundingRecord } from '../../fixtures/builders.js';

describe('summarizePeriods', () => {
  const records = [
    // shares 0.5 / 0.5 → diversification 0.5, dependency 0.5
    makeFundingRecord({ year: 2005, gia: 50, voluntary: 50, investment: 0, services: 0, other: 0 }),
    // shares 0.5 / 1/6 / 1/6 / 1/6 → diversification 2/3, dependency 0.5
    makeFundingRecord({ year: 2009, gia: 60, voluntary: 20, investment: 20, services: 20, other: 0 }),
    // shares 0.7 / 0.1 / 0.1 / 0.1 → diversification 0.48, dependency 0.7
    makeFundingRecord({ year: 2012, gia: 91, voluntary: 13, investment: 13, services: 13, other: 0 }),
  ];

  it('groups by period and averages each group', () => {
    const metrics = deriveMetrics(records)._unsafeUnwrap();

    const summary = summarizePeriods(records, metrics)._unsafeUnwrap();

    expect(Object.keys(summary).sort()).toEqual(['Austerity Era', 'Pre-Crisis']);
    expect(summary['Pre-Crisis']).toEqual({
      years: 1,
      meanNominalGbpMillions: 100,
      meanGovernmentDependencyPct: 50,
      meanDiversificationIndex: 0.5,
    });
    expect(summary['Austerity Era']).toEqual({
      years: 2,
      meanNominalGbpMillions: 125,
      meanGovernmentDependencyPct: 60,
      meanDiversificationIndex: 0.573,
    });
    expect(summary['Recovery Era']).toBeUndefined();
  });

  it('rounds half up on exact decimals', () => {
    const pair = [
      makeFundingRecord({ year: 2016, nominal: '100.2' }),
      makeFundingRecord({ year: 2017, nominal: '100.3' }),
    ];
    const metrics = deriveMetrics(pair)._unsafeUnwrap();

    const summary = summarizePeriods(pair, metrics)._unsafeUnwrap();

    expect(summary['Recovery Era']?.meanNominalGbpMillions).toBe(100.3);
  });

  it('rejects metrics that do not line up with the records', () => {
    const metrics = deriveMetrics(records)._unsafeUnwrap();

    const shorter = summarizePeriods(records.slice(0, 2), metrics);
    expect(shorter._unsafeUnwrapErr().type).toBe('ValidationError');

    const reversed = summarizePeriods([...records].reverse(), metrics);
    expect(reversed._unsafeUnwrapErr()).toMatchObject({
      type: 'ValidationError',
      field: 'year',
      value: 2005,
    });
  });
});
