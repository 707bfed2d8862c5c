import { describe, expect, it } from 'vitest';

import { buildChartSeries } from '@/modules/funding-metrics/core/usecases/build-chart-series.js';
import { buildDashboard } from '@/modules/funding-metrics/core/usecases/build-dashboard.js';
import { buildNarrative } from '@/modules/funding-metrics/core/usecases/build-narrative.js';
import { deriveMetrics } from '@/modules/funding-metrics/core/usecases/derive-metrics.js';

import { makeFundingRecord } from '../../fixtures/builders.js';

describe('buildDashboard', () => {
  const records = [
    makeFundingRecord({ year: 1998, services: 40, real: 250, giaPercentOfPeak: 1 }),
    makeFundingRecord({ year: 2023, services: 20, real: 200, giaPercentOfPeak: '0.7' }),
  ];
  const metrics = deriveMetrics(records)._unsafeUnwrap();
  const charts = buildChartSeries(records, metrics)._unsafeUnwrap();
  const narrative = buildNarrative(records)._unsafeUnwrap();

  it('lays out panels A-D with narrative subtitles', () => {
    const dashboard = buildDashboard(charts, narrative, 1998)._unsafeUnwrap();

    expect(dashboard.title).toBe('Institutional Funding: 25 Years of Adaptation (1998-2023)');
    expect(dashboard.firstYear).toBe(1998);
    expect(dashboard.lastYear).toBe(2023);
    expect(dashboard.panels).toEqual([
      {
        panelId: 'A',
        chartId: 'gia-percent-of-peak',
        title: 'A) Government Funding Recovery',
        subtitle: 'Still 30% below historical peak',
      },
      {
        panelId: 'B',
        chartId: 'diversification-index',
        title: 'B) Revenue Diversification',
        subtitle: 'Higher values = less government dependent',
      },
      {
        panelId: 'C',
        chartId: 'services-income',
        title: 'C) Commercial Services Revenue',
        subtitle: '50% decline since peak',
      },
      {
        panelId: 'D',
        chartId: 'nominal-vs-real',
        title: 'D) Purchasing Power Erosion',
        subtitle: 'Real-terms funding down 20% since 1998',
      },
    ]);
  });

  it('rejects a chart set missing a panel chart', () => {
    const partial = charts.filter((chart) => chart.chartId !== 'services-income');

    const error = buildDashboard(partial, narrative, 1998)._unsafeUnwrapErr();

    expect(error).toMatchObject({
      type: 'ValidationError',
      message: "Dashboard panel C needs chart 'services-income'",
    });
  });
});
