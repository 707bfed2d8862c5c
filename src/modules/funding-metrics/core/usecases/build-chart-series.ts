import { type Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createDivisionError, type DivisionError } from '../errors.js';

import type {
  ChartDataPoint,
  ChartDefinition,
  ChartSeries,
  DerivedMetrics,
  FundingRecord,
} from '../types.js';

type RecordField =
  | 'giaGbpMillions'
  | 'voluntaryGbpMillions'
  | 'investmentGbpMillions'
  | 'servicesGbpMillions'
  | 'otherGbpMillions';

interface FundingSource {
  seriesId: string;
  label: string;
  field: RecordField;
}

const FUNDING_SOURCES: readonly FundingSource[] = [
  { seriesId: 'gia', label: 'Government (GIA)', field: 'giaGbpMillions' },
  { seriesId: 'voluntary', label: 'Voluntary/Donations', field: 'voluntaryGbpMillions' },
  { seriesId: 'investment', label: 'Investment Income', field: 'investmentGbpMillions' },
  { seriesId: 'services', label: 'Services Income', field: 'servicesGbpMillions' },
  { seriesId: 'other', label: 'Other', field: 'otherGbpMillions' },
];

const NON_GOVERNMENT_SOURCES = FUNDING_SOURCES.filter((source) =>
  ['voluntary', 'services', 'investment'].includes(source.seriesId)
);

const point = (year: number, value: Decimal): ChartDataPoint => ({
  x: String(year),
  y: value.toNumber(),
});

const seriesOf = (
  seriesId: string,
  label: string,
  records: readonly FundingRecord[],
  pick: (record: FundingRecord) => Decimal | null
): ChartSeries => {
  const data: ChartDataPoint[] = [];
  for (const record of records) {
    const value = pick(record);
    // Missing values are dropped, never plotted as zero
    if (value !== null) {
      data.push(point(record.year, value));
    }
  }
  return { seriesId, label, data };
};

const sourceSeries = (
  sources: readonly FundingSource[],
  records: readonly FundingRecord[]
): ChartSeries[] =>
  sources.map((source) =>
    seriesOf(source.seriesId, source.label, records, (record) => record[source.field])
  );

/**
 * Each source divided by the nominal total of its year.
 */
const buildProportionSeries = (
  records: readonly FundingRecord[]
): Result<ChartSeries[], DivisionError> => {
  const zeroNominal = records.find((record) => record.nominalGbpMillions.isZero());
  if (zeroNominal !== undefined) {
    return err(createDivisionError(zeroNominal.year, 'nominal_total'));
  }

  return ok(
    FUNDING_SOURCES.map((source) =>
      seriesOf(source.seriesId, source.label, records, (record) =>
        record[source.field].div(record.nominalGbpMillions)
      )
    )
  );
};

/**
 * Build chart-ready series for every view of the funding data.
 * Years are rendered as x labels, values converted to numbers.
 */
export const buildChartSeries = (
  records: readonly FundingRecord[],
  metrics: readonly DerivedMetrics[]
): Result<ChartDefinition[], DivisionError> => {
  const proportions = buildProportionSeries(records);
  if (proportions.isErr()) {
    return err(proportions.error);
  }

  const firstYear = records[0]?.year;
  const lastYear = records[records.length - 1]?.year;
  const range =
    firstYear !== undefined && lastYear !== undefined
      ? `${String(firstYear)}-${String(lastYear)}`
      : 'no data';

  return ok([
    {
      chartId: 'funding-composition',
      title: `Funding Sources Over Time (${range})`,
      subtitle: 'Composition of funding by source',
      yAxis: { label: 'Funding Amount (£ millions)', unit: 'gbp_millions' },
      series: sourceSeries(FUNDING_SOURCES, records),
    },
    {
      chartId: 'total-funding',
      title: 'Total Funding Over Time',
      subtitle: 'Nominal values in millions of pounds',
      yAxis: { label: 'Total Funding (£ millions)', unit: 'gbp_millions' },
      series: [
        seriesOf('nominal', 'Nominal (Current £)', records, (r) => r.nominalGbpMillions),
      ],
    },
    {
      chartId: 'nominal-vs-real',
      title: 'Funding: Nominal vs Real Values',
      subtitle: 'Current pounds vs inflation-adjusted (2000 baseline)',
      yAxis: { label: 'Funding (£ millions)', unit: 'gbp_millions' },
      series: [
        seriesOf('nominal', 'Nominal (Current £)', records, (r) => r.nominalGbpMillions),
        seriesOf('real', 'Real (2000 £)', records, (r) => r.totalY2000GbpMillions),
      ],
    },
    {
      chartId: 'gia-percent-of-peak',
      title: 'Government Funding Recovery: GIA as % of Peak',
      subtitle: 'How close is government funding to its historical peak?',
      yAxis: { label: 'GIA as % of Peak GIA', unit: 'ratio' },
      series: [seriesOf('gia_percent_of_peak', 'GIA', records, (r) => r.giaAsPercentOfPeakGia)],
    },
    {
      chartId: 'funding-proportions',
      title: 'Funding Sources: Changing Composition',
      subtitle: 'Share of nominal total by source',
      yAxis: { label: 'Percentage of Total Funding', unit: 'ratio' },
      series: proportions.value,
    },
    {
      chartId: 'non-government-income',
      title: 'Non-Government Income Streams Over Time',
      subtitle: 'Growth of income outside grant-in-aid',
      yAxis: { label: 'Amount (£ millions)', unit: 'gbp_millions' },
      series: sourceSeries(NON_GOVERNMENT_SOURCES, records),
    },
    {
      chartId: 'diversification-index',
      title: 'Revenue Diversification',
      subtitle: 'Higher values = less government dependent',
      yAxis: { label: 'Diversification Index', unit: 'index' },
      series: [
        {
          seriesId: 'diversification_index',
          label: 'Diversification Index',
          data: metrics.map((row) => point(row.year, row.diversificationIndex)),
        },
      ],
    },
    {
      chartId: 'services-income',
      title: 'Commercial Services Revenue',
      subtitle: 'Services income in millions of pounds',
      yAxis: { label: 'Services Income (£M)', unit: 'gbp_millions' },
      series: [seriesOf('services', 'Services Income', records, (r) => r.servicesGbpMillions)],
    },
  ]);
};
