import { type Static, Type } from '@sinclair/typebox';
import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Source file schema
// ─────────────────────────────────────────────────────────────────────────────

const NumericCell = Type.String({ description: 'Decimal value as string (No Float Rule)' });

/**
 * One CSV row as read from the source file, before numeric parsing.
 * Extra columns (inflation factors, y2000 breakdowns) are allowed and ignored.
 */
export const FundingCsvRowSchema = Type.Object({
  year: Type.String({ pattern: '^\\d{4}$' }),
  nominal_gbp_millions: NumericCell,
  gia_gbp_millions: NumericCell,
  voluntary_gbp_millions: NumericCell,
  investment_gbp_millions: NumericCell,
  services_gbp_millions: NumericCell,
  other_gbp_millions: NumericCell,
  total_y2000_gbp_millions: NumericCell,
  gia_as_percent_of_peak_gia: Type.Optional(
    Type.String({ description: "Fraction of peak GIA; 'NA' or empty when unknown" })
  ),
});

export type FundingCsvRowDTO = Static<typeof FundingCsvRowSchema>;

/** Column order used when writing records back to CSV. */
export const FUNDING_CSV_COLUMNS = [
  'year',
  'nominal_gbp_millions',
  'gia_gbp_millions',
  'voluntary_gbp_millions',
  'investment_gbp_millions',
  'services_gbp_millions',
  'other_gbp_millions',
  'total_y2000_gbp_millions',
  'gia_as_percent_of_peak_gia',
] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Domain types
// ─────────────────────────────────────────────────────────────────────────────

export interface FundingRecord {
  year: number;
  giaGbpMillions: Decimal;
  voluntaryGbpMillions: Decimal;
  investmentGbpMillions: Decimal;
  servicesGbpMillions: Decimal;
  otherGbpMillions: Decimal;
  /** Expected to be close to the sum of the five components; not enforced. */
  nominalGbpMillions: Decimal;
  /** Total funding restated in year-2000 pounds. */
  totalY2000GbpMillions: Decimal;
  /** Fraction in [0, 1]; null where the source has no value. */
  giaAsPercentOfPeakGia: Decimal | null;
}

export const FUNDING_PERIODS = ['Pre-Crisis', 'Austerity Era', 'Recovery Era'] as const;

export type FundingPeriod = (typeof FUNDING_PERIODS)[number];

export interface DerivedMetrics {
  readonly year: number;
  readonly period: FundingPeriod;
  readonly diversificationIndex: Decimal;
  readonly governmentDependency: Decimal;
  /** Null for the first year of a sequence. */
  readonly realChangePct: Decimal | null;
}

export interface PeriodAggregate {
  years: number;
  meanNominalGbpMillions: number;
  meanGovernmentDependencyPct: number;
  meanDiversificationIndex: number;
}

/**
 * Aggregates keyed by period. Only periods present in the input appear.
 */
export type PeriodSummary = Partial<Record<FundingPeriod, PeriodAggregate>>;

// ─────────────────────────────────────────────────────────────────────────────
// Chart-oriented types
// ─────────────────────────────────────────────────────────────────────────────

export type ChartId =
  | 'funding-composition'
  | 'total-funding'
  | 'nominal-vs-real'
  | 'gia-percent-of-peak'
  | 'funding-proportions'
  | 'non-government-income'
  | 'diversification-index'
  | 'services-income';

export type ChartUnit = 'gbp_millions' | 'ratio' | 'index';

/**
 * Data point for chart series (y as number at the presentation boundary).
 */
export interface ChartDataPoint {
  x: string;
  y: number;
}

export interface ChartSeries {
  seriesId: string;
  label: string;
  data: ChartDataPoint[];
}

export interface ChartDefinition {
  chartId: ChartId;
  title: string;
  subtitle: string;
  yAxis: {
    label: string;
    unit: ChartUnit;
  };
  series: ChartSeries[];
}

export interface FundingNarrative {
  latestYear: number;
  giaPercentOfPeak: number;
  giaBelowPeakPct: number;
  servicesPeakYear: number;
  servicesPeakGbpMillions: number;
  servicesLatestGbpMillions: number;
  servicesDeclineFromPeakPct: number;
  realChangeSinceStartPct: number;
  headlines: {
    government: string;
    services: string;
    purchasingPower: string;
  };
}

export type DashboardPanelId = 'A' | 'B' | 'C' | 'D';

export interface DashboardPanel {
  panelId: DashboardPanelId;
  chartId: ChartId;
  title: string;
  subtitle: string;
}

export interface Dashboard {
  title: string;
  subtitle: string;
  caption: string;
  firstYear: number;
  lastYear: number;
  panels: DashboardPanel[];
}

/**
 * Everything one analysis run produces, handed to the report sink.
 */
export interface FundingReport {
  records: FundingRecord[];
  metrics: DerivedMetrics[];
  periodSummary: PeriodSummary;
  charts: ChartDefinition[];
  narrative: FundingNarrative;
  dashboard: Dashboard;
}
