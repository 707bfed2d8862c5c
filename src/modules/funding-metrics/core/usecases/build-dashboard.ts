import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '../../../../common/types/errors.js';

import type {
  ChartDefinition,
  ChartId,
  Dashboard,
  DashboardPanel,
  DashboardPanelId,
  FundingNarrative,
} from '../types.js';

interface PanelLayout {
  panelId: DashboardPanelId;
  chartId: ChartId;
  title: string;
  subtitle: (narrative: FundingNarrative) => string;
}

const PANEL_LAYOUT: readonly PanelLayout[] = [
  {
    panelId: 'A',
    chartId: 'gia-percent-of-peak',
    title: 'A) Government Funding Recovery',
    subtitle: (narrative) => narrative.headlines.government,
  },
  {
    panelId: 'B',
    chartId: 'diversification-index',
    title: 'B) Revenue Diversification',
    subtitle: () => 'Higher values = less government dependent',
  },
  {
    panelId: 'C',
    chartId: 'services-income',
    title: 'C) Commercial Services Revenue',
    subtitle: (narrative) => narrative.headlines.services,
  },
  {
    panelId: 'D',
    chartId: 'nominal-vs-real',
    title: 'D) Purchasing Power Erosion',
    subtitle: (narrative) => narrative.headlines.purchasingPower,
  },
];

/**
 * Compose the four-panel dashboard (A-D) from previously built charts.
 * Every referenced chart must be present in `charts`.
 */
export const buildDashboard = (
  charts: readonly ChartDefinition[],
  narrative: FundingNarrative,
  firstYear: number
): Result<Dashboard, ValidationError> => {
  const available = new Set(charts.map((chart) => chart.chartId));
  const panels: DashboardPanel[] = [];

  for (const layout of PANEL_LAYOUT) {
    if (!available.has(layout.chartId)) {
      return err(
        createValidationError(
          `Dashboard panel ${layout.panelId} needs chart '${layout.chartId}'`,
          'charts',
          layout.chartId
        )
      );
    }

    panels.push({
      panelId: layout.panelId,
      chartId: layout.chartId,
      title: layout.title,
      subtitle: layout.subtitle(narrative),
    });
  }

  const span = narrative.latestYear - firstYear;

  return ok({
    title: `Institutional Funding: ${String(span)} Years of Adaptation (${String(firstYear)}-${String(narrative.latestYear)})`,
    subtitle: 'How cultural institutions navigate austerity and changing revenue landscapes',
    caption: 'Funding analysis: government dependency, diversification and real-terms change',
    firstYear,
    lastYear: narrative.latestYear,
    panels,
  });
};
