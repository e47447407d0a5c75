// src/services/ConversionReportService.ts
import type { IFunnelEntryStore } from '../contracts/dao';
import type { FunnelConversion, FunnelType } from '../contracts/domain';
import { formatPercent } from '../delegates/ConversionRate';

export type ReportPeriod = { from?: Date; to?: Date };

const DAY_MS = 24 * 60 * 60 * 1000;

export class ConversionReportService {
  constructor(
    private readonly entries: IFunnelEntryStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Last `days` days up to now (exclusive); 0 or less means all time. */
  buildPeriod(days: number): ReportPeriod {
    if (!Number.isFinite(days) || days <= 0) return {};
    const to = this.now();
    return { from: new Date(to.getTime() - days * DAY_MS), to };
  }

  // A requested funnel with no entries still gets a zero row.
  report(period: ReportPeriod = {}, funnelType?: FunnelType): FunnelConversion[] {
    const rows = this.entries.aggregateConversion(period.from, period.to);
    if (!funnelType) return rows;
    const row = rows.find((r) => r.funnelType === funnelType);
    return [row ?? { funnelType, totalEntries: 0, totalPurchased: 0, conversionRate: 0 }];
  }

  formatReport(rows: FunnelConversion[], days: number): string[] {
    const header = days > 0 ? `Funnel conversion (last ${days} days)` : 'Funnel conversion (all time)';
    if (rows.length === 0) return [header, '  no funnel entries'];
    return [
      header,
      ...rows.map(
        (r) =>
          `  ${r.funnelType}: entries=${r.totalEntries} purchased=${r.totalPurchased} conversion=${formatPercent(r.conversionRate)}`,
      ),
    ];
  }
}
