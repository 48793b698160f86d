// =============================================================================
// Market Data Provider
// Reference and history lookups. Only the mock source exists today;
// a vendor client would implement the same interface and take the API key.
// =============================================================================

import { BondRecord, HistoricalPoint } from './types';
import { ValidationError } from './errors';
import { SyntheticMarketDataGenerator } from './synthetic-gen';

export interface MarketDataProvider {
  readonly source: string;
  fetchBond(isin: string): BondRecord;
  fetchHistory(isin: string, startDate: string, endDate: string): HistoricalPoint[];
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function parseIsoDate(name: string, value: string): number {
  const time = ISO_DATE.test(value) ? Date.parse(`${value}T00:00:00Z`) : NaN;
  if (Number.isNaN(time)) {
    throw new ValidationError(`${name} must be a YYYY-MM-DD date, got "${value}"`);
  }
  return time;
}

/**
 * Number of days between two ISO dates (end exclusive)
 */
export function daysBetween(startDate: string, endDate: string): number {
  const start = parseIsoDate('start', startDate);
  const end = parseIsoDate('end', endDate);
  if (end < start) {
    throw new ValidationError(`end (${endDate}) must not precede start (${startDate})`);
  }
  return Math.round((end - start) / MS_PER_DAY);
}

/**
 * Provider backed by the synthetic generator
 */
export class MockMarketDataProvider implements MarketDataProvider {
  readonly source = 'Mock Data';

  constructor(private readonly generator: SyntheticMarketDataGenerator) {}

  fetchBond(isin: string): BondRecord {
    const [bond] = this.generator.generateBonds(1);
    return { ...bond, isin };
  }

  /**
   * A same-day range still yields one point so the chart has something to draw
   */
  fetchHistory(isin: string, startDate: string, endDate: string): HistoricalPoint[] {
    const days = Math.max(1, daysBetween(startDate, endDate));
    return this.generator.generateHistoricalSeries(isin, days);
  }
}
