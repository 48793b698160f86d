// =============================================================================
// Bond Dashboard Types
// =============================================================================

export const SECTORS = [
  'Government',
  'Corporate IG',
  'Corporate HY',
  'Municipal',
  'Agency',
  'Sovereign',
] as const;

// Highest to lowest credit quality
export const RATINGS = [
  'AAA',
  'AA+',
  'AA',
  'AA-',
  'A+',
  'A',
  'A-',
  'BBB+',
  'BBB',
  'BBB-',
] as const;

export const CURRENCIES = ['USD', 'EUR', 'GBP', 'JPY', 'CHF'] as const;

export type Sector = (typeof SECTORS)[number];
export type Rating = (typeof RATINGS)[number];
export type Currency = (typeof CURRENCIES)[number];

// =============================================================================
// Market Data Types
// =============================================================================

/**
 * One synthetic fixed-income instrument snapshot.
 * Field names match the JSON served to the dashboard.
 */
export interface BondRecord {
  isin: string;
  ticker: string;
  coupon: number;        // Percent
  maturity: string;      // YYYY-MM-DD
  yield_value: number;   // Percent, 2 dp
  spread: number;        // Basis points
  duration: number;      // Years, 1 dp
  rating: Rating;
  sector: Sector;
  currency: Currency;
  price: number;
  issue_size: number;
}

export interface StoredBond extends BondRecord {
  last_updated: string;
}

export interface HistoricalPoint {
  date: string;
  yield_value: number;
  spread: number;
  price: number;
}

export interface YieldCurveData {
  tenors: number[];
  yields: number[];
}

export interface PriceUpdate {
  type: 'price_update';
  isin: string;
  yield: number;
  spread: number;
  timestamp: string;
}

// =============================================================================
// Client Preference Types
// =============================================================================

export interface ClientPreferences {
  watchlist: string[];
  sectors: string[];
  duration_range: [number, number];
  min_rating: Rating;
  alert_thresholds: Record<string, number>;
}

export interface AlertSetting {
  alert_type: string;
  threshold: number;
}

export interface StoredAlert extends AlertSetting {
  id: number;
  user_id: string;
  triggered_at: string | null;
}

// =============================================================================
// Response Types
// =============================================================================

export interface BondsResponse {
  bonds: BondRecord[];
  count: number;
  last_updated: string;
  source: string;
}

export interface HistoricalResponse {
  isin: string;
  dates: string[];
  yields: number[];
  spreads: number[];
  prices: number[];
}

export interface MetricCard {
  label: string;
  value: number;
  unit: '%' | 'bps' | 'rate';
  change: number;
  change_unit: 'bps' | '%';
}

export interface PortfolioMetrics {
  average_yield: number;
  average_duration: number;
  average_rating: Rating;
  total_return_ytd: number;
  sharpe_ratio: number;
}

export interface MarketOverview {
  metrics: MetricCard[];
  portfolio: PortfolioMetrics;
}
