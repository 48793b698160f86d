// =============================================================================
// Bond Analytics
// Display-grade figures only; none of these are real risk calculations
// =============================================================================

import { BondRecord, MarketOverview } from './types';
import { requireNonNegativeInteger } from './errors';
import { RandomSource, roundTo, uniform } from './random';

export const DEFAULT_HOLDING_DAYS = 30;

/**
 * Total return over a holding period, in percent.
 * Coupon carry is real; the price component is a random +/-2% draw.
 */
export function totalReturn(
  bond: Pick<BondRecord, 'coupon'>,
  holdingDays: number,
  random: RandomSource
): number {
  requireNonNegativeInteger('holdingDays', holdingDays);

  const couponIncome = (bond.coupon / 100) * (holdingDays / 365);
  const priceReturn = uniform(random, -0.02, 0.02);
  return roundTo((couponIncome + priceReturn) * 100, 2);
}

/**
 * Spread change in basis points
 */
export function spreadChange(current: number, historical: number): number {
  return current - historical;
}

/**
 * Headline figures shown on the dashboard cards
 */
export function marketOverview(): MarketOverview {
  return {
    metrics: [
      { label: '10Y US Treasury', value: 4.25, unit: '%', change: 5, change_unit: 'bps' },
      { label: 'IG Spread', value: 125, unit: 'bps', change: -3, change_unit: 'bps' },
      { label: 'HY Spread', value: 425, unit: 'bps', change: 8, change_unit: 'bps' },
      { label: 'EUR/USD', value: 1.0875, unit: 'rate', change: -0.25, change_unit: '%' },
    ],
    portfolio: {
      average_yield: 4.35,
      average_duration: 7.2,
      average_rating: 'A+',
      total_return_ytd: 3.45,
      sharpe_ratio: 1.23,
    },
  };
}
