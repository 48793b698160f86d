// =============================================================================
// Synthetic Market Data Generator
// Generates plausible bond snapshots, yield histories and curves
// =============================================================================

import {
  BondRecord,
  CURRENCIES,
  HistoricalPoint,
  PriceUpdate,
  RATINGS,
  SECTORS,
  YieldCurveData,
} from './types';
import { requireNonNegativeInteger, requirePositiveInteger } from './errors';
import {
  RandomSource,
  createRandomSource,
  pick,
  randomInt,
  roundTo,
  uniform,
} from './random';

export const PRIMARY_CURRENCY = 'USD';

export const ISSUE_SIZES = [500_000_000, 1_000_000_000, 2_000_000_000, 5_000_000_000] as const;

export const TENORS = [0.25, 0.5, 1, 2, 3, 5, 7, 10, 15, 20, 30] as const;

// Base curves, one rate per tenor (percent)
export const HIGH_RATE_CURVE = [3.5, 3.7, 3.9, 4.0, 4.1, 4.2, 4.3, 4.4, 4.5, 4.6, 4.7] as const;
export const LOW_RATE_CURVE = [2.5, 2.7, 2.9, 3.0, 3.1, 3.2, 3.3, 3.4, 3.5, 3.6, 3.7] as const;

// Yield premium over the maturity-driven base (percent)
const BBB_PREMIUM = 1.5;
const A_PREMIUM = 0.5;

const HISTORY_START_YIELD = 3.5;
const HISTORY_START_SPREAD = 50;

// Synthetic ISIN universe referenced by the live feed
const FEED_UNIVERSE_SIZE = 50;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface GeneratorOptions {
  random?: RandomSource;
  now?: () => Date;
}

/**
 * Price quote implied by a yield: par at 3%, 5 points per 1% of yield.
 */
export function priceFromYield(yieldValue: number): number {
  return 100 - (yieldValue - 3) * 5;
}

export function formatIsin(index: number): string {
  return `XS${String(index).padStart(10, '0')}`;
}

function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Synthetic Market Data Generator
 * Stateless apart from its random source; nothing here performs I/O.
 */
export class SyntheticMarketDataGenerator {
  readonly random: RandomSource;
  private readonly now: () => Date;

  constructor(options: GeneratorOptions = {}) {
    this.random = options.random ?? createRandomSource();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Generate a batch of bond records.
   * ISINs restart at XS0000000000 on every call.
   */
  generateBonds(count: number): BondRecord[] {
    requireNonNegativeInteger('count', count);

    const baseDate = this.now();
    const bonds: BondRecord[] = [];

    for (let i = 0; i < count; i++) {
      bonds.push(this.generateBond(i, baseDate));
    }

    return bonds;
  }

  /**
   * Generate a daily random-walk history ending today.
   * The walk is not mean-reverting and is not clamped.
   */
  generateHistoricalSeries(isin: string, days: number): HistoricalPoint[] {
    requirePositiveInteger('days', days);

    const end = this.now();
    let yieldValue = HISTORY_START_YIELD;
    let spread = HISTORY_START_SPREAD;
    const points: HistoricalPoint[] = [];

    for (let offset = days - 1; offset >= 0; offset--) {
      yieldValue += uniform(this.random, -0.05, 0.05);
      spread += randomInt(this.random, -2, 2);

      const emittedYield = roundTo(yieldValue, 3);
      points.push({
        date: toIsoDate(new Date(end.getTime() - offset * MS_PER_DAY)),
        yield_value: emittedYield,
        spread,
        price: roundTo(priceFromYield(emittedYield), 3),
      });
    }

    return points;
  }

  /**
   * Generate a yield curve. Only the primary currency gets the high-rate
   * shape; every other code, known or not, gets the low-rate shape.
   */
  generateYieldCurve(currency: string): YieldCurveData {
    const baseRates = currency === PRIMARY_CURRENCY ? HIGH_RATE_CURVE : LOW_RATE_CURVE;

    return {
      tenors: [...TENORS],
      yields: baseRates.map((rate) => roundTo(rate + uniform(this.random, -0.1, 0.1), 3)),
    };
  }

  /**
   * One sample for the live update feed
   */
  samplePriceUpdate(): PriceUpdate {
    return {
      type: 'price_update',
      isin: formatIsin(randomInt(this.random, 0, FEED_UNIVERSE_SIZE - 1)),
      yield: roundTo(uniform(this.random, 2, 6), 3),
      spread: randomInt(this.random, 10, 300),
      timestamp: this.now().toISOString(),
    };
  }

  /**
   * Build one record in a single pass so a caller never sees a partial bond
   */
  private generateBond(index: number, baseDate: Date): BondRecord {
    const rng = this.random;
    const maturityYears = randomInt(rng, 1, 30);
    const maturityDate = new Date(baseDate.getTime() + 365 * maturityYears * MS_PER_DAY);
    const sector = pick(rng, SECTORS);
    const rating = pick(rng, RATINGS);

    const yieldValue = roundTo(
      this.baseYield(maturityYears, rating) + uniform(rng, -0.5, 0.5),
      2
    );
    const displayCoupon = roundTo(uniform(rng, 1, 6), 2);

    return {
      isin: formatIsin(index),
      ticker: `${sector.slice(0, 3).toUpperCase()} ${displayCoupon}% ${maturityDate.getUTCFullYear()}`,
      coupon: roundTo(uniform(rng, 1, 6), 2),
      maturity: toIsoDate(maturityDate),
      yield_value: yieldValue,
      spread: randomInt(rng, 10, 300),
      duration: Math.max(0, roundTo(maturityYears * 0.85 + uniform(rng, -1, 1), 1)),
      rating,
      sector,
      currency: pick(rng, CURRENCIES),
      price: roundTo(priceFromYield(yieldValue) + uniform(rng, -2, 2), 2),
      issue_size: pick(rng, ISSUE_SIZES),
    };
  }

  /**
   * Base yield rises with maturity and with weaker ratings
   */
  private baseYield(maturityYears: number, rating: string): number {
    let base = 2.0 + maturityYears * 0.1;
    if (rating.includes('BBB')) {
      base += BBB_PREMIUM;
    } else if (rating.includes('A')) {
      base += A_PREMIUM;
    }
    return base;
  }
}
