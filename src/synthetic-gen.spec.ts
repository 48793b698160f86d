import { describe, it, expect } from 'vitest';
import {
  HIGH_RATE_CURVE,
  ISSUE_SIZES,
  LOW_RATE_CURVE,
  SyntheticMarketDataGenerator,
  TENORS,
  formatIsin,
  priceFromYield,
} from './synthetic-gen';
import { RandomSource, mulberry32, roundTo } from './random';
import { CURRENCIES, RATINGS, SECTORS } from './types';
import { ValidationError } from './errors';

const NOW = new Date('2026-01-15T12:00:00Z');

/**
 * Returns the scripted values in order, then 0.5 forever
 */
function scripted(values: number[]): RandomSource {
  let i = 0;
  return { next: () => (i < values.length ? values[i++] : 0.5) };
}

function generator(random: RandomSource): SyntheticMarketDataGenerator {
  return new SyntheticMarketDataGenerator({ random, now: () => NOW });
}

describe('SyntheticMarketDataGenerator', () => {
  describe('generateBonds', () => {
    it('should return an empty batch for a count of zero', () => {
      expect(generator(mulberry32(1)).generateBonds(0)).toEqual([]);
    });

    it('should return exactly count records within their ranges', () => {
      const bonds = generator(mulberry32(11)).generateBonds(200);
      expect(bonds).toHaveLength(200);

      for (const bond of bonds) {
        expect(bond.yield_value).toBeGreaterThanOrEqual(0);
        expect(bond.spread).toBeGreaterThanOrEqual(10);
        expect(bond.spread).toBeLessThanOrEqual(300);
        expect(Number.isInteger(bond.spread)).toBe(true);
        expect(bond.duration).toBeGreaterThanOrEqual(0);
        expect(bond.duration).toBeLessThanOrEqual(0.85 * 30 + 1);
        expect(bond.coupon).toBeGreaterThanOrEqual(1);
        expect(bond.coupon).toBeLessThanOrEqual(6);
        expect(SECTORS).toContain(bond.sector);
        expect(RATINGS).toContain(bond.rating);
        expect(CURRENCIES).toContain(bond.currency);
        expect(ISSUE_SIZES).toContain(bond.issue_size);
        expect(bond.maturity > '2026-01-15').toBe(true);
      }
    });

    it('should round yields to at most 2 decimals', () => {
      for (const bond of generator(mulberry32(5)).generateBonds(100)) {
        expect(roundTo(bond.yield_value, 2)).toBe(bond.yield_value);
      }
    });

    it('should number ISINs sequentially from zero on every call', () => {
      const gen = generator(mulberry32(3));
      const first = gen.generateBonds(3).map((b) => b.isin);
      const second = gen.generateBonds(3).map((b) => b.isin);
      expect(first).toEqual(['XS0000000000', 'XS0000000001', 'XS0000000002']);
      expect(second).toEqual(first);
    });

    it('should build every field from the draws', () => {
      const [bond] = generator(scripted([])).generateBonds(1);
      expect(bond).toEqual({
        isin: 'XS0000000000',
        ticker: 'MUN 3.5% 2042',
        coupon: 3.5,
        maturity: '2042-01-11',
        yield_value: 4.1,
        spread: 155,
        duration: 13.6,
        rating: 'A',
        sector: 'Municipal',
        currency: 'GBP',
        price: 94.5,
        issue_size: 2_000_000_000,
      });
    });

    it('should add a premium for BBB ratings and a smaller one for A ratings', () => {
      // draws: maturity (1y), sector, rating, then zero noise
      const bbb = generator(scripted([0, 0, 0.85])).generateBonds(1)[0];
      const aaa = generator(scripted([0, 0, 0])).generateBonds(1)[0];
      expect(bbb.rating).toBe('BBB');
      expect(bbb.yield_value).toBe(3.6);
      expect(aaa.rating).toBe('AAA');
      expect(aaa.yield_value).toBe(2.6);
    });

    it('should return the same field set on consecutive calls', () => {
      const gen = generator(mulberry32(9));
      const first = gen.generateBonds(5);
      const second = gen.generateBonds(5);
      expect(first).toHaveLength(5);
      expect(second).toHaveLength(5);
      expect(Object.keys(second[0]).sort()).toEqual(Object.keys(first[0]).sort());
      expect(second).not.toEqual(first);
    });

    it('should be reproducible for a fixed seed', () => {
      expect(generator(mulberry32(77)).generateBonds(10)).toEqual(
        generator(mulberry32(77)).generateBonds(10)
      );
    });

    it('should reject negative or fractional counts', () => {
      const gen = generator(mulberry32(1));
      expect(() => gen.generateBonds(-1)).toThrow(ValidationError);
      expect(() => gen.generateBonds(2.5)).toThrow(ValidationError);
    });
  });

  describe('generateHistoricalSeries', () => {
    it('should return contiguous ascending dates ending today', () => {
      const points = generator(mulberry32(4)).generateHistoricalSeries('XS0000000001', 30);
      expect(points).toHaveLength(30);
      expect(points[0].date).toBe('2025-12-17');
      expect(points[29].date).toBe('2026-01-15');

      for (let i = 1; i < points.length; i++) {
        const gap = Date.parse(points[i].date) - Date.parse(points[i - 1].date);
        expect(gap).toBe(24 * 60 * 60 * 1000);
      }
    });

    it('should derive every price from its yield', () => {
      for (const point of generator(mulberry32(8)).generateHistoricalSeries('XS1', 60)) {
        expect(point.price).toBeCloseTo(priceFromYield(point.yield_value), 9);
        expect(roundTo(point.yield_value, 3)).toBe(point.yield_value);
        expect(Number.isInteger(point.spread)).toBe(true);
      }
    });

    it('should stay flat when every step draws zero change', () => {
      const points = generator(scripted([])).generateHistoricalSeries('XS1', 3);
      expect(points).toEqual([
        { date: '2026-01-13', yield_value: 3.5, spread: 50, price: 97.5 },
        { date: '2026-01-14', yield_value: 3.5, spread: 50, price: 97.5 },
        { date: '2026-01-15', yield_value: 3.5, spread: 50, price: 97.5 },
      ]);
    });

    it('should accumulate the walk step by step', () => {
      // yield draw 1 -> +0.05, spread draw 0 -> -2, each day
      const points = generator(scripted([1, 0, 1, 0])).generateHistoricalSeries('XS1', 2);
      expect(points.map((p) => p.yield_value)).toEqual([3.55, 3.6]);
      expect(points.map((p) => p.spread)).toEqual([48, 46]);
    });

    it('should return a single point for one day', () => {
      expect(generator(mulberry32(2)).generateHistoricalSeries('XS1', 1)).toHaveLength(1);
    });

    it('should reject a non-positive day count', () => {
      const gen = generator(mulberry32(1));
      expect(() => gen.generateHistoricalSeries('XS1', 0)).toThrow(ValidationError);
      expect(() => gen.generateHistoricalSeries('XS1', -5)).toThrow(ValidationError);
    });
  });

  describe('generateYieldCurve', () => {
    it('should cover the fixed tenor set', () => {
      const curve = generator(mulberry32(6)).generateYieldCurve('USD');
      expect(curve.tenors).toEqual([0.25, 0.5, 1, 2, 3, 5, 7, 10, 15, 20, 30]);
      expect(curve.yields).toHaveLength(TENORS.length);
      expect(generator(mulberry32(6)).generateYieldCurve('XYZ').yields).toHaveLength(11);
    });

    it('should use the high-rate shape only for USD', () => {
      const gen = generator(scripted([]));
      expect(gen.generateYieldCurve('USD').yields).toEqual([...HIGH_RATE_CURVE]);
      expect(gen.generateYieldCurve('EUR').yields).toEqual([...LOW_RATE_CURVE]);
      expect(gen.generateYieldCurve('usd').yields).toEqual([...LOW_RATE_CURVE]);
    });

    it('should keep USD above other currencies on average', () => {
      const gen = generator(mulberry32(21));
      let difference = 0;
      const draws = 200;
      for (let i = 0; i < draws; i++) {
        const usd = gen.generateYieldCurve('USD').yields;
        const other = gen.generateYieldCurve('XYZ').yields;
        difference += usd.reduce((sum, y, t) => sum + (y - other[t]), 0);
      }
      expect(difference / draws).toBeGreaterThan(0);
    });

    it('should keep every point within 0.1 of its base and round to 3 decimals', () => {
      const yields = generator(mulberry32(13)).generateYieldCurve('USD').yields;
      yields.forEach((y, i) => {
        expect(Math.abs(y - HIGH_RATE_CURVE[i])).toBeLessThanOrEqual(0.1 + 1e-9);
        expect(roundTo(y, 3)).toBe(y);
      });
    });
  });

  describe('samplePriceUpdate', () => {
    it('should sample one instrument from the feed universe', () => {
      const gen = generator(mulberry32(10));
      for (let i = 0; i < 50; i++) {
        const update = gen.samplePriceUpdate();
        expect(update.type).toBe('price_update');
        expect(update.isin).toMatch(/^XS00000000[0-4]\d$/);
        expect(update.yield).toBeGreaterThanOrEqual(2);
        expect(update.yield).toBeLessThanOrEqual(6);
        expect(update.spread).toBeGreaterThanOrEqual(10);
        expect(update.spread).toBeLessThanOrEqual(300);
        expect(update.timestamp).toBe('2026-01-15T12:00:00.000Z');
      }
    });
  });
});

describe('formatIsin', () => {
  it('should zero-pad to ten digits', () => {
    expect(formatIsin(7)).toBe('XS0000000007');
    expect(formatIsin(1234)).toBe('XS0000001234');
  });
});
