// =============================================================================
// Bond Snapshot Service
// Refresh and read are separate: reading never regenerates stored data
// =============================================================================

import {
  AlertSetting,
  BondRecord,
  ClientPreferences,
  HistoricalPoint,
  StoredAlert,
  StoredBond,
  YieldCurveData,
} from './types';
import { NotFoundError } from './errors';
import { SyntheticMarketDataGenerator } from './synthetic-gen';
import { spreadChange, totalReturn } from './analytics';
import { MarketDataProvider } from './provider';
import { BondStore } from './store/bond-store';
import type { Logger } from './logger';

export const DEFAULT_USER_ID = 'default_user';

// Window used as the "historical" side of a spread change
const SPREAD_CHANGE_WINDOW_DAYS = 30;

export interface BondServiceOptions {
  generator: SyntheticMarketDataGenerator;
  store: BondStore;
  provider: MarketDataProvider;
  logger: Logger;
  batchSize: number;
  now?: () => Date;
}

export interface BondSnapshot {
  bonds: StoredBond[];
  lastUpdated: string;
}

export interface BondAnalytics {
  isin: string;
  holding_days: number;
  total_return: number;
  current_spread: number;
  historical_spread: number;
  spread_change: number;
}

export class BondService {
  private readonly generator: SyntheticMarketDataGenerator;
  private readonly store: BondStore;
  private readonly provider: MarketDataProvider;
  private readonly log: Logger;
  private readonly batchSize: number;
  private readonly now: () => Date;

  constructor(options: BondServiceOptions) {
    this.generator = options.generator;
    this.store = options.store;
    this.provider = options.provider;
    this.log = options.logger.child({ component: 'BondService' });
    this.batchSize = options.batchSize;
    this.now = options.now ?? (() => new Date());
  }

  get source(): string {
    return this.provider.source;
  }

  /**
   * Generate a fresh batch and overwrite the stored snapshot
   */
  refresh(): BondSnapshot {
    const bonds = this.generator.generateBonds(this.batchSize);
    const updatedAt = this.now().toISOString();
    this.store.replaceBonds(bonds, updatedAt);
    this.log.info({ count: bonds.length }, 'Bond snapshot refreshed');
    return {
      bonds: bonds.map((bond) => ({ ...bond, last_updated: updatedAt })),
      lastUpdated: updatedAt,
    };
  }

  /**
   * Stored snapshot; seeds the store the first time it is read
   */
  list(): BondSnapshot {
    const bonds = this.store.listBonds();
    if (bonds.length === 0) {
      return this.refresh();
    }
    const lastUpdated = bonds.reduce(
      (latest, bond) => (bond.last_updated > latest ? bond.last_updated : latest),
      bonds[0].last_updated
    );
    return { bonds, lastUpdated };
  }

  /**
   * Stored bond, or provider reference data for an ISIN outside the snapshot
   */
  getBond(isin: string): BondRecord {
    return this.store.getBond(isin) ?? this.provider.fetchBond(isin);
  }

  /**
   * Generated series; replaces whatever was stored for the ISIN
   */
  history(isin: string, days: number): HistoricalPoint[] {
    const points = this.generator.generateHistoricalSeries(isin, days);
    this.store.replaceHistory(isin, points);
    return points;
  }

  historyBetween(isin: string, startDate: string, endDate: string): HistoricalPoint[] {
    const points = this.provider.fetchHistory(isin, startDate, endDate);
    this.store.replaceHistory(isin, points);
    return points;
  }

  yieldCurves(currencies: string[]): Record<string, YieldCurveData> {
    const curves: Record<string, YieldCurveData> = {};
    for (const currency of currencies) {
      curves[currency] = this.generator.generateYieldCurve(currency);
    }
    return curves;
  }

  analytics(isin: string, holdingDays: number): BondAnalytics {
    const bond = this.store.getBond(isin);
    if (!bond) {
      throw new NotFoundError(`Bond ${isin} is not in the current snapshot`);
    }

    const [first] = this.generator.generateHistoricalSeries(isin, SPREAD_CHANGE_WINDOW_DAYS);

    return {
      isin,
      holding_days: holdingDays,
      total_return: totalReturn(bond, holdingDays, this.generator.random),
      current_spread: bond.spread,
      historical_spread: first.spread,
      spread_change: spreadChange(bond.spread, first.spread),
    };
  }

  // ---------------------------------------------------------------------------
  // Preferences, alerts and watchlist
  // ---------------------------------------------------------------------------

  getPreferences(userId: string): ClientPreferences | undefined {
    return this.store.getPreferences(userId);
  }

  savePreferences(userId: string, preferences: ClientPreferences): void {
    this.store.savePreferences(userId, preferences);
    this.log.debug({ userId }, 'Preferences saved');
  }

  addAlerts(userId: string, alerts: AlertSetting[]): StoredAlert[] {
    const stored = this.store.addAlerts(userId, alerts);
    this.log.debug({ userId, count: stored.length }, 'Alerts stored');
    return stored;
  }

  listAlerts(userId: string): StoredAlert[] {
    return this.store.listAlerts(userId);
  }

  /**
   * Remove an ISIN from the user's watchlist; returns the remaining list
   */
  removeFromWatchlist(userId: string, isin: string): string[] {
    const preferences = this.store.getPreferences(userId);
    if (!preferences || !preferences.watchlist.includes(isin)) {
      throw new NotFoundError(`${isin} is not on the watchlist for ${userId}`);
    }
    const watchlist = preferences.watchlist.filter((entry) => entry !== isin);
    this.store.savePreferences(userId, { ...preferences, watchlist });
    return watchlist;
  }
}
