import {
  AlertSetting,
  BondRecord,
  ClientPreferences,
  HistoricalPoint,
  StoredAlert,
  StoredBond,
} from '../types';
import { StoreError } from '../errors';
import { BondStore } from './bond-store';

interface HistoryRow extends HistoricalPoint {
  isin: string;
}

/**
 * In-process store. Each write builds the next state first and swaps it
 * in, so a failed batch leaves nothing half-written.
 */
export class MemoryBondStore implements BondStore {
  private bonds = new Map<string, StoredBond>();
  private history: HistoryRow[] = [];
  private preferences = new Map<string, ClientPreferences>();
  private alerts: StoredAlert[] = [];
  private nextAlertId = 1;
  private closed = false;

  replaceBonds(bonds: BondRecord[], updatedAt: string): void {
    this.assertOpen();
    const next = new Map(this.bonds);
    for (const bond of bonds) {
      next.set(bond.isin, { ...bond, last_updated: updatedAt });
    }
    this.bonds = next;
  }

  listBonds(): StoredBond[] {
    this.assertOpen();
    return Array.from(this.bonds.values()).sort((a, b) => a.isin.localeCompare(b.isin));
  }

  getBond(isin: string): StoredBond | undefined {
    this.assertOpen();
    return this.bonds.get(isin);
  }

  replaceHistory(isin: string, points: HistoricalPoint[]): void {
    this.assertOpen();
    const rows = points.map((point) => ({ ...point, isin }));
    this.history = this.history.filter((row) => row.isin !== isin).concat(rows);
  }

  listHistory(isin: string): HistoricalPoint[] {
    this.assertOpen();
    return this.history
      .filter((row) => row.isin === isin)
      .sort((a, b) => a.date.localeCompare(b.date))
      .map(({ date, yield_value, spread, price }) => ({ date, yield_value, spread, price }));
  }

  savePreferences(userId: string, preferences: ClientPreferences): void {
    this.assertOpen();
    this.preferences.set(userId, structuredClone(preferences));
  }

  getPreferences(userId: string): ClientPreferences | undefined {
    this.assertOpen();
    const stored = this.preferences.get(userId);
    return stored ? structuredClone(stored) : undefined;
  }

  addAlerts(userId: string, alerts: AlertSetting[]): StoredAlert[] {
    this.assertOpen();
    const stored = alerts.map((alert, i): StoredAlert => {
      if (alert.alert_type === '' || !Number.isFinite(alert.threshold)) {
        throw new StoreError(`Alert ${i} violates the alerts table constraints`);
      }
      return {
        id: this.nextAlertId + i,
        user_id: userId,
        alert_type: alert.alert_type,
        threshold: alert.threshold,
        triggered_at: null,
      };
    });
    this.alerts = this.alerts.concat(stored);
    this.nextAlertId += stored.length;
    return stored.map((alert) => ({ ...alert }));
  }

  listAlerts(userId: string): StoredAlert[] {
    this.assertOpen();
    return this.alerts.filter((alert) => alert.user_id === userId).map((alert) => ({ ...alert }));
  }

  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError('Store is closed');
    }
  }
}
