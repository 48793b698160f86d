// =============================================================================
// Bond Store
// Cache of the latest synthetic snapshot, not an authoritative ledger
// =============================================================================

import {
  AlertSetting,
  BondRecord,
  ClientPreferences,
  HistoricalPoint,
  StoredAlert,
  StoredBond,
} from '../types';

export interface BondStore {
  /**
   * Insert or replace every bond keyed by ISIN. All-or-nothing:
   * on failure no row of the batch is written and a StoreError is thrown.
   */
  replaceBonds(bonds: BondRecord[], updatedAt: string): void;
  listBonds(): StoredBond[];
  getBond(isin: string): StoredBond | undefined;

  /** Replace every history row of one instrument with a new series, all-or-nothing */
  replaceHistory(isin: string, points: HistoricalPoint[]): void;
  /** Rows for one instrument, oldest first */
  listHistory(isin: string): HistoricalPoint[];

  savePreferences(userId: string, preferences: ClientPreferences): void;
  getPreferences(userId: string): ClientPreferences | undefined;

  /**
   * Store a batch of alerts, all-or-nothing. Returns them with their ids
   * in request order.
   */
  addAlerts(userId: string, alerts: AlertSetting[]): StoredAlert[];
  listAlerts(userId: string): StoredAlert[];

  close(): void;
}
