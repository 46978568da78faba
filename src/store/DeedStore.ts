import type { DeedRecord, StoreStats } from '../types';
import { log } from '../utils/logger';

export interface UpsertResult {
  ok: boolean;
  inserted: number; // rows new to the store; conflicts are skipped
}

/**
 * Persistence gateway for harvested deeds. Implementations never throw:
 * failures are logged and reported through the return value, so an
 * unreachable store degrades a run instead of ending it.
 */
export interface DeedStore {
  upsertBatch(records: DeedRecord[]): Promise<UpsertResult>;
  readStats(): Promise<StoreStats>;
  close(): Promise<void>;
}

export const EMPTY_STATS: StoreStats = { recordCount: 0, oldestRecordedDate: null };

/** Used when no DATABASE_URL is configured, or the database cannot be opened. */
export class DisabledDeedStore implements DeedStore {
  constructor(private readonly reason: string) {}

  async upsertBatch(records: DeedRecord[]): Promise<UpsertResult> {
    if (records.length > 0) {
      log({ stage: 'db_push_skipped', reason: this.reason, records: records.length });
    }
    return { ok: true, inserted: 0 };
  }

  async readStats(): Promise<StoreStats> {
    return EMPTY_STATS;
  }

  async close(): Promise<void> {}
}
