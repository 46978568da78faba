import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { type DeedStore, DisabledDeedStore, EMPTY_STATS, type UpsertResult } from './DeedStore';
import type { DeedRecord, StoreStats } from '../types';
import { formatIsoDate, parseRecordedDate } from '../utils/dates';
import { log } from '../utils/logger';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS land_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    doc_number TEXT UNIQUE,
    grantor TEXT,
    grantee TEXT,
    doc_type TEXT,
    recorded_date TEXT,
    book_volume_page TEXT,
    legal_description TEXT,
    lot TEXT,
    block TEXT,
    ncb TEXT,
    county_block TEXT,
    property_address TEXT,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  )
`;

interface StatsRow {
  count: number;
  oldest: string | null;
}

/** Recorded_Date as an ISO date for the DATE column, or null when unreadable. */
export function toStoredDate(recordedDate: string): string | null {
  if (!recordedDate) return null;
  const parsed = parseRecordedDate(recordedDate);
  return parsed.ok ? formatIsoDate(parsed.value) : null;
}

export class SQLiteDeedStore implements DeedStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  ensureSchema(): void {
    this.db.exec(SCHEMA);
  }

  async upsertBatch(records: DeedRecord[]): Promise<UpsertResult> {
    if (records.length === 0) return { ok: true, inserted: 0 };

    try {
      const insert = this.db.prepare(`
        INSERT INTO land_records
          (doc_number, grantor, grantee, doc_type, recorded_date, book_volume_page,
           legal_description, lot, block, ncb, county_block, property_address)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT (doc_number) DO NOTHING
      `);
      const tx = this.db.transaction((batch: DeedRecord[]) => {
        let inserted = 0;
        for (const r of batch) {
          inserted += insert.run(
            r.Doc_Number,
            r.Grantor,
            r.Grantee,
            r.Doc_Type,
            toStoredDate(r.Recorded_Date),
            r.Book_Volume_Page,
            r.Legal_Description,
            r.Lot,
            r.Block,
            r.NCB,
            r.County_Block,
            r.Property_Address
          ).changes;
        }
        return inserted;
      });
      const inserted = tx(records);
      log({ stage: 'db_push', records: records.length, inserted });
      return { ok: true, inserted };
    } catch (err) {
      log({ stage: 'db_push_failed', records: records.length, error: String(err) });
      return { ok: false, inserted: 0 };
    }
  }

  async readStats(): Promise<StoreStats> {
    try {
      const row = this.db
        .prepare<[], StatsRow>('SELECT COUNT(*) AS count, MIN(recorded_date) AS oldest FROM land_records')
        .get();
      if (!row) return EMPTY_STATS;
      return {
        recordCount: row.count,
        oldestRecordedDate: row.oldest ? row.oldest.replace(/-/g, '') : null,
      };
    } catch (err) {
      log({ stage: 'db_stats_failed', error: String(err) });
      return EMPTY_STATS;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

/**
 * Opens the configured store. No path, or a database that cannot be opened,
 * yields a disabled store so the crawl still runs.
 */
export function openDeedStore(dbPath: string | null): DeedStore {
  if (!dbPath) {
    log({ stage: 'db_disabled', reason: 'DATABASE_URL not set' });
    return new DisabledDeedStore('DATABASE_URL not set');
  }
  try {
    const store = new SQLiteDeedStore(dbPath);
    store.ensureSchema();
    log({ stage: 'db_ready', path: dbPath });
    return store;
  } catch (err) {
    log({ stage: 'db_init_failed', path: dbPath, error: String(err) });
    return new DisabledDeedStore(`database unavailable: ${String(err)}`);
  }
}
