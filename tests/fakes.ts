import type { CheckpointStore } from '../src/checkpoint/CheckpointStore';
import { loadConfig, type CrawlSettings } from '../src/config';
import type { RowAccessor } from '../src/scraper/extract';
import type { PageTarget, PortalSession } from '../src/scraper/PortalSession';
import type { DeedStore, UpsertResult } from '../src/store/DeedStore';
import type { CrawlCheckpoint, DeedRecord, StoreStats } from '../src/types';

export function testSettings(overrides: Partial<CrawlSettings> = {}): CrawlSettings {
  return { ...loadConfig({}).crawl, ...overrides };
}

export type FakeCells = Record<string, string | Error>;

export class FakeRow implements RowAccessor {
  constructor(private readonly cells: FakeCells) {}

  async field(column: string): Promise<string | undefined> {
    const value = this.cells[column];
    if (value instanceof Error) throw value;
    return value;
  }
}

export function deedCells(docNumber: string, overrides: FakeCells = {}): FakeCells {
  return {
    'col-3': 'SMITH JOHN',
    'col-4': 'DOE JANE',
    'col-5': 'DEED',
    'col-6': '01/15/2024',
    'col-7': docNumber,
    'col-8': 'VOL 100 PG 20',
    'col-9': 'LOT 4 BLK 2 NCB 1234',
    'col-10': '4',
    'col-11': '2',
    'col-12': '1234',
    'col-13': '',
    'col-14': '100 MAIN ST',
    ...overrides,
  };
}

export interface FakePage {
  rows?: FakeCells[];
  /** Transient render timeouts before the table appears. */
  timeouts?: number;
  /** Markup returned while the table is missing. */
  content?: string;
  /** The table never renders (ceiling/error page). */
  blocked?: boolean;
  rowsError?: Error;
}

/** Numbered pages, `perPage` rows each, doc numbers `D<page>-<row>`. */
export function pagesOf(count: number, perPage: number): FakePage[] {
  return Array.from({ length: count }, (_, p) => ({
    rows: Array.from({ length: perPage }, (_, r) => deedCells(`D${p + 1}-${r + 1}`)),
  }));
}

export class FakePortal implements PortalSession {
  opened: PageTarget[] = [];
  reloads = 0;
  closed = false;
  current = 0;
  onNextPage?: () => void;

  constructor(private readonly pages: FakePage[]) {}

  readonly open = async (target: PageTarget): Promise<PortalSession> => {
    this.opened.push(target);
    return this;
  };

  async waitForResults(): Promise<boolean> {
    const page = this.pages[this.current];
    if (!page) return false;
    if (page.blocked) return false;
    if (page.timeouts && page.timeouts > 0) {
      page.timeouts--;
      return false;
    }
    return true;
  }

  async content(): Promise<string> {
    return this.pages[this.current]?.content ?? '<html><body><div class="spinner">Loading</div></body></html>';
  }

  async rows(): Promise<RowAccessor[]> {
    const page = this.pages[this.current];
    if (page?.rowsError) throw page.rowsError;
    return (page?.rows ?? []).map(cells => new FakeRow(cells));
  }

  async reload(): Promise<void> {
    this.reloads++;
  }

  async nextPage(): Promise<boolean> {
    this.onNextPage?.();
    if (this.current + 1 >= this.pages.length) return false;
    this.current++;
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class MemoryCheckpointStore implements CheckpointStore {
  saves: Array<{ endDate: string; offset: number }> = [];

  constructor(private state: CrawlCheckpoint) {}

  load(): CrawlCheckpoint {
    return { ...this.state };
  }

  save(endDate: string, offset: number): CrawlCheckpoint {
    this.saves.push({ endDate, offset });
    this.state = { endDate, offset, lastUpdated: '2026-01-21 00:00:00' };
    return { ...this.state };
  }
}

export class MemoryDeedStore implements DeedStore {
  batches: DeedRecord[][] = [];
  rows = new Map<string, DeedRecord>();
  failuresLeft = 0;

  constructor(private readonly stats: StoreStats = { recordCount: 0, oldestRecordedDate: null }) {}

  async upsertBatch(records: DeedRecord[]): Promise<UpsertResult> {
    if (records.length === 0) return { ok: true, inserted: 0 };
    this.batches.push([...records]);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      return { ok: false, inserted: 0 };
    }
    let inserted = 0;
    for (const record of records) {
      if (!this.rows.has(record.Doc_Number)) {
        this.rows.set(record.Doc_Number, record);
        inserted++;
      }
    }
    return { ok: true, inserted };
  }

  async readStats(): Promise<StoreStats> {
    return this.stats;
  }

  async close(): Promise<void> {}
}
