import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, type AppConfig } from '../src/config';
import { harvest } from '../src/harvest';
import { SQLiteDeedStore } from '../src/store/sqlite';
import { FakePortal, pagesOf } from './fakes';

let dir: string;
let config: AppConfig;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'deed-harvest-'));
  const loaded = loadConfig({
    CHECKPOINT_FILE: path.join(dir, 'scraper_state.json'),
    DATABASE_URL: path.join(dir, 'deeds.db'),
    MAX_PAGES_PER_SESSION: '2',
  });
  config = { ...loaded, crawl: { ...loaded.crawl, pageDelayMs: { min: 0, max: 0 } } };
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('harvest', () => {
  it('resumes the next run from the persisted checkpoint', async () => {
    const firstPortal = new FakePortal(pagesOf(5, 1));
    const first = await harvest(config, { openSession: firstPortal.open });

    expect(first.reason).toBe('session_limit');
    expect(first.recordsInserted).toBe(2);
    expect(JSON.parse(fs.readFileSync(config.checkpointFile, 'utf-8'))).toMatchObject({
      current_end_date: '20260121',
      current_offset: 500,
    });

    // the fake portal numbers its rows from 1 again, so every row is a repeat
    const secondPortal = new FakePortal(pagesOf(5, 1));
    const second = await harvest(config, { openSession: secondPortal.open });

    expect(secondPortal.opened[0].offset).toBe(500);
    expect(second.checkpoint.offset).toBe(1000);
    expect(second.recordsExtracted).toBe(2);
    expect(second.recordsInserted).toBe(0);

    const store = new SQLiteDeedStore(path.join(dir, 'deeds.db'));
    try {
      expect(await store.readStats()).toEqual({ recordCount: 2, oldestRecordedDate: '20240115' });
    } finally {
      await store.close();
    }
  });
});
