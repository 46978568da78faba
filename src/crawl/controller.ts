import type { CheckpointStore } from "../checkpoint/CheckpointStore";
import type { CrawlSettings } from "../config";
import { extractRecord, isRetainable } from "../scraper/extract";
import type { OpenSession, PortalSession } from "../scraper/PortalSession";
import type { DeedStore } from "../store/DeedStore";
import type { CrawlCheckpoint, DeedRecord, SearchWindow } from "../types";
import { deriveWindow } from "../utils/dates";
import { randomBetween, sleep as defaultSleep, type Sleep } from "../utils/delay";
import { log } from "../utils/logger";
import {
  canTransition,
  checkGuards,
  classifyTimeout,
  contentSnippet,
  isBreakDue,
  pageNumber,
  reconcile,
  type CrawlPhase,
  type StopReason,
} from "./transitions";

export interface CrawlDeps {
  settings: CrawlSettings;
  checkpoints: CheckpointStore;
  store: DeedStore;
  openSession: OpenSession;
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
}

export interface CrawlOutcome {
  reason: StopReason;
  window: SearchWindow;
  checkpoint: CrawlCheckpoint;
  slid: boolean;
  pagesProcessed: number;
  recordsExtracted: number;
  recordsInserted: number;
  recordsUnflushed: number;
  error?: string;
}

export class IllegalTransitionError extends Error {
  constructor(readonly from: CrawlPhase, readonly to: CrawlPhase) {
    super(`Illegal crawl transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * Drives one harvesting run: reconciles the checkpoint with the store,
 * walks the results pages of a single date window, and checkpoints after
 * every page. Every exit path flushes buffered records and writes the final
 * checkpoint before the browsing session is closed.
 */
export class WindowController {
  readonly trace: CrawlPhase[] = ["reconcile"];

  private readonly settings: CrawlSettings;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private phase: CrawlPhase = "reconcile";
  private session: PortalSession | null = null;
  private buffer: DeedRecord[] = [];
  private endDate = "";
  private offset = 0;
  private checkpoint: CrawlCheckpoint = { endDate: "", offset: 0 };
  private pagesThisSession = 0;
  private pagesProcessed = 0;
  private recordsExtracted = 0;
  private recordsInserted = 0;

  constructor(private readonly deps: CrawlDeps) {
    this.settings = deps.settings;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  async run(): Promise<CrawlOutcome> {
    const { checkpoints, store } = this.deps;
    const loaded = checkpoints.load();
    const stats = await store.readStats();
    log({
      stage: "startup",
      db_records: stats.recordCount,
      oldest_record: stats.oldestRecordedDate,
      checkpoint_end_date: loaded.endDate,
      checkpoint_offset: loaded.offset,
    });

    const { checkpoint, slid } = reconcile(loaded, stats, this.settings);
    if (slid) {
      log({ stage: "window_slide", from: loaded.endDate, to: checkpoint.endDate });
      this.checkpoint = checkpoints.save(checkpoint.endDate, checkpoint.offset);
    } else {
      this.checkpoint = checkpoint;
    }

    const window = deriveWindow(checkpoint.endDate, this.settings.windowYears, this.settings.minStartDate);
    this.endDate = window.endDate;
    this.offset = checkpoint.offset;

    log({
      stage: "window_active",
      start_date: window.startDate,
      end_date: window.endDate,
      start_page: pageNumber(this.offset, this.settings.pageSize),
      offset: this.offset,
    });

    let reason: StopReason;
    let error: string | undefined;
    try {
      reason = await this.crawl(window);
    } catch (err) {
      reason = this.deps.signal?.aborted ? "interrupted" : "fatal";
      error = String(err);
      log({ stage: "crawl_error", reason, error });
    }
    log({ stage: "crawl_stop", reason, offset: this.offset, pages: this.pagesProcessed });

    await this.terminate();

    return {
      reason,
      window,
      checkpoint: this.checkpoint,
      slid,
      pagesProcessed: this.pagesProcessed,
      recordsExtracted: this.recordsExtracted,
      recordsInserted: this.recordsInserted,
      recordsUnflushed: this.buffer.length,
      error,
    };
  }

  private async crawl(window: SearchWindow): Promise<StopReason> {
    const s = this.settings;
    const signal = this.deps.signal;

    for (;;) {
      this.enter("guard");
      this.pagesThisSession++;
      const stop = checkGuards(
        { pagesThisSession: this.pagesThisSession, offset: this.offset, aborted: signal?.aborted ?? false },
        s
      );
      if (stop) {
        if (stop === "offset_ceiling") {
          // The slide happens at the next run's startup, not mid-run.
          log({ stage: "offset_ceiling", offset: this.offset, ceiling: s.offsetCeiling });
          this.persist();
        }
        return stop;
      }

      log({ stage: "page_start", page: pageNumber(this.offset, s.pageSize), offset: this.offset });

      if (isBreakDue(this.pagesThisSession, s.breakEveryNPages)) {
        const ms = randomBetween(s.breakDurationMs.min, s.breakDurationMs.max, this.random);
        log({ stage: "break", seconds: Math.floor(ms / 1000) });
        await this.sleep(ms, signal);
        if (signal?.aborted) return "interrupted";
      }

      this.enter("fetch");
      const session = await this.ensureSession(window);
      if (!(await session.waitForResults(s.resultsTimeoutMs))) {
        const content = await session.content();
        if (classifyTimeout(content, s.ceilingMarkers) === "ceiling") {
          log({ stage: "limit_hit", snippet: contentSnippet(content, s.snippetLength) });
          // Sentinel, not a real position: forces a slide check next run.
          this.offset = s.offsetCeiling;
          this.persist();
          return "ceiling_marker";
        }
        log({ stage: "results_timeout", offset: this.offset });
        await session.reload();
        await this.sleep(s.transientRetryPauseMs, signal);
        continue;
      }

      this.enter("extract");
      const rows = await session.rows();
      if (rows.length === 0) {
        log({ stage: "no_rows", offset: this.offset });
        return "no_rows";
      }
      let count = 0;
      for (const row of rows) {
        const record = await extractRecord(row);
        if (isRetainable(record)) {
          this.buffer.push(record);
          count++;
        }
      }
      this.recordsExtracted += count;
      log({ stage: "page_extracted", records: count, rows: rows.length, buffered: this.buffer.length });

      if (this.buffer.length >= s.batchSize) {
        this.enter("flush");
        await this.flush();
      }

      this.enter("checkpoint");
      this.offset += s.pageSize;
      this.pagesProcessed++;
      this.persist();

      this.enter("advance");
      if (!(await this.advance(session))) return "no_next_page";
    }
  }

  private async ensureSession(window: SearchWindow): Promise<PortalSession> {
    if (!this.session) {
      this.session = await this.deps.openSession({
        window,
        offset: this.offset,
        pageSize: this.settings.pageSize,
      });
    }
    return this.session;
  }

  private async advance(session: PortalSession): Promise<boolean> {
    let moved: boolean;
    try {
      moved = await session.nextPage();
    } catch (err) {
      log({ stage: "next_page_failed", error: String(err) });
      return false;
    }
    if (!moved) {
      log({ stage: "no_next_page", offset: this.offset });
      return false;
    }
    const { min, max } = this.settings.pageDelayMs;
    await this.sleep(randomBetween(min, max, this.random), this.deps.signal);
    return true;
  }

  private async flush(): Promise<void> {
    const batch = this.buffer;
    const result = await this.deps.store.upsertBatch(batch);
    if (result.ok) {
      this.recordsInserted += result.inserted;
      this.buffer = [];
    } else {
      log({ stage: "flush_deferred", retained: batch.length });
    }
  }

  private persist(): void {
    this.checkpoint = this.deps.checkpoints.save(this.endDate, this.offset);
  }

  private async terminate(): Promise<void> {
    this.enter("terminate");
    try {
      if (this.buffer.length > 0) await this.flush();
      this.persist();
    } finally {
      if (this.session) {
        const session = this.session;
        this.session = null;
        await session.close().catch(err => log({ stage: "session_close_failed", error: String(err) }));
      }
    }
  }

  private enter(next: CrawlPhase): void {
    if (!canTransition(this.phase, next)) {
      throw new IllegalTransitionError(this.phase, next);
    }
    this.phase = next;
    this.trace.push(next);
  }
}
