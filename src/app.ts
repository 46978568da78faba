import express from "express";
import type { CheckpointStore } from "./checkpoint/CheckpointStore";
import type { CrawlOutcome } from "./crawl/controller";
import type { DeedStore } from "./store/DeedStore";
import { log } from "./utils/logger";

export interface ServerDeps {
  store: DeedStore;
  checkpoints: CheckpointStore;
  runHarvest: (signal: AbortSignal) => Promise<CrawlOutcome>;
}

/**
 * HTTP trigger for scheduled runs (Cloud Scheduler, cron, a CI job).
 * At most one harvest runs at a time.
 */
export function createApp(deps: ServerDeps) {
  const app = express();
  app.use(express.json());

  let current: { startedAt: string; abort: AbortController } | null = null;
  let lastOutcome: CrawlOutcome | null = null;
  let lastError: string | null = null;

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", uptime: process.uptime() });
  });

  app.get("/status", async (_req, res) => {
    const stats = await deps.store.readStats();
    res.json({
      running: current !== null,
      started_at: current?.startedAt ?? null,
      checkpoint: deps.checkpoints.load(),
      store: stats,
      last_outcome: lastOutcome,
      last_error: lastError,
    });
  });

  app.post("/scrape", (_req, res) => {
    if (current) {
      return res.status(409).json({ error: "A harvest is already running", started_at: current.startedAt });
    }

    const abort = new AbortController();
    const startedAt = new Date().toISOString();
    log({ stage: "scrape_start", started_at: startedAt });

    current = { startedAt, abort };
    void deps
      .runHarvest(abort.signal)
      .then((outcome) => {
        lastOutcome = outcome;
        lastError = null;
        log({ stage: "scrape_complete", reason: outcome.reason, pages: outcome.pagesProcessed });
      })
      .catch((err) => {
        lastError = String(err);
        log({ stage: "fatal_error", error: lastError });
      })
      .finally(() => {
        current = null;
      });

    return res.status(202).json({ started: true, started_at: startedAt });
  });

  app.post("/stop", (_req, res) => {
    if (!current) {
      return res.status(404).json({ error: "No harvest is running" });
    }
    current.abort.abort();
    return res.status(202).json({ stopping: true });
  });

  return app;
}
