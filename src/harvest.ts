import { FileCheckpointStore, type CheckpointStore } from "./checkpoint/CheckpointStore";
import type { AppConfig } from "./config";
import { WindowController, type CrawlOutcome } from "./crawl/controller";
import { publicSearchOpener } from "./scraper";
import type { OpenSession } from "./scraper/PortalSession";
import type { DeedStore } from "./store/DeedStore";
import { openDeedStore } from "./store/sqlite";
import { log } from "./utils/logger";

export interface HarvestOptions {
  signal?: AbortSignal;
  // Supplied collaborators are left open; ones created here are closed here.
  store?: DeedStore;
  checkpoints?: CheckpointStore;
  openSession?: OpenSession;
}

export function createCheckpointStore(config: AppConfig): CheckpointStore {
  return new FileCheckpointStore(config.checkpointFile, config.crawl.defaultEndDate);
}

/** One time-limited harvesting run against the configured portal and store. */
export async function harvest(config: AppConfig, options: HarvestOptions = {}): Promise<CrawlOutcome> {
  const store = options.store ?? openDeedStore(config.databasePath);
  const controller = new WindowController({
    settings: config.crawl,
    checkpoints: options.checkpoints ?? createCheckpointStore(config),
    store,
    openSession: options.openSession ?? publicSearchOpener(config),
    signal: options.signal,
  });

  try {
    const outcome = await controller.run();
    log({
      stage: "harvest_complete",
      reason: outcome.reason,
      window: `${outcome.window.startDate}-${outcome.window.endDate}`,
      end_date: outcome.checkpoint.endDate,
      offset: outcome.checkpoint.offset,
      pages: outcome.pagesProcessed,
      extracted: outcome.recordsExtracted,
      inserted: outcome.recordsInserted,
      unflushed: outcome.recordsUnflushed,
    });
    return outcome;
  } finally {
    if (!options.store) await store.close();
  }
}
