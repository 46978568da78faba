import { loadConfigFromEnvironment } from "./config";
import { harvest } from "./harvest";
import { log } from "./utils/logger";

async function runHarvester(): Promise<number> {
  const config = loadConfigFromEnvironment();
  const abort = new AbortController();

  // Cooperative: the crawl stops between pages, then flushes and checkpoints.
  const onSignal = (signal: NodeJS.Signals) => {
    log({ stage: "interrupted", signal });
    abort.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  log({
    stage: "harvest_start",
    ci_mode: config.ciMode,
    headless: config.headless,
    persistence: config.databasePath ? "sqlite" : "disabled",
    max_pages: config.crawl.maxPagesPerSession,
  });

  const outcome = await harvest(config, { signal: abort.signal });
  return outcome.reason === "fatal" ? 1 : 0;
}

runHarvester()
  .then((code) => {
    log({ stage: "done", message: "Done" });
    process.exit(code);
  })
  .catch((err) => {
    log({ stage: "fatal_error", error: String(err) });
    log({ stage: "done", message: "Done" });
    process.exit(1);
  });
