import { createApp } from "./app";
import { loadConfigFromEnvironment } from "./config";
import { createCheckpointStore, harvest } from "./harvest";
import { openDeedStore } from "./store/sqlite";
import { log } from "./utils/logger";

const config = loadConfigFromEnvironment();
const store = openDeedStore(config.databasePath);
const checkpoints = createCheckpointStore(config);
const app = createApp({
  store,
  checkpoints,
  runHarvest: (signal) => harvest(config, { signal, store, checkpoints }),
});

app.listen(config.port, () => {
  log({ stage: "server_listening", port: config.port });
});
