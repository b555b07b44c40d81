import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createMemoryEngine, loadSnapshot } from "./engine/snapshot.js";
import { projectKey } from "./utils/hash.js";

const config = loadConfig();
if (!config.snapshotPath) {
  console.error("BINREPORT_SNAPSHOT is not set; point it at a program snapshot JSON file.");
  process.exit(1);
}

const engine = createMemoryEngine(await loadSnapshot(config.snapshotPath));
const programKey = projectKey(config.snapshotPath);

const app = createApp({
  engine,
  programKey,
  defaults: {
    maxInstructions: config.maxInstructions,
    decompileTimeoutSeconds: config.decompileTimeoutSeconds,
  },
});

app.listen(config.port, () => {
  console.log(`Report server on :${config.port} program=${engine.program.name} key=${programKey}`);
});
