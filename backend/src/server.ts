import "dotenv/config";
import { createApp } from "./app.js";
import { createDeps } from "./deps.js";
import { loadConfig } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { loadPlanFile } from "./lib/plan.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const deps = createDeps(config, logger);

if (config.planPath) {
  try {
    const plan = await loadPlanFile(config.planPath, { logger });
    deps.session.load(plan.tasks, config.planPath);
  } catch (err) {
    logger.warn(`Could not load ${config.planPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

const app = createApp(deps);
app.listen(config.port, () =>
  logger.info(`Schedule assistant listening on :${config.port} (intent resolver: ${config.intentResolver})`)
);
