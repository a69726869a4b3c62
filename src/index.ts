import { config } from "./env";
import { Coordinator } from "./analysis/orchestration";
import { loadConfig } from "./config/loader";
import { CoordinatorConfig, resolveCoordinatorConfig } from "./config/coordinator";
import { createApp, AppState } from "./server";
import { openStore } from "./store";
import { describeError } from "./errors";
import { logger } from "./logger";

// Fail fast on invalid configuration
function readCoordinatorConfig(): CoordinatorConfig {
  try {
    return resolveCoordinatorConfig(process.env);
  } catch (err) {
    logger.error("FATAL: invalid configuration", { error: describeError(err) });
    process.exit(1);
  }
}

const coordinatorConfig = readCoordinatorConfig();

const primaryStore = openStore(coordinatorConfig.primaryStoreUrl);
const coordinator = new Coordinator(coordinatorConfig, primaryStore, {
  ruleConfig: loadConfig(config.CODESWEEP_CONFIG_DIR),
});

const state: AppState = { isShuttingDown: false };
const app = createApp(coordinator, primaryStore, state);
const port = Number(config.PORT) || 3000;

logger.info("[Server] Starting", {
  port,
  store: primaryStore.label,
  mode: coordinator.mode,
  policy: coordinator.policy,
});
const server = app.listen(port, "0.0.0.0", () => {
  logger.info(`[Server] Listening on 0.0.0.0:${port}`);
});

async function shutdown(signal: string): Promise<void> {
  if (state.isShuttingDown) {
    return;
  }
  logger.info("Graceful shutdown started", { signal });
  state.isShuttingDown = true;

  // Stop accepting new connections and let in-flight requests finish
  await new Promise<void>((resolve) => {
    server.close(() => {
      logger.info("HTTP server closed");
      resolve();
    });
  });

  try {
    await coordinator.close();
    await primaryStore.close();
    logger.info("Stores closed");
  } catch (err) {
    logger.error("Error closing stores", { error: describeError(err) });
  }

  logger.info("Shutdown complete");
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { error: describeError(reason) });
});
