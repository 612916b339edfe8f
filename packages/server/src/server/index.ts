import "dotenv/config";
import { createChatDaemon } from "./bootstrap.js";
import { resolveDaemonConfig } from "./config.js";
import { createRootLogger } from "./logger.js";
import { loadPersistedConfig, resolveConfigHome } from "./persisted-config.js";

async function main(): Promise<void> {
  const home = resolveConfigHome();
  const persisted = loadPersistedConfig(home);
  const logger = createRootLogger(persisted);
  const config = resolveDaemonConfig(persisted);

  const daemon = createChatDaemon(config, { logger });
  await daemon.start();

  let shuttingDown = false;
  const handleShutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "Shutting down gracefully");

    const forceExit = setTimeout(() => {
      logger.warn("Forcing shutdown, server did not close in time");
      process.exit(1);
    }, 10_000);
    forceExit.unref();

    try {
      await daemon.close();
      logger.info("Server closed");
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void handleShutdown("SIGTERM"));
  process.on("SIGINT", () => void handleShutdown("SIGINT"));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
