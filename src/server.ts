import { mkdirSync } from "fs";
import path from "path";
import { config } from "./config";
import { closeContext, createContext } from "./context";
import { createApp } from "./app";
import { logger } from "./middleware/requestLogger";

async function main() {
  if (config.databasePath !== ":memory:") {
    mkdirSync(path.dirname(path.resolve(config.databasePath)), { recursive: true });
  }

  const context = await createContext();
  const app = createApp(context);

  const server = app.listen(config.port, () => {
    logger.info(`Ticketing records server running on http://localhost:${config.port}`);
    logger.info(`API root: http://localhost:${config.port}/api/v1`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      closeContext(context)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("Error closing database", { error: String(err) });
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Failed to start server", { error: String(err) });
  process.exit(1);
});
