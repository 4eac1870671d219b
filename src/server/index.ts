import "dotenv/config";
import { loadConfig } from "../core/config";
import { configureLogger, logger } from "../core/logger";
import { createAppContext } from "../app-context";
import { UnattendedOperatorSignal } from "../services/operator-signal";
import { createApp } from "./app";

export function startServer(): void {
  const config = loadConfig(process.env);
  configureLogger(config.log);

  const context = createAppContext(config);
  const app = createApp({
    config,
    collector: context.createCoordinator(new UnattendedOperatorSignal()),
    runs: context.runs,
  });

  const server = app.listen(config.api.port, config.api.host, () => {
    logger.info(`API server listening on http://${config.api.host}:${config.api.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down API server");
    server.close(() => {
      context.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

startServer();
