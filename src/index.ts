import "dotenv/config";

import { createApp } from "./app";
import { createAppContext } from "./appContext";
import { logger } from "./utils/logger";

const port = Number(process.env.PORT ?? 8080);

const ctx = createAppContext();
const app = createApp(ctx);

const server = app.listen(port, () => {
  logger.info(
    { port, env: process.env.NODE_ENV ?? "development", weekly_code_expires_at: ctx.auth.getWeeklyCode().expires_at },
    "server_listening"
  );
});

const shutdown = (signal: string) => {
  logger.info({ signal }, "server_shutdown_start");
  server.close((err) => {
    if (err) {
      logger.error({ err }, "server_shutdown_error");
      process.exitCode = 1;
      return process.exit();
    }
    logger.info({ sessions: ctx.sessions.listSessions().length }, "server_shutdown_complete");
    process.exit();
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
