import path from "node:path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import pino from "pino";

import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { SqliteStore } from "./store/sqlite.js";
import { NotificationGateway } from "./notify/gateway.js";

const log = pino({ level: process.env.LOG_LEVEL || "info" });

async function main() {
  const config = loadConfig();
  log.level = config.logLevel;

  const store = new SqliteStore(config.dbPath);
  try {
    await store.init();
  } catch (err) {
    log.fatal({ err, dbPath: config.dbPath }, "cannot open assignment database");
    process.exit(1);
  }

  const gateway = new NotificationGateway(config.mail);
  const app = createApp({ store, gateway, logger: log });

  const server = app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        DB_PATH: config.dbPath,
        MAIL_MODE: gateway.mode,
        SMTP_HOST: config.mail.smtp?.host ?? null
      },
      "house-assign running"
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, "close failed");
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.fatal({ err }, "fatal");
  process.exit(1);
});
