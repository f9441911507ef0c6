import express from "express";
import pino from "pino";
import type { Logger } from "pino";
import { Store } from "./store/store.js";
import { NotificationGateway } from "./notify/gateway.js";
import { createDispatcher } from "./plugin/createDispatcher.js";
import { createHistory } from "./history/history.js";
import { makeRoutes } from "./api/routes.js";
import { errorHandler } from "./api/errors.js";

export function createApp(args: {
  store: Store;
  gateway: NotificationGateway;
  logger?: Logger;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const dispatcher = createDispatcher({ store: args.store, gateway: args.gateway, logger: log });
  const history = createHistory({ store: args.store });

  const app = express();
  app.use(express.json({ limit: "256kb" }));
  app.use("/api", makeRoutes({ store: args.store, dispatcher, history, logger: log }));
  app.use(errorHandler(log));
  return app;
}
