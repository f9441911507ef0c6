export { createApp } from "./app.js";
export { createDispatcher } from "./plugin/createDispatcher.js";
export { createRules } from "./core/rules.js";
export { createHistory } from "./history/history.js";
export { NotificationGateway } from "./notify/gateway.js";
export { formatMessage } from "./notify/message.js";
export { SqliteStore } from "./store/sqlite.js";
export { loadConfig } from "./config.js";
export {
  AppError,
  NotFoundError,
  ValidationError,
  AlreadyAssignedError,
  ConstraintError,
  TransportError
} from "./core/errors.js";
export type { Store, StatusPatch } from "./store/store.js";
export type { MailTransport, SendResult } from "./notify/gateway.js";
export type { AppConfig, SmtpConfig } from "./config.js";
export type {
  Worker,
  House,
  Assignment,
  AssignmentStatus,
  HistoryEntry,
  HistoryFilters,
  HouseSelection
} from "./types/contracts.js";
