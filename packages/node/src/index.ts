/**
 * @ballast/node — HTTP host for collateral ledgers.
 *
 * Package public API. The server entry point lives in main.ts.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { LedgerRegistry } from "./services/ledger-registry.js";
export type { LedgerRegistryOptions, HostedLedger } from "./services/ledger-registry.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery } from "./services/audit-log.js";
export { hashLedgerSnapshot } from "./services/state-hash.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
