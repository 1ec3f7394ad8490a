import type { ResolvedConfig } from "../config/loader.js";
import type { HandlerOptions } from "./handler.js";
import { FileLedgerStore } from "./store.js";

export type {
  HttpMethod,
  LedgerRecord,
  LedgerRequest,
  LedgerResponse,
  ParsedRequest,
  RecordChange,
  ResourceName,
} from "./types.js";
export { handleRequest } from "./handler.js";
export type { HandlerOptions } from "./handler.js";
export { FileLedgerStore } from "./store.js";
export type { LedgerSnapshot, LedgerStore } from "./store.js";
export { applyMutation, cloneLedger } from "./mutations.js";
export { diffLedgers } from "./diff.js";
export { parseRequest, splitPath } from "./request.js";

/** File-backed store and handler options for a loaded project config. */
export function openLedger(config: ResolvedConfig): {
  store: FileLedgerStore;
  options: HandlerOptions;
} {
  return {
    store: new FileLedgerStore({
      ledgerDir: config.ledgerDir,
      artifactsDir: config.artifactsDir,
      lock: config.lock,
    }),
    options: {
      render: config.render,
      artifactPrefix: config.artifactPrefix,
      reopenPolicy: config.reopenPolicy,
    },
  };
}
