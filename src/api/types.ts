import type { ReopenPolicy } from "../config/schema.js";
import type { FeedManifest } from "../export/feed.js";
import type {
  LedgerViolation,
  Milestone,
  PartitionName,
  RecordKind,
  Task,
} from "../ledger/types.js";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";
export type ResourceName = "milestones" | "tasks";

/** A call against the mutation surface. Dry-run unless `apply` is set. */
export interface LedgerRequest {
  method: string;
  /** `/milestones`, `/tasks/T-1101`, ... */
  path: string;
  body?: unknown;
  apply?: boolean;
  /** Archive even while active records still reference the id. */
  force?: boolean;
  /** On task DELETE, strip the id from active dependents' dependsOn. */
  removeDependents?: boolean;
  /** Overrides the configured policy when a Complete milestone is reopened. */
  reopen?: ReopenPolicy;
  /** Fail with ConcurrentModification unless the ledger is at this generation. */
  expectedGeneration?: number;
}

export interface ParsedRequest {
  method: HttpMethod;
  resource: ResourceName;
  id?: string;
  body?: unknown;
}

export type LedgerRecord = Milestone | Task;

export interface RecordChange {
  kind: RecordKind;
  id: string;
  action: "create" | "update" | "archive";
  /** Top-level fields whose value changed. */
  fields: string[];
  before?: LedgerRecord;
  after?: LedgerRecord;
}

export interface LedgerResponse {
  ok: boolean;
  mode: "read" | "dry-run" | "apply";
  method: string;
  path: string;
  summary: string;
  /** Generation the response describes: the loaded one, or the new one on apply. */
  generation: number;
  diff: RecordChange[];
  violations: LedgerViolation[];
  record?: LedgerRecord;
  records?: LedgerRecord[];
  partition?: PartitionName;
  /** Written artifact paths, on apply. */
  artifacts?: string[];
  feed?: FeedManifest;
}
