import { compareIds } from "../graph/build.js";
import type { ReopenPolicy } from "../config/schema.js";
import { renderArtifacts } from "../export/pipeline.js";
import type { RenderSettings } from "../export/pipeline.js";
import type { FeedManifest } from "../export/feed.js";
import { validateLedger } from "../ledger/invariants.js";
import type { Ledger, LedgerViolation } from "../ledger/types.js";
import { diffLedgers } from "./diff.js";
import { applyMutation } from "./mutations.js";
import { parseRequest } from "./request.js";
import type { LedgerStore } from "./store.js";
import type { LedgerRequest, LedgerResponse, ParsedRequest } from "./types.js";

export interface HandlerOptions {
  render: RenderSettings;
  artifactPrefix: string;
  reopenPolicy: ReopenPolicy;
  /** Clock for completedOn and archivedOn stamps. */
  now?: () => Date;
}

type Commit =
  | { ok: true; generation: number; artifacts: string[]; feed: FeedManifest }
  | { ok: false; violation: LedgerViolation };

function conflict(expected: number, actual: number): LedgerViolation {
  return {
    type: "ConcurrentModification",
    message: `Ledger is at generation ${actual}, expected ${expected}; reload and retry`,
    context: { expected, actual },
  };
}

type ReadResult = Pick<
  LedgerResponse,
  "ok" | "summary" | "violations" | "record" | "records" | "partition"
>;

function read(ledger: Ledger, request: ParsedRequest): ReadResult {
  const kind = request.resource === "milestones" ? "milestones" : "tasks";
  if (request.id === undefined) {
    const records = Object.values(ledger.active[kind]).sort((a, b) => compareIds(a.id, b.id));
    return { ok: true, summary: `${records.length} active ${kind}`, violations: [], records };
  }
  for (const partition of ["active", "archived"] as const) {
    const record = ledger[partition][kind][request.id];
    if (record) {
      return { ok: true, summary: `${kind} ${request.id} (${partition})`, violations: [], record, partition };
    }
  }
  return {
    ok: false,
    summary: "not found",
    violations: [
      { type: "NotFound", message: `"${request.id}" not found in ${kind}`, context: { id: request.id } },
    ],
  };
}

/**
 * Serve one request. Writes are dry-run unless `apply` is set; an apply
 * validates the would-be ledger, then under the lock checks the generation,
 * renders, writes both partitions and the artifacts before returning.
 */
export async function handleRequest(
  store: LedgerStore,
  request: LedgerRequest,
  options: HandlerOptions,
): Promise<LedgerResponse> {
  const snapshot = await store.load();
  const generation = snapshot.ledger.generation;
  const base = {
    method: request.method.toUpperCase(),
    path: request.path,
    generation,
    diff: [],
  };

  const parsed = parseRequest(request);
  const mode: LedgerResponse["mode"] =
    parsed.ok && parsed.value.method === "GET" ? "read" : request.apply ? "apply" : "dry-run";
  if (!parsed.ok) {
    return { ...base, ok: false, mode, summary: "rejected", violations: [parsed.violation] };
  }
  if (request.expectedGeneration !== undefined && request.expectedGeneration !== generation) {
    return {
      ...base,
      ok: false,
      mode,
      summary: "rejected",
      violations: [conflict(request.expectedGeneration, generation)],
    };
  }
  if (parsed.value.method === "GET") {
    return { ...base, mode, ...read(snapshot.ledger, parsed.value) };
  }

  const today = (options.now ?? (() => new Date()))().toISOString().slice(0, 10);
  const mutation = applyMutation(snapshot.ledger, parsed.value, {
    force: request.force ?? false,
    removeDependents: request.removeDependents ?? false,
    reopen: request.reopen ?? options.reopenPolicy,
    today,
  });
  if (!mutation.ok) {
    return { ...base, ok: false, mode, summary: "rejected", violations: mutation.violations };
  }

  const diff = diffLedgers(snapshot.ledger, mutation.ledger);
  const violations = [...snapshot.violations, ...validateLedger(mutation.ledger, snapshot.boards)];
  const proposed = { ...base, mode, diff, record: mutation.record };
  if (violations.length > 0) {
    return { ...proposed, ok: false, summary: `${mutation.summary} (rejected)`, violations };
  }
  if (!request.apply) {
    return { ...proposed, ok: true, summary: `${mutation.summary} (dry-run, nothing written)`, violations: [] };
  }

  const commit = await store.withLock(async (): Promise<Commit> => {
    const current = await store.load();
    if (current.ledger.generation !== generation) {
      return { ok: false, violation: conflict(generation, current.ledger.generation) };
    }
    const next: Ledger = { ...mutation.ledger, generation: generation + 1 };
    const bundle = renderArtifacts(next, current.boards, options.render, options.artifactPrefix);
    await store.save(next);
    const artifacts = await store.saveArtifacts(bundle);
    return { ok: true, generation: next.generation, artifacts, feed: bundle.feed };
  });

  if (!commit.ok) {
    return { ...proposed, ok: false, summary: `${mutation.summary} (rejected)`, violations: [commit.violation] };
  }
  return {
    ...proposed,
    ok: true,
    generation: commit.generation,
    summary: mutation.summary,
    violations: [],
    artifacts: commit.artifacts,
    feed: commit.feed,
  };
}
