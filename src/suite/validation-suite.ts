import { buildGraph } from "../graph/build.js";
import { checkAcyclic, resolveAllIds } from "../graph/validator.js";
import { checkLedgerInvariants } from "../ledger/invariants.js";
import { parseLedger } from "../ledger/reader.js";
import type { RawLedger } from "../ledger/reader.js";
import type { BoardsRegistry, Ledger, LedgerViolation } from "../ledger/types.js";
import { renderArtifacts } from "../export/pipeline.js";
import type { RenderBundle, RenderSettings } from "../export/pipeline.js";
import type { ArtifactContent } from "../export/feed.js";

export type CheckName = "schema" | "acyclic" | "dangling" | "invariants" | "render-idempotence";

export interface CheckResult {
  name: CheckName;
  status: "pass" | "fail" | "skipped";
  violations: number;
  detail?: string;
}

export interface SuiteReport {
  ok: boolean;
  generation: number;
  violations: LedgerViolation[];
  checks: CheckResult[];
}

export interface SuiteOptions {
  settings: RenderSettings;
  prefix: string;
  /** Render function under test. Defaults to renderArtifacts. */
  render?: (
    ledger: Ledger,
    boards: BoardsRegistry,
    settings: RenderSettings,
    prefix: string,
  ) => RenderBundle;
}

function sameContent(a: ArtifactContent, b: ArtifactContent): boolean {
  if (typeof a.content === "string" && typeof b.content === "string") {
    return a.content === b.content;
  }
  if (Buffer.isBuffer(a.content) && Buffer.isBuffer(b.content)) {
    return a.content.equals(b.content);
  }
  return false;
}

/** Names of files that differ between two renders of the same snapshot. */
export function diffRenders(first: RenderBundle, second: RenderBundle): string[] {
  const mismatched: string[] = [];
  const names = new Set([...first.files, ...second.files].map((file) => file.name));
  for (const name of names) {
    const a = first.files.find((file) => file.name === name);
    const b = second.files.find((file) => file.name === name);
    if (!a || !b || !sameContent(a, b)) mismatched.push(name);
  }
  return mismatched;
}

function record(
  checks: CheckResult[],
  all: LedgerViolation[],
  name: CheckName,
  found: LedgerViolation[],
): boolean {
  checks.push({ name, status: found.length === 0 ? "pass" : "fail", violations: found.length });
  all.push(...found);
  return found.length === 0;
}

/**
 * Run every check over the raw documents in a fixed order and collect all
 * violations. Render idempotence is skipped when the graph checks failed,
 * since rendering would abort.
 */
export function runValidationSuite(
  raw: RawLedger,
  boards: BoardsRegistry,
  options: SuiteOptions,
): SuiteReport {
  const violations: LedgerViolation[] = [];
  const checks: CheckResult[] = [];

  const { ledger, violations: schemaViolations } = parseLedger(raw);
  record(checks, violations, "schema", schemaViolations);

  const graph = buildGraph(ledger);
  const cycle = checkAcyclic(graph);
  const acyclic = record(checks, violations, "acyclic", cycle ? [cycle] : []);
  const resolved = record(checks, violations, "dangling", resolveAllIds(graph));
  record(checks, violations, "invariants", checkLedgerInvariants(ledger, boards, graph));

  if (!acyclic || !resolved) {
    checks.push({
      name: "render-idempotence",
      status: "skipped",
      violations: 0,
      detail: "graph checks failed",
    });
  } else {
    const render = options.render ?? renderArtifacts;
    const first = render(ledger, boards, options.settings, options.prefix);
    const second = render(ledger, boards, options.settings, options.prefix);
    const mismatched = diffRenders(first, second);
    record(
      checks,
      violations,
      "render-idempotence",
      mismatched.map((name) => ({
        type: "RenderMismatch",
        message: `Two renders of the same snapshot differ in ${name}`,
        context: { artifact: name },
      })),
    );
  }

  return { ok: violations.length === 0, generation: ledger.generation, violations, checks };
}
