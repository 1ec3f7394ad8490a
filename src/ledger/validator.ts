import type { z } from "zod";
import { milestoneSchema, taskSchema } from "./schemas.js";
import type {
  LedgerViolation,
  Milestone,
  RecordKind,
  Task,
  ViolationType,
} from "./types.js";

/** Fields that hold ids (or lists of ids). Shape failures there are id-format failures. */
const ID_FIELDS = new Set(["id", "milestoneId", "dependsOn", "taskIds"]);

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; violations: LedgerViolation[] };

function classifyIssue(issue: z.ZodIssue): ViolationType {
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return "MissingField";
  }
  const field = issue.path[0];
  if (typeof field === "string") {
    if (ID_FIELDS.has(field)) return "BadIdFormat";
    if (field === "status") return "BadStatusValue";
    if (field === "boardRefs") return "BadBoardRef";
    if (issue.code === "too_small" && issue.type === "string") return "MissingField";
  }
  return "SchemaError";
}

function describeRecord(kind: RecordKind, raw: unknown, key?: string): string {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") {
    return `${kind} "${raw.id}"`;
  }
  return key ? `${kind} "${key}"` : kind;
}

/**
 * Structural check of a single record: required fields, id shapes, status enum.
 * References are not resolved here. `key` is the id the record is stored under, if any.
 */
export function parseRecord(kind: "milestone", raw: unknown, key?: string): ParseResult<Milestone>;
export function parseRecord(kind: "task", raw: unknown, key?: string): ParseResult<Task>;
export function parseRecord(
  kind: RecordKind,
  raw: unknown,
  key?: string,
): ParseResult<Milestone | Task>;
export function parseRecord(
  kind: RecordKind,
  raw: unknown,
  key?: string,
): ParseResult<Milestone | Task> {
  return kind === "milestone"
    ? finishParse(kind, raw, key, milestoneSchema.safeParse(raw))
    : finishParse(kind, raw, key, taskSchema.safeParse(raw));
}

function finishParse<T extends { id: string }>(
  kind: RecordKind,
  raw: unknown,
  key: string | undefined,
  result: { success: true; data: T } | { success: false; error: z.ZodError },
): ParseResult<T> {
  const label = describeRecord(kind, raw, key);

  if (!result.success) {
    const violations = result.error.issues.map((issue): LedgerViolation => {
      const field = issue.path.join(".");
      return {
        type: classifyIssue(issue),
        message: `${label}: ${field ? `${field}: ` : ""}${issue.message}`,
        context: { kind, id: key ?? null, field, value: valueAt(raw, issue.path) },
      };
    });
    return { ok: false, violations };
  }

  if (key !== undefined && result.data.id !== key) {
    return {
      ok: false,
      violations: [
        {
          type: "BadIdFormat",
          message: `${label} is stored under key "${key}"`,
          context: { kind, id: result.data.id, key },
        },
      ],
    };
  }

  return { ok: true, value: result.data };
}

/** Pure structural check. An empty list means the record is well formed. */
export function validateRecord(kind: RecordKind, raw: unknown, key?: string): LedgerViolation[] {
  const result = parseRecord(kind, raw, key);
  return result.ok ? [] : result.violations;
}

function valueAt(raw: unknown, path: Array<string | number>): unknown {
  let current: unknown = raw;
  for (const segment of path) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}
