import { sortIds } from "../graph/build.js";
import type { Ledger, RecordKind } from "../ledger/types.js";
import type { LedgerRecord, RecordChange } from "./types.js";

function changedFields(before: LedgerRecord, after: LedgerRecord): string[] {
  const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
  return [...keys]
    .filter(
      (key) => JSON.stringify(Reflect.get(before, key)) !== JSON.stringify(Reflect.get(after, key)),
    )
    .sort();
}

function diffKind(
  kind: RecordKind,
  before: { active: Record<string, LedgerRecord>; archived: Record<string, LedgerRecord> },
  after: { active: Record<string, LedgerRecord>; archived: Record<string, LedgerRecord> },
): RecordChange[] {
  const changes: RecordChange[] = [];
  const ids = sortIds([...Object.keys(after.active), ...Object.keys(after.archived)]);

  for (const id of ids) {
    const prior = before.active[id] ?? before.archived[id];
    const next = after.active[id] ?? after.archived[id];
    if (!next) continue;
    if (!prior) {
      changes.push({ kind, id, action: "create", fields: Object.keys(next).sort(), after: next });
      continue;
    }
    const archived = id in before.active && id in after.archived;
    const fields = changedFields(prior, next);
    if (archived || fields.length > 0) {
      changes.push({
        kind,
        id,
        action: archived ? "archive" : "update",
        fields,
        before: prior,
        after: next,
      });
    }
  }
  return changes;
}

/** Record-level changes from `before` to `after`, milestones first, ids ascending. */
export function diffLedgers(before: Ledger, after: Ledger): RecordChange[] {
  return [
    ...diffKind(
      "milestone",
      { active: before.active.milestones, archived: before.archived.milestones },
      { active: after.active.milestones, archived: after.archived.milestones },
    ),
    ...diffKind(
      "task",
      { active: before.active.tasks, archived: before.archived.tasks },
      { active: after.active.tasks, archived: after.archived.tasks },
    ),
  ];
}
