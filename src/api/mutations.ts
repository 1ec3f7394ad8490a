import { sortIds } from "../graph/build.js";
import type { ReopenPolicy } from "../config/schema.js";
import { parseRecord } from "../ledger/validator.js";
import type { Ledger, LedgerViolation, Milestone, Task } from "../ledger/types.js";
import { badRequest, isPlainObject } from "./request.js";
import type { LedgerRecord, ParsedRequest } from "./types.js";

export interface MutationOptions {
  force: boolean;
  removeDependents: boolean;
  reopen: ReopenPolicy;
  /** ISO date stamped on completions and archives. */
  today: string;
}

export type MutationResult =
  | { ok: true; ledger: Ledger; summary: string; record: LedgerRecord }
  | { ok: false; violations: LedgerViolation[] };

function fail(...violations: LedgerViolation[]): MutationResult {
  return { ok: false, violations };
}

export function cloneLedger(ledger: Ledger): Ledger {
  return structuredClone(ledger);
}

function idInUse(ledger: Ledger, id: string): boolean {
  return [ledger.active, ledger.archived].some(
    (part) => id in part.milestones || id in part.tasks,
  );
}

function duplicate(id: string): LedgerViolation {
  return {
    type: "DuplicateId",
    message: `Id "${id}" is already in use; archived ids are never reused`,
    context: { id },
  };
}

function notFound(kind: "milestone" | "task", id: string, ledger: Ledger): LedgerViolation {
  const archived = kind === "milestone" ? id in ledger.archived.milestones : id in ledger.archived.tasks;
  return {
    type: "NotFound",
    message: archived
      ? `${kind} "${id}" is archived and can no longer be changed`
      : `${kind} "${id}" not found`,
    context: { id, archived },
  };
}

function immutableId(
  id: string,
  body: Record<string, unknown>,
): LedgerViolation | null {
  if (!("id" in body) || body.id === id) return null;
  return {
    type: "ImmutableId",
    message: `Id "${id}" cannot be changed to ${JSON.stringify(body.id)}`,
    context: { id, requested: body.id },
  };
}

// ---------------------------------------------------------------------------
// Milestones
// ---------------------------------------------------------------------------

function createMilestone(
  ledger: Ledger,
  body: Record<string, unknown>,
  options: MutationOptions,
): MutationResult {
  const { tasks: inline, ...fields } = body;
  const violations: LedgerViolation[] = [];

  const inlineTasks: Task[] = [];
  if (inline !== undefined && !Array.isArray(inline)) {
    violations.push(badRequest("tasks must be a list of task records"));
  }
  for (const raw of Array.isArray(inline) ? inline : []) {
    if (!isPlainObject(raw)) {
      violations.push(badRequest("each inline task must be an object"));
      continue;
    }
    const result = parseRecord("task", { milestoneId: fields.id, ...raw });
    if (result.ok) inlineTasks.push(result.value);
    else violations.push(...result.violations);
  }

  const inlineIds = inlineTasks.map((task) => task.id);
  const listed = fields.taskIds;
  const taskIds =
    listed === undefined
      ? inlineIds
      : Array.isArray(listed)
        ? [...listed, ...inlineIds.filter((id) => !listed.includes(id))]
        : listed;
  const result = parseRecord("milestone", { ...fields, taskIds });
  if (!result.ok) violations.push(...result.violations);
  if (violations.length > 0 || !result.ok) return fail(...violations);

  const milestone = result.value;
  if (milestone.status === "Complete" && !milestone.completedOn) milestone.completedOn = options.today;

  const seen = new Set<string>();
  for (const id of [milestone.id, ...inlineIds]) {
    if (idInUse(ledger, id) || seen.has(id)) violations.push(duplicate(id));
    seen.add(id);
  }
  if (violations.length > 0) return fail(...violations);

  const next = cloneLedger(ledger);
  next.active.milestones[milestone.id] = milestone;
  for (const task of inlineTasks) next.active.tasks[task.id] = task;

  const suffix = inlineTasks.length > 0 ? ` with ${inlineTasks.length} task(s)` : "";
  return { ok: true, ledger: next, summary: `created milestone ${milestone.id}${suffix}`, record: milestone };
}

/**
 * Done tasks of the milestone, plus active Done tasks that depend on them
 * directly or transitively.
 */
function tasksToReset(ledger: Ledger, milestone: Milestone): string[] {
  const reset = new Set(
    milestone.taskIds.filter((id) => ledger.active.tasks[id]?.status === "Done"),
  );
  let grew = reset.size > 0;
  while (grew) {
    grew = false;
    for (const task of Object.values(ledger.active.tasks)) {
      if (task.status !== "Done" || reset.has(task.id)) continue;
      if (task.dependsOn.some((dep) => reset.has(dep))) {
        reset.add(task.id);
        grew = true;
      }
    }
  }
  return sortIds(reset);
}

function patchMilestone(
  ledger: Ledger,
  id: string,
  body: Record<string, unknown>,
  options: MutationOptions,
): MutationResult {
  const existing = ledger.active.milestones[id];
  if (!existing) return fail(notFound("milestone", id, ledger));
  const renamed = immutableId(id, body);
  if (renamed) return fail(renamed);

  const merged: Record<string, unknown> = { ...existing, ...body };
  const reopening = existing.status === "Complete" && merged.status !== "Complete";
  const completing = existing.status !== "Complete" && merged.status === "Complete";
  if (reopening && !("completedOn" in body)) delete merged.completedOn;
  if (completing && !("completedOn" in body)) merged.completedOn = options.today;

  const result = parseRecord("milestone", merged, id);
  if (!result.ok) return fail(...result.violations);

  const next = cloneLedger(ledger);
  next.active.milestones[id] = result.value;

  let summary = `updated milestone ${id}`;
  if (reopening) {
    const reset = options.reopen === "reset" ? tasksToReset(next, result.value) : [];
    for (const taskId of reset) next.active.tasks[taskId].status = "In Progress";
    summary +=
      reset.length > 0
        ? `; reopened, reset ${reset.join(", ")} to In Progress`
        : "; reopened, tasks kept";
  }
  return { ok: true, ledger: next, summary, record: result.value };
}

function deleteMilestone(ledger: Ledger, id: string, options: MutationOptions): MutationResult {
  const existing = ledger.active.milestones[id];
  if (!existing) return fail(notFound("milestone", id, ledger));

  const referencedBy = sortIds([
    ...Object.values(ledger.active.milestones)
      .filter((m) => m.dependsOn.includes(id))
      .map((m) => m.id),
    ...Object.values(ledger.active.tasks)
      .filter((t) => t.milestoneId === id)
      .map((t) => t.id),
  ]);
  if (referencedBy.length > 0 && !options.force) {
    return fail({
      type: "ActiveReferenceExists",
      message: `Milestone "${id}" is still referenced by active records: ${referencedBy.join(", ")}; archive those first or use force`,
      context: { id, referencedBy },
    });
  }

  const next = cloneLedger(ledger);
  delete next.active.milestones[id];
  const archived: Milestone = { ...existing, archivedOn: options.today };
  next.archived.milestones[id] = archived;
  return { ok: true, ledger: next, summary: `archived milestone ${id}`, record: archived };
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

/** Add the task to the target milestone's taskIds, if that milestone is active. */
function linkTask(next: Ledger, task: Task): LedgerViolation | null {
  const milestone = next.active.milestones[task.milestoneId];
  if (milestone) {
    if (!milestone.taskIds.includes(task.id)) milestone.taskIds.push(task.id);
    return null;
  }
  if (task.milestoneId in next.archived.milestones) {
    return badRequest(`Milestone "${task.milestoneId}" is archived and cannot take new tasks`, {
      id: task.id,
      milestoneId: task.milestoneId,
    });
  }
  // Unknown milestone: reported as DanglingDependency by validation.
  return null;
}

function createTask(ledger: Ledger, body: Record<string, unknown>): MutationResult {
  const result = parseRecord("task", body);
  if (!result.ok) return fail(...result.violations);
  const task = result.value;
  if (idInUse(ledger, task.id)) return fail(duplicate(task.id));

  const next = cloneLedger(ledger);
  next.active.tasks[task.id] = task;
  const problem = linkTask(next, task);
  if (problem) return fail(problem);
  return { ok: true, ledger: next, summary: `created task ${task.id}`, record: task };
}

function patchTask(ledger: Ledger, id: string, body: Record<string, unknown>): MutationResult {
  const existing = ledger.active.tasks[id];
  if (!existing) return fail(notFound("task", id, ledger));
  const renamed = immutableId(id, body);
  if (renamed) return fail(renamed);

  const result = parseRecord("task", { ...existing, ...body }, id);
  if (!result.ok) return fail(...result.violations);
  const task = result.value;

  const next = cloneLedger(ledger);
  next.active.tasks[id] = task;

  let summary = `updated task ${id}`;
  if (task.milestoneId !== existing.milestoneId) {
    const previous = next.active.milestones[existing.milestoneId];
    if (previous) previous.taskIds = previous.taskIds.filter((taskId) => taskId !== id);
    const problem = linkTask(next, task);
    if (problem) return fail(problem);
    summary += `; moved from ${existing.milestoneId} to ${task.milestoneId}`;
  }
  return { ok: true, ledger: next, summary, record: task };
}

function deleteTask(ledger: Ledger, id: string, options: MutationOptions): MutationResult {
  const existing = ledger.active.tasks[id];
  if (!existing) return fail(notFound("task", id, ledger));

  const dependents = sortIds(
    Object.values(ledger.active.tasks)
      .filter((task) => task.dependsOn.includes(id))
      .map((task) => task.id),
  );
  if (dependents.length > 0 && !options.force && !options.removeDependents) {
    return fail({
      type: "ActiveReferenceExists",
      message: `Task "${id}" is depended on by active tasks: ${dependents.join(", ")}; use force or remove those references`,
      context: { id, referencedBy: dependents },
    });
  }

  const next = cloneLedger(ledger);
  delete next.active.tasks[id];
  const archived: Task = { ...existing, archivedOn: options.today };
  next.archived.tasks[id] = archived;

  let summary = `archived task ${id}`;
  if (options.removeDependents && dependents.length > 0) {
    for (const dependent of dependents) {
      const task = next.active.tasks[dependent];
      task.dependsOn = task.dependsOn.filter((dep) => dep !== id);
    }
    summary += `; removed from dependsOn of ${dependents.join(", ")}`;
  }
  return { ok: true, ledger: next, summary, record: archived };
}

/**
 * Compute the would-be ledger for a write request. Never touches `ledger`;
 * cross-record invariants are checked afterwards by the caller.
 */
export function applyMutation(
  ledger: Ledger,
  request: ParsedRequest,
  options: MutationOptions,
): MutationResult {
  const body = isPlainObject(request.body) ? request.body : {};
  const id = request.id ?? "";

  switch (`${request.method} ${request.resource}`) {
    case "POST milestones":
      return createMilestone(ledger, body, options);
    case "PATCH milestones":
      return patchMilestone(ledger, id, body, options);
    case "DELETE milestones":
      return deleteMilestone(ledger, id, options);
    case "POST tasks":
      return createTask(ledger, body);
    case "PATCH tasks":
      return patchTask(ledger, id, body);
    case "DELETE tasks":
      return deleteTask(ledger, id, options);
    default:
      return fail(badRequest(`${request.method} is not a write method`));
  }
}
