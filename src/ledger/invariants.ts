import { buildGraph, sortIds } from "../graph/build.js";
import { blockersOf } from "../graph/query.js";
import { validateGraph } from "../graph/validator.js";
import type { DependencyGraph } from "../graph/types.js";
import type { LoadedLedger } from "./reader.js";
import { validateRecord } from "./validator.js";
import type {
  BoardRef,
  BoardsRegistry,
  Ledger,
  LedgerPartition,
  LedgerViolation,
  Milestone,
  PartitionName,
  Task,
} from "./types.js";

const PARTITIONS: PartitionName[] = ["active", "archived"];

function allMilestones(ledger: Ledger): Record<string, Milestone> {
  return { ...ledger.archived.milestones, ...ledger.active.milestones };
}

function allTasks(ledger: Ledger): Record<string, Task> {
  return { ...ledger.archived.tasks, ...ledger.active.tasks };
}

/** Ids may appear once across both partitions and both record kinds. */
function findDuplicateIds(ledger: Ledger): LedgerViolation[] {
  const seen = new Map<string, string>();
  const errors: LedgerViolation[] = [];
  for (const partition of PARTITIONS) {
    const part: LedgerPartition = ledger[partition];
    for (const id of [...Object.keys(part.milestones), ...Object.keys(part.tasks)]) {
      const first = seen.get(id);
      if (first) {
        errors.push({
          type: "DuplicateId",
          message: `Id "${id}" is used in both ${first} and ${partition} records`,
          context: { id, partitions: [first, partition] },
        });
      } else {
        seen.set(id, partition);
      }
    }
  }
  return errors;
}

/** Schema check of every record in the snapshot, keyed by the id it is stored under. */
export function validateRecords(ledger: Ledger): LedgerViolation[] {
  const errors: LedgerViolation[] = [];
  for (const partition of PARTITIONS) {
    const part = ledger[partition];
    for (const id of sortIds(Object.keys(part.milestones))) {
      errors.push(...validateRecord("milestone", part.milestones[id], id));
    }
    for (const id of sortIds(Object.keys(part.tasks))) {
      errors.push(...validateRecord("task", part.tasks[id], id));
    }
  }
  return errors;
}

function checkTaskLinks(ledger: Ledger): LedgerViolation[] {
  const errors: LedgerViolation[] = [];
  const tasks = allTasks(ledger);
  const milestones = allMilestones(ledger);

  for (const id of sortIds(Object.keys(milestones))) {
    const milestone = milestones[id];
    const frozen = id in ledger.archived.milestones;
    if (milestone.taskIds.length === 0) {
      errors.push({
        type: "NonEmptyTaskIdsViolation",
        message: `Milestone "${id}" has no tasks`,
        context: { id },
      });
    }
    for (const taskId of milestone.taskIds) {
      const task = tasks[taskId];
      if (!task) {
        errors.push({
          type: "DanglingDependency",
          message: `Milestone "${id}" lists non-existent task "${taskId}"`,
          context: { from: id, to: taskId, field: "taskIds" },
        });
      } else if (task.milestoneId !== id && !(frozen && taskId in ledger.active.tasks)) {
        // an archived milestone keeps listing active tasks that moved after it was archived
        errors.push({
          type: "TaskLinkMismatch",
          message: `Milestone "${id}" lists task "${taskId}", which belongs to "${task.milestoneId}"`,
          context: { milestoneId: id, taskId, owner: task.milestoneId },
        });
      }
    }
  }

  for (const taskId of sortIds(Object.keys(ledger.active.tasks))) {
    const task = ledger.active.tasks[taskId];
    const milestone = milestones[task.milestoneId];
    if (milestone && !milestone.taskIds.includes(taskId)) {
      errors.push({
        type: "TaskLinkMismatch",
        message: `Task "${taskId}" is not listed in the taskIds of milestone "${task.milestoneId}"`,
        context: { milestoneId: task.milestoneId, taskId },
      });
    }
  }

  return errors;
}

/** Done needs settled dependencies; Complete needs every task Done or archived. */
function checkUnlockRules(ledger: Ledger, graph: DependencyGraph): LedgerViolation[] {
  const errors: LedgerViolation[] = [];

  for (const id of sortIds(Object.keys(ledger.active.tasks))) {
    const task = ledger.active.tasks[id];
    if (task.status !== "Done") continue;
    const blockedBy = blockersOf(graph, id);
    if (blockedBy.length > 0) {
      errors.push({
        type: "UnlockRuleViolation",
        message: `Task "${id}" is Done but depends on unfinished ${blockedBy.join(", ")}`,
        context: { id, gate: "task-done", blockedBy },
      });
    }
  }

  for (const id of sortIds(Object.keys(ledger.active.milestones))) {
    const milestone = ledger.active.milestones[id];
    if (milestone.status !== "Complete") continue;
    const open = milestone.taskIds.filter((taskId) => {
      if (ledger.archived.tasks[taskId]) return false;
      return ledger.active.tasks[taskId]?.status !== "Done";
    });
    if (open.length > 0) {
      errors.push({
        type: "UnlockRuleViolation",
        message: `Milestone "${id}" is Complete but has unfinished tasks ${open.join(", ")}`,
        context: { id, gate: "milestone-complete", blockedBy: open },
      });
    }
  }

  return errors;
}

function boardRefResolves(ref: BoardRef, ledger: Ledger, boards: BoardsRegistry): boolean {
  switch (ref.kind) {
    case "milestone":
      return ref.value in ledger.active.milestones || ref.value in ledger.archived.milestones;
    case "team":
      return boards.teams.includes(ref.value);
    case "specialist":
      return boards.specialists.includes(ref.value);
  }
}

function checkBoardRefs(ledger: Ledger, boards: BoardsRegistry): LedgerViolation[] {
  const errors: LedgerViolation[] = [];
  for (const id of sortIds(Object.keys(ledger.active.tasks))) {
    for (const ref of ledger.active.tasks[id].boardRefs) {
      if (!boardRefResolves(ref, ledger, boards)) {
        errors.push({
          type: "UnknownBoardRef",
          message: `Task "${id}" references unknown ${ref.kind} "${ref.value}"`,
          context: { id, ref },
        });
      }
    }
  }
  return errors;
}

/**
 * Cross-record invariants that are not graph structure: duplicate ids,
 * milestone/task links, unlock and completion gates, board references.
 */
export function checkLedgerInvariants(
  ledger: Ledger,
  boards: BoardsRegistry,
  graph: DependencyGraph = buildGraph(ledger),
): LedgerViolation[] {
  return [
    ...findDuplicateIds(ledger),
    ...checkTaskLinks(ledger),
    ...checkUnlockRules(ledger, graph),
    ...checkBoardRefs(ledger, boards),
  ];
}

/** Everything a would-be ledger must pass before it may be written or rendered. */
export function validateLedger(ledger: Ledger, boards: BoardsRegistry): LedgerViolation[] {
  const graph = buildGraph(ledger);
  return [
    ...validateRecords(ledger),
    ...validateGraph(graph),
    ...checkLedgerInvariants(ledger, boards, graph),
  ];
}

/** Violations that keep a stored ledger from being rendered: records left out on load, then the rest. */
export function checkStoredLedger(loaded: LoadedLedger, boards: BoardsRegistry): LedgerViolation[] {
  return [...loaded.violations, ...validateLedger(loaded.ledger, boards)];
}
