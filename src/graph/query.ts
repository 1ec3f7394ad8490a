import { LedgerIntegrityError } from "../ledger/types.js";
import type { Ledger, TaskStatus } from "../ledger/types.js";
import { compareIds, isSettled, prerequisites, sortIds } from "./build.js";
import { checkAcyclic } from "./validator.js";
import type { DependencyGraph } from "./types.js";

/** Per-milestone task counts. */
export interface MilestoneProgress {
  total: number;
  done: number;
  inProgress: number;
  blocked: number;
  /** Every task in taskIds is Done or archived. */
  isComplete: boolean;
}

// ── Ordering ─────────────────────────────────────────────────────────

/** Insert into an already sorted array, keeping it sorted. */
function insertSorted(list: string[], id: string): void {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (compareIds(list[mid], id) < 0) lo = mid + 1;
    else hi = mid;
  }
  list.splice(lo, 0, id);
}

/**
 * Deterministic topological order, prerequisites first. Among nodes that are
 * ready at the same time the smallest id goes first. Throws on a cycle.
 */
export function topoOrder(graph: DependencyGraph): string[] {
  const remaining = new Map<string, number>();
  const ready: string[] = [];

  for (const id of sortIds(graph.nodes.keys())) {
    const node = graph.nodes.get(id);
    if (!node) continue;
    const count = prerequisites(node).filter((p) => graph.nodes.has(p)).length;
    remaining.set(id, count);
    if (count === 0) ready.push(id);
  }

  const order: string[] = [];
  while (ready.length > 0) {
    const id = ready.shift();
    if (id === undefined) break;
    order.push(id);
    for (const dependent of graph.dependents.get(id) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, left);
      if (left === 0) insertSorted(ready, dependent);
    }
  }

  if (order.length < graph.nodes.size) {
    const cycle = checkAcyclic(graph);
    throw new LedgerIntegrityError(
      cycle
        ? [cycle]
        : [{ type: "CycleDetected", message: "Dependency cycle detected", context: {} }],
    );
  }
  return order;
}

/**
 * DFS over dependsOn edges. Returns ids deps-first with the target last.
 * Throws on cycle detection.
 */
export function getTransitiveDeps(graph: DependencyGraph, id: string): string[] {
  const result: string[] = [];
  const visited = new Set<string>();
  const visiting = new Set<string>();

  function visit(currentId: string): void {
    if (visited.has(currentId)) return;
    if (visiting.has(currentId)) {
      throw new Error(`Cycle detected: ${currentId} is part of a dependency cycle`);
    }
    visiting.add(currentId);
    for (const depId of graph.nodes.get(currentId)?.dependsOn ?? []) {
      visit(depId);
    }
    visiting.delete(currentId);
    visited.add(currentId);
    result.push(currentId);
  }

  visit(id);
  return result;
}

// ── Unlock rule ──────────────────────────────────────────────────────

/** Dependencies of `id` that are not yet Done/Complete/archived (missing ids included). */
export function blockersOf(graph: DependencyGraph, id: string): string[] {
  const node = graph.nodes.get(id);
  if (!node) return [];
  return node.dependsOn.filter((dep) => {
    const depNode = graph.nodes.get(dep);
    return !depNode || !isSettled(depNode);
  });
}

/** True iff every dependency of `id` is Done (Complete for milestones) or archived. */
export function isUnlocked(graph: DependencyGraph, id: string): boolean {
  if (!graph.nodes.has(id)) return false;
  return blockersOf(graph, id).length === 0;
}

/** Active, unfinished tasks with at least one unsettled dependency. */
export function findBlocked(
  graph: DependencyGraph,
): Array<{ id: string; blockedBy: string[] }> {
  const result: Array<{ id: string; blockedBy: string[] }> = [];
  for (const id of sortIds(graph.nodes.keys())) {
    const node = graph.nodes.get(id);
    if (!node || node.kind !== "task" || node.partition !== "active") continue;
    if (node.status === "Done") continue;
    const blockedBy = blockersOf(graph, id);
    if (blockedBy.length > 0) result.push({ id, blockedBy });
  }
  return result;
}

// ── Progress ─────────────────────────────────────────────────────────

const IN_FLIGHT: ReadonlySet<TaskStatus> = new Set<TaskStatus>(["Ready", "In Progress", "Review"]);

/** Count each milestone's tasks by status. Archived tasks count as done. */
export function milestoneProgress(ledger: Ledger): Record<string, MilestoneProgress> {
  const result: Record<string, MilestoneProgress> = {};
  const milestones = { ...ledger.archived.milestones, ...ledger.active.milestones };

  for (const id of sortIds(Object.keys(milestones))) {
    const progress: MilestoneProgress = {
      total: 0,
      done: 0,
      inProgress: 0,
      blocked: 0,
      isComplete: true,
    };
    for (const taskId of milestones[id].taskIds) {
      progress.total++;
      if (ledger.archived.tasks[taskId]) {
        progress.done++;
        continue;
      }
      const task = ledger.active.tasks[taskId];
      if (!task) continue;
      if (task.status === "Done") progress.done++;
      else if (task.status === "Blocked") progress.blocked++;
      else if (IN_FLIGHT.has(task.status)) progress.inProgress++;
    }
    progress.isComplete = progress.total > 0 && progress.done === progress.total;
    result[id] = progress;
  }

  return result;
}
