import { LedgerIntegrityError } from "../ledger/types.js";
import type { LedgerViolation } from "../ledger/types.js";
import { prerequisites, sortIds } from "./build.js";
import type { DanglingEdge, DependencyGraph } from "./types.js";

/**
 * Run the fatal graph checks: dangling references, then cycles.
 * Returns all violations found (does not short-circuit on first error).
 */
export function validateGraph(graph: DependencyGraph): LedgerViolation[] {
  const errors = resolveAllIds(graph);
  const cycle = checkAcyclic(graph);
  if (cycle) errors.push(cycle);
  return errors;
}

/** Every referenced id must exist in the node set. */
export function resolveAllIds(graph: DependencyGraph): LedgerViolation[] {
  return findDanglingEdges(graph).map((edge) => ({
    type: "DanglingDependency",
    message:
      edge.field === "milestoneId"
        ? `"${edge.from}" belongs to non-existent milestone "${edge.to}"`
        : `"${edge.from}" depends on non-existent "${edge.to}"`,
    context: { ...edge },
  }));
}

export function findDanglingEdges(graph: DependencyGraph): DanglingEdge[] {
  const dangling: DanglingEdge[] = [];
  for (const id of sortIds(graph.nodes.keys())) {
    const node = graph.nodes.get(id);
    if (!node) continue;
    for (const dep of node.dependsOn) {
      if (!graph.nodes.has(dep)) dangling.push({ from: id, to: dep, field: "dependsOn" });
    }
    if (node.container && !graph.nodes.has(node.container)) {
      dangling.push({ from: id, to: node.container, field: "milestoneId" });
    }
  }
  return dangling;
}

/** Returns a CycleDetected violation, or null if the graph is acyclic. */
export function checkAcyclic(graph: DependencyGraph): LedgerViolation | null {
  const cycle = detectCycle(graph);
  if (!cycle) return null;
  return {
    type: "CycleDetected",
    message: `Dependency cycle: ${[...cycle, cycle[0]].join(" → ")}`,
    context: { cycle },
  };
}

/**
 * Three-color DFS in id order. On the first back edge, returns the shortest
 * cycle through the node the edge points at, without repeating it at the end.
 */
export function detectCycle(graph: DependencyGraph): string[] | null {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const id of graph.nodes.keys()) color.set(id, WHITE);

  function visit(id: string): string | null {
    color.set(id, GRAY);
    const node = graph.nodes.get(id);
    for (const next of node ? prerequisites(node) : []) {
      const c = color.get(next);
      if (c === undefined) continue; // dangling, reported separately
      if (c === GRAY) return next;
      if (c === WHITE) {
        const hit = visit(next);
        if (hit) return hit;
      }
    }
    color.set(id, BLACK);
    return null;
  }

  for (const id of sortIds(graph.nodes.keys())) {
    if (color.get(id) !== WHITE) continue;
    const target = visit(id);
    if (target) return shortestCycleThrough(graph, target);
  }
  return null;
}

/** BFS from `start` back to itself; neighbor order is by id so the result is stable. */
function shortestCycleThrough(graph: DependencyGraph, start: string): string[] {
  const parent = new Map<string, string>();
  const queue: string[] = [start];
  const seen = new Set<string>([start]);

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    const node = graph.nodes.get(current);
    for (const next of node ? prerequisites(node) : []) {
      if (next === start) {
        const path = [current];
        let step = current;
        while (step !== start) {
          const prev = parent.get(step);
          if (prev === undefined) break;
          path.unshift(prev);
          step = prev;
        }
        return path;
      }
      if (!seen.has(next) && graph.nodes.has(next)) {
        seen.add(next);
        parent.set(next, current);
        queue.push(next);
      }
    }
  }
  return [start];
}

/** Throw before any output is produced if the graph has fatal violations. */
export function assertValidGraph(graph: DependencyGraph): void {
  const errors = validateGraph(graph);
  if (errors.length > 0) throw new LedgerIntegrityError(errors);
}
