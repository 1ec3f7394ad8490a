import type { Ledger, LedgerPartition, PartitionName } from "../ledger/types.js";
import type { DependencyGraph, GraphNode } from "./types.js";

/** Code-unit order. Locale independent so output is identical on every machine. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortIds(ids: Iterable<string>): string[] {
  return [...new Set(ids)].sort(compareIds);
}

/** All edges out of a node: explicit dependencies plus containment. */
export function prerequisites(node: GraphNode): string[] {
  return node.container ? sortIds([...node.dependsOn, node.container]) : node.dependsOn;
}

/** Done-equivalent: archived, a Done task, or a Complete milestone. */
export function isSettled(node: GraphNode): boolean {
  if (node.partition === "archived") return true;
  return node.kind === "task" ? node.status === "Done" : node.status === "Complete";
}

function addPartition(
  nodes: Map<string, GraphNode>,
  partition: LedgerPartition,
  name: PartitionName,
): void {
  for (const milestone of Object.values(partition.milestones)) {
    if (nodes.has(milestone.id)) continue;
    nodes.set(milestone.id, {
      id: milestone.id,
      kind: "milestone",
      partition: name,
      status: milestone.status,
      dependsOn: sortIds(milestone.dependsOn),
    });
  }
  for (const task of Object.values(partition.tasks)) {
    if (nodes.has(task.id)) continue;
    nodes.set(task.id, {
      id: task.id,
      kind: "task",
      partition: name,
      status: task.status,
      dependsOn: sortIds(task.dependsOn),
      container: task.milestoneId,
    });
  }
}

/**
 * Build the combined graph. Active records take precedence when an id is
 * (invalidly) present in both partitions; the invariant check reports that.
 */
export function buildGraph(ledger: Ledger): DependencyGraph {
  const nodes = new Map<string, GraphNode>();
  addPartition(nodes, ledger.active, "active");
  addPartition(nodes, ledger.archived, "archived");

  const dependents = new Map<string, string[]>();
  for (const id of sortIds(nodes.keys())) {
    const node = nodes.get(id);
    if (!node) continue;
    for (const prereq of prerequisites(node)) {
      const list = dependents.get(prereq);
      if (list) {
        list.push(id);
      } else {
        dependents.set(prereq, [id]);
      }
    }
  }

  return { nodes, dependents };
}
