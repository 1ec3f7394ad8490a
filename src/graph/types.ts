import type {
  MilestoneStatus,
  PartitionName,
  RecordKind,
  TaskStatus,
} from "../ledger/types.js";

/** One milestone or task in the combined dependency graph. */
export interface GraphNode {
  id: string;
  kind: RecordKind;
  partition: PartitionName;
  status: MilestoneStatus | TaskStatus;
  /** Explicit dependsOn edges, sorted by id. */
  dependsOn: string[];
  /** Owning milestone for tasks: the implicit containment edge. */
  container?: string;
}

/** Combined milestone + task DAG over the active and archived partitions. */
export interface DependencyGraph {
  nodes: Map<string, GraphNode>;
  /** Reverse edges: prerequisite id → ids that list it (dependsOn or containment). */
  dependents: Map<string, string[]>;
}

export interface DanglingEdge {
  from: string;
  to: string;
  field: "dependsOn" | "milestoneId";
}
