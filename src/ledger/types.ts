/** Milestone status lifecycle. */
export type MilestoneStatus =
  | "Planned"
  | "In Progress"
  | "At Risk"
  | "Blocked"
  | "Complete";

/** Task status lifecycle. */
export type TaskStatus =
  | "Backlog"
  | "Ready"
  | "In Progress"
  | "Review"
  | "Done"
  | "Blocked";

export type BoardRefKind = "milestone" | "team" | "specialist";

/** Typed reference from a task to a board lane source. */
export interface BoardRef {
  kind: BoardRefKind;
  value: string;
}

export interface Milestone {
  /** Unique token, e.g. `M-011`. */
  id: string;
  title: string;
  status: MilestoneStatus;
  /** 1-based week the milestone starts in. */
  startWeek: number;
  /** 1-based week the milestone ends in. Never before startWeek. */
  endWeek: number;
  /** Milestone ids that must complete first. */
  dependsOn: string[];
  /** Ordered task ids. Never empty. */
  taskIds: string[];
  /** ISO date the milestone was completed. */
  completedOn?: string;
  /** ISO date the record moved to the archived partition. */
  archivedOn?: string;
}

export interface Task {
  /** Unique token, e.g. `T-1101`. */
  id: string;
  title: string;
  milestoneId: string;
  status: TaskStatus;
  /** Task ids that must be Done first. */
  dependsOn: string[];
  /** Handler pool reference. */
  owner?: string;
  boardRefs: BoardRef[];
  archivedOn?: string;
}

export type RecordKind = "milestone" | "task";

export type PartitionName = "active" | "archived";

export interface LedgerPartition {
  milestones: Record<string, Milestone>;
  tasks: Record<string, Task>;
}

/** Immutable snapshot of both partitions. */
export interface Ledger {
  /** Incremented on every committed mutation. */
  generation: number;
  active: LedgerPartition;
  archived: LedgerPartition;
}

export interface BoardDef {
  title: string;
  /** Which task attribute forms the swimlanes. */
  laneBy: BoardRefKind;
  /** Explicit lane order. Lanes not listed follow in id order. */
  lanes?: string[];
}

/** Contents of boards.yaml. */
export interface BoardsRegistry {
  teams: string[];
  specialists: string[];
  boards: Record<string, BoardDef>;
}

export type ViolationType =
  | "MissingField"
  | "BadIdFormat"
  | "BadStatusValue"
  | "BadBoardRef"
  | "SchemaError"
  | "DanglingDependency"
  | "CycleDetected"
  | "NonEmptyTaskIdsViolation"
  | "UnlockRuleViolation"
  | "TaskLinkMismatch"
  | "UnknownBoardRef"
  | "DuplicateId"
  | "ActiveReferenceExists"
  | "BadRequest"
  | "NotFound"
  | "ImmutableId"
  | "ConcurrentModification"
  | "RenderMismatch";

/** A single integrity or request failure. */
export interface LedgerViolation {
  type: ViolationType;
  message: string;
  /** Contextual data, varies by violation type. */
  context: Record<string, unknown>;
}

/** Thrown when a fatal violation must abort a write or a render. */
export class LedgerIntegrityError extends Error {
  readonly violations: LedgerViolation[];

  constructor(violations: LedgerViolation[]) {
    super(
      `Ledger integrity check failed: ${violations.map((v) => v.message).join("; ")}`,
    );
    this.name = "LedgerIntegrityError";
    this.violations = violations;
  }
}

export function emptyPartition(): LedgerPartition {
  return { milestones: {}, tasks: {} };
}

export function emptyLedger(): Ledger {
  return { generation: 0, active: emptyPartition(), archived: emptyPartition() };
}
