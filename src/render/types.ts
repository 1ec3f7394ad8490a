import type { MilestoneStatus, TaskStatus } from "../ledger/types.js";

export type LaneMode = "collapsed" | "expanded";

/** What occupies one timeline column of a row. */
export type CellMark =
  | { type: "bar"; status: MilestoneStatus }
  | { type: "link" }
  | { type: "arrow" }
  | { type: "overlap" };

export interface GanttRow {
  milestoneId: string;
  /** "<id> <title>", truncated or padded to the label width. */
  label: string;
  title: string;
  status: MilestoneStatus;
  startWeek: number;
  endWeek: number;
  dependsOn: string[];
  taskIds: string[];
  /** Archived or Complete. */
  historical: boolean;
  first: number;
  last: number;
  /** One entry per column. */
  cells: Array<CellMark | null>;
  annotation: string;
}

export interface DependencyRow {
  from: string;
  to: string;
  label: string;
  kind: "overlap" | "arrow";
  /** Last column occupied by `from`. */
  fromColumn: number;
  /** First column occupied by `to`. */
  toColumn: number;
  cells: Array<CellMark | null>;
}

/** Header mark: a label that starts at a column. */
export interface AxisMark {
  column: number;
  text: string;
}

export interface GanttTree {
  title: string;
  baselineStart: string;
  mode: LaneMode;
  totalWeeks: number;
  columnBudget: number;
  labelWidth: number;
  weekAxis: AxisMark[];
  dateAxis: AxisMark[];
  rows: GanttRow[];
  dependencies: DependencyRow[];
}

export type BoardColumnId = "Backlog" | "Ready" | "In Progress" | "Review" | "Done" | "Blocked";

export const BOARD_COLUMNS: readonly BoardColumnId[] = [
  "Backlog",
  "Ready",
  "In Progress",
  "Review",
  "Done",
  "Blocked",
];

export interface BoardCard {
  id: string;
  title: string;
  storedStatus: TaskStatus;
  /** Column the card is shown in after the unlock rule is applied. */
  displayColumn: BoardColumnId;
  dependsOn: string[];
  /** Unsettled dependencies. */
  blockedBy: string[];
  owner?: string;
}

export interface BoardCell {
  laneId: string;
  columnId: BoardColumnId;
  /** Ascending id order. */
  cards: BoardCard[];
}

export interface BoardLane {
  laneId: string;
  cells: BoardCell[];
}

export interface BoardTree {
  boardId: string;
  title: string;
  columns: readonly BoardColumnId[];
  lanes: BoardLane[];
}
