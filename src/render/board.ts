import { compareIds, sortIds } from "../graph/build.js";
import { blockersOf, isUnlocked } from "../graph/query.js";
import { assertValidGraph } from "../graph/validator.js";
import type { DependencyGraph } from "../graph/types.js";
import type { BoardDef, Ledger, Task } from "../ledger/types.js";
import { TASK_STATUS_STYLE } from "./status-table.js";
import { truncate } from "./text.js";
import { BOARD_COLUMNS } from "./types.js";
import type { BoardCard, BoardColumnId, BoardLane, BoardTree } from "./types.js";

export const UNASSIGNED_LANE = "unassigned";

/** Which tasks map to which lane. The board renderer needs nothing else about lanes. */
export interface LaneAssignment {
  lanes: Array<{ laneId: string; taskIds: string[] }>;
}

export interface BoardOptions {
  boardId: string;
  title: string;
  cardTitleWidth: number;
}

function laneKeys(task: Task, board: BoardDef): string[] {
  if (board.laneBy === "milestone") return [task.milestoneId];
  const keys = sortIds(
    task.boardRefs.filter((ref) => ref.kind === board.laneBy).map((ref) => ref.value),
  );
  return keys.length > 0 ? keys : [UNASSIGNED_LANE];
}

/**
 * Group active tasks into lanes by the board's laneBy key. A task with several
 * refs of that kind appears in each lane. Lanes listed in the board come
 * first, then the rest by id, then `unassigned`.
 */
export function assignLanes(ledger: Ledger, board: BoardDef): LaneAssignment {
  const byLane = new Map<string, string[]>();
  for (const lane of board.lanes ?? []) byLane.set(lane, []);

  for (const id of sortIds(Object.keys(ledger.active.tasks))) {
    for (const key of laneKeys(ledger.active.tasks[id], board)) {
      const list = byLane.get(key);
      if (list) list.push(id);
      else byLane.set(key, [id]);
    }
  }

  const listed = (board.lanes ?? []).filter((lane, i, all) => all.indexOf(lane) === i);
  const rest = [...byLane.keys()]
    .filter((lane) => !listed.includes(lane) && lane !== UNASSIGNED_LANE)
    .sort(compareIds);
  const order = [...listed, ...rest];
  if (byLane.has(UNASSIGNED_LANE) && !listed.includes(UNASSIGNED_LANE)) {
    order.push(UNASSIGNED_LANE);
  }

  return { lanes: order.map((laneId) => ({ laneId, taskIds: byLane.get(laneId) ?? [] })) };
}

/**
 * Column a task is shown in: its stored status, except that a Ready or
 * In Progress task with unsettled dependencies is shown as Blocked.
 */
export function displayColumn(task: Task, graph: DependencyGraph): BoardColumnId {
  if (
    (task.status === "Ready" || task.status === "In Progress") &&
    !isUnlocked(graph, task.id)
  ) {
    return "Blocked";
  }
  return TASK_STATUS_STYLE[task.status].column;
}

function toCard(task: Task, graph: DependencyGraph, titleWidth: number): BoardCard {
  const card: BoardCard = {
    id: task.id,
    title: truncate(task.title.trim(), titleWidth),
    storedStatus: task.status,
    displayColumn: displayColumn(task, graph),
    dependsOn: [...task.dependsOn].sort(compareIds),
    blockedBy: blockersOf(graph, task.id),
  };
  if (task.owner) card.owner = task.owner;
  return card;
}

/** Build the board render tree. Throws LedgerIntegrityError on dangling ids or cycles. */
export function renderBoard(
  ledger: Ledger,
  graph: DependencyGraph,
  assignment: LaneAssignment,
  options: BoardOptions,
): BoardTree {
  assertValidGraph(graph);

  const lanes: BoardLane[] = assignment.lanes.map(({ laneId, taskIds }) => {
    const cards = sortIds(taskIds)
      .map((id) => ledger.active.tasks[id])
      .filter((task): task is Task => task !== undefined)
      .map((task) => toCard(task, graph, options.cardTitleWidth));
    return {
      laneId,
      cells: BOARD_COLUMNS.map((columnId) => ({
        laneId,
        columnId,
        cards: cards.filter((card) => card.displayColumn === columnId),
      })),
    };
  });

  return { boardId: options.boardId, title: options.title, columns: BOARD_COLUMNS, lanes };
}
