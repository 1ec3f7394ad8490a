import { compareIds } from "../graph/build.js";
import { topoOrder } from "../graph/query.js";
import { assertValidGraph } from "../graph/validator.js";
import type { DependencyGraph } from "../graph/types.js";
import type { Ledger, Milestone } from "../ledger/types.js";
import type { ColumnSpan, TimeLayout } from "../layout/time-mapper.js";
import { fitLabel } from "./text.js";
import type {
  AxisMark,
  CellMark,
  DependencyRow,
  GanttRow,
  GanttTree,
  LaneMode,
} from "./types.js";

/**
 * `history-first`: archived and Complete milestones, then the rest, each in
 * topological order. `topological`: all in topological order. A list of ids
 * puts those first, in that order, followed by the rest history-first.
 */
export type RowOrder = "history-first" | "topological" | string[];

export interface GanttOptions {
  title: string;
  mode: LaneMode;
  labelWidth: number;
  order?: RowOrder;
}

interface Placed {
  milestone: Milestone;
  archived: boolean;
  historical: boolean;
}

function collectMilestones(ledger: Ledger): Map<string, Placed> {
  const placed = new Map<string, Placed>();
  for (const milestone of Object.values(ledger.archived.milestones)) {
    placed.set(milestone.id, { milestone, archived: true, historical: true });
  }
  for (const milestone of Object.values(ledger.active.milestones)) {
    placed.set(milestone.id, {
      milestone,
      archived: false,
      historical: milestone.status === "Complete",
    });
  }
  return placed;
}

function orderRows(placed: Map<string, Placed>, topo: string[], order: RowOrder): string[] {
  const ranked = topo.filter((id) => placed.has(id));
  const historyFirst = (ids: string[]): string[] => [
    ...ids.filter((id) => placed.get(id)?.historical),
    ...ids.filter((id) => !placed.get(id)?.historical),
  ];

  if (order === "topological") return ranked;
  if (order === "history-first") return historyFirst(ranked);

  const explicit = order.filter((id, i) => placed.has(id) && order.indexOf(id) === i);
  const chosen = new Set(explicit);
  return [...explicit, ...historyFirst(ranked.filter((id) => !chosen.has(id)))];
}

function blankCells(layout: TimeLayout): Array<CellMark | null> {
  return Array.from({ length: layout.columnBudget }, () => null);
}

function annotate(entry: Placed): string {
  const { milestone } = entry;
  let text: string = milestone.status;
  if (milestone.completedOn) text += ` (${milestone.completedOn})`;
  if (entry.archived) text += " [archived]";
  if (milestone.dependsOn.length > 0) text += ` deps=${milestone.dependsOn.join(",")}`;
  return text;
}

/** Label marks left to right, skipping any that would touch the previous one or overflow. */
function placeMarks(candidates: AxisMark[], budget: number): AxisMark[] {
  const marks: AxisMark[] = [];
  let nextFree = 0;
  for (const mark of candidates) {
    if (mark.column < nextFree || mark.column + mark.text.length > budget) continue;
    marks.push(mark);
    nextFree = mark.column + mark.text.length + 1;
  }
  return marks;
}

function buildAxes(layout: TimeLayout): { weekAxis: AxisMark[]; dateAxis: AxisMark[] } {
  const weeks: AxisMark[] = [];
  const dates: AxisMark[] = [];
  for (let week = 1; week <= layout.totalWeeks; week++) {
    const column = layout.weekToColumn(week);
    weeks.push({ column, text: `W${String(week).padStart(2, "0")}` });
    dates.push({ column, text: layout.weekStartDate(week).slice(5).replace("-", "/") });
  }
  return {
    weekAxis: placeMarks(weeks, layout.columnBudget),
    dateAxis: placeMarks(dates, layout.columnBudget),
  };
}

function dependencyRow(
  from: string,
  to: string,
  a: ColumnSpan,
  b: ColumnSpan,
  layout: TimeLayout,
  labelWidth: number,
): DependencyRow {
  const kind = b.first <= a.last ? "overlap" : "arrow";
  const cells = blankCells(layout);
  const lo = Math.min(a.last, b.first);
  const hi = Math.max(a.last, b.first);
  for (let c = lo; c <= hi; c++) cells[c] = { type: "link" };
  cells[b.first] = { type: kind };
  return {
    from,
    to,
    label: fitLabel(`${from} -> ${to}`, labelWidth),
    kind,
    fromColumn: a.last,
    toColumn: b.first,
    cells,
  };
}

/**
 * Build the Gantt render tree. Pure: the baseline date comes from the layout,
 * never from the clock. Throws LedgerIntegrityError on dangling ids or cycles.
 */
export function renderGantt(
  ledger: Ledger,
  graph: DependencyGraph,
  layout: TimeLayout,
  options: GanttOptions,
): GanttTree {
  assertValidGraph(graph);
  const placed = collectMilestones(ledger);
  const orderedIds = orderRows(placed, topoOrder(graph), options.order ?? "history-first");

  const spans = new Map<string, ColumnSpan>();
  const rows: GanttRow[] = [];

  for (const id of orderedIds) {
    const entry = placed.get(id);
    if (!entry) continue;
    const { milestone } = entry;
    const full = layout.span(milestone.startWeek, milestone.endWeek);
    const span =
      options.mode === "collapsed" && entry.historical
        ? { first: full.last, last: full.last }
        : full;
    spans.set(id, span);

    const cells = blankCells(layout);
    for (let c = span.first; c <= span.last; c++) {
      cells[c] = { type: "bar", status: milestone.status };
    }
    rows.push({
      milestoneId: id,
      label: fitLabel(`${id} ${milestone.title}`, options.labelWidth),
      title: milestone.title,
      status: milestone.status,
      startWeek: milestone.startWeek,
      endWeek: milestone.endWeek,
      dependsOn: [...milestone.dependsOn].sort(compareIds),
      taskIds: [...milestone.taskIds],
      historical: entry.historical,
      first: span.first,
      last: span.last,
      cells,
      annotation: annotate(entry),
    });
  }

  const dependencies: DependencyRow[] = [];
  for (const to of [...spans.keys()].sort(compareIds)) {
    const target = placed.get(to);
    const b = spans.get(to);
    if (!target || !b) continue;
    for (const from of [...target.milestone.dependsOn].sort(compareIds)) {
      const a = spans.get(from);
      if (!a) continue;
      dependencies.push(dependencyRow(from, to, a, b, layout, options.labelWidth));
    }
  }

  return {
    title: options.title,
    baselineStart: layout.baselineStart,
    mode: options.mode,
    totalWeeks: layout.totalWeeks,
    columnBudget: layout.columnBudget,
    labelWidth: options.labelWidth,
    ...buildAxes(layout),
    rows,
    dependencies,
  };
}
