import {
  TASK_STATUS_STYLE,
  glyphFor,
  milestoneLegend,
  taskLegend,
} from "../render/status-table.js";
import type {
  AxisMark,
  BoardCard,
  BoardTree,
  CellMark,
  GanttTree,
} from "../render/types.js";

export function cellsToText(cells: Array<CellMark | null>): string {
  return cells.map(glyphFor).join("");
}

function axisLine(marks: AxisMark[], budget: number): string {
  const chars = Array.from({ length: budget }, () => " ");
  for (const mark of marks) {
    for (let i = 0; i < mark.text.length && mark.column + i < budget; i++) {
      chars[mark.column + i] = mark.text[i];
    }
  }
  return chars.join("");
}

export function ganttInfoLine(tree: GanttTree): string {
  return `Baseline start: ${tree.baselineStart}, window: ${tree.totalWeeks} weeks, columns: ${tree.columnBudget}, mode: ${tree.mode}`;
}

/** One line of the grid; `cells` marks the timeline zone that starts after the label and `|`. */
export interface GridLine {
  text: string;
  cells?: Array<CellMark | null>;
}

/**
 * The fixed-width grid: axes, one line per milestone, dependency lines and
 * the legend. Shared by every adapter.
 */
export function ganttGridEntries(tree: GanttTree): GridLine[] {
  const pad = " ".repeat(tree.labelWidth);
  const lines: GridLine[] = [];
  lines.push({ text: `${pad}|${axisLine(tree.weekAxis, tree.columnBudget)}|` });
  lines.push({ text: `${pad}|${axisLine(tree.dateAxis, tree.columnBudget)}|` });
  lines.push({ text: `${"-".repeat(tree.labelWidth)}+${"-".repeat(tree.columnBudget)}+` });

  for (const row of tree.rows) {
    lines.push({ text: `${row.label}|${cellsToText(row.cells)}| ${row.annotation}`, cells: row.cells });
  }
  if (tree.rows.length === 0) lines.push({ text: "(no milestones)" });

  lines.push({ text: "" });
  lines.push({ text: "Dependencies:" });
  for (const dep of tree.dependencies) {
    lines.push({ text: `${dep.label}|${cellsToText(dep.cells)}| ${dep.kind}`, cells: dep.cells });
  }
  if (tree.dependencies.length === 0) lines.push({ text: "  (none)" });

  lines.push({ text: "" });
  lines.push({ text: milestoneLegend() });
  return lines;
}

export function ganttGridLines(tree: GanttTree): string[] {
  return ganttGridEntries(tree).map((line) => line.text);
}

export function formatGanttAscii(tree: GanttTree): string {
  return [tree.title, ganttInfoLine(tree), "", ...ganttGridLines(tree)].join("\n") + "\n";
}

/** "[glyph] T-101 Title (deps=...; blocked_by=...; owner=...)" */
export function formatCard(card: BoardCard): string {
  const suffix: string[] = [];
  if (card.dependsOn.length > 0) suffix.push(`deps=${card.dependsOn.join(",")}`);
  if (card.blockedBy.length > 0) suffix.push(`blocked_by=${card.blockedBy.join(",")}`);
  if (card.owner) suffix.push(`owner=${card.owner}`);
  const head = `[${TASK_STATUS_STYLE[card.storedStatus].glyph}] ${card.id} ${card.title}`;
  return suffix.length > 0 ? `${head} (${suffix.join("; ")})` : head;
}

export function formatBoardAscii(tree: BoardTree): string {
  const lines: string[] = [];
  lines.push(tree.title);
  lines.push(`Columns: ${tree.columns.join(" | ")}`);

  for (const lane of tree.lanes) {
    lines.push("");
    lines.push(`[lane ${lane.laneId}]`);
    for (const cell of lane.cells) {
      if (cell.cards.length === 0) {
        lines.push(`${cell.columnId}: -`);
        continue;
      }
      lines.push(`${cell.columnId}:`);
      for (const card of cell.cards) lines.push(`  - ${formatCard(card)}`);
    }
  }
  if (tree.lanes.length === 0) {
    lines.push("");
    lines.push("(no task cards)");
  }

  lines.push("");
  lines.push(taskLegend());
  return lines.join("\n") + "\n";
}

/** A timeline followed by the board listing, separated by a rule. */
export function formatReportAscii(gantt: GanttTree, board: BoardTree): string {
  return `${formatGanttAscii(gantt)}\n${"=".repeat(72)}\n\n${formatBoardAscii(board)}`;
}
