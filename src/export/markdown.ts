import { formatCard, ganttGridLines } from "./ascii.js";
import { taskLegend } from "../render/status-table.js";
import type { BoardTree, GanttRow, GanttTree } from "../render/types.js";

/** Escape text for a table cell: backslashes, pipes, angle brackets, newlines. */
export function escapeCell(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/\|/g, "\\|")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\r?\n/g, " ");
}

/** A backtick fence longer than any backtick run inside `content`. */
export function fenceFor(content: string): string {
  let longest = 0;
  for (const run of content.match(/`+/g) ?? []) longest = Math.max(longest, run.length);
  return "`".repeat(Math.max(3, longest + 1));
}

function tableRow(cells: string[]): string {
  return `| ${cells.join(" | ")} |`;
}

function milestoneCells(row: GanttRow): string[] {
  const weeks =
    row.startWeek === row.endWeek ? `${row.startWeek}` : `${row.startWeek}-${row.endWeek}`;
  return [
    row.milestoneId,
    escapeCell(row.title),
    escapeCell(row.annotation),
    weeks,
    row.dependsOn.length > 0 ? row.dependsOn.join(", ") : "-",
    row.taskIds.join(", "),
  ];
}

function boardSection(board: BoardTree): string[] {
  const lines = [`## Board: ${escapeCell(board.title)}`, ""];
  if (board.lanes.length === 0) {
    lines.push("_No task cards._", "");
  }
  for (const lane of board.lanes) {
    lines.push(`### Lane: ${escapeCell(lane.laneId)}`, "");
    lines.push(tableRow([...board.columns]));
    lines.push(tableRow(board.columns.map(() => "---")));
    lines.push(
      tableRow(
        lane.cells.map((cell) =>
          cell.cards.length === 0
            ? "-"
            : cell.cards.map((card) => escapeCell(formatCard(card))).join("<br>"),
        ),
      ),
    );
    lines.push("");
  }
  lines.push(escapeCell(taskLegend()));
  return lines;
}

export function formatMarkdown(gantt: GanttTree, board: BoardTree): string {
  const grid = ganttGridLines(gantt).join("\n");
  const fence = fenceFor(grid);

  const lines: string[] = [];
  lines.push(`# ${escapeCell(gantt.title)}`, "");
  lines.push(
    `Baseline start: ${gantt.baselineStart}, window: ${gantt.totalWeeks} weeks, mode: ${gantt.mode}`,
    "",
  );
  lines.push("## Timeline", "");
  lines.push(`${fence}text`, grid, fence, "");

  lines.push("## Milestones", "");
  lines.push(tableRow(["ID", "Title", "Status", "Weeks", "Depends on", "Tasks"]));
  lines.push(tableRow(["---", "---", "---", "---", "---", "---"]));
  for (const row of gantt.rows) lines.push(tableRow(milestoneCells(row)));
  lines.push("");

  lines.push(...boardSection(board));
  return lines.join("\n") + "\n";
}
