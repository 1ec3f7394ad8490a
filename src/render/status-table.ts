import type { MilestoneStatus, TaskStatus } from "../ledger/types.js";
import type { BoardColumnId, CellMark } from "./types.js";

export interface StatusStyle {
  glyph: string;
  /** #RRGGBB */
  color: string;
}

export interface TaskStatusStyle extends StatusStyle {
  /** Board column a task with this stored status is shown in. */
  column: BoardColumnId;
}

/** Single source for milestone glyphs and colors across every adapter. */
export const MILESTONE_STATUS_STYLE: Record<MilestoneStatus, StatusStyle> = {
  Complete: { glyph: "=", color: "#16A34A" },
  "In Progress": { glyph: "#", color: "#2563EB" },
  Planned: { glyph: "~", color: "#94A3B8" },
  "At Risk": { glyph: "!", color: "#F59E0B" },
  Blocked: { glyph: "x", color: "#DC2626" },
};

export const TASK_STATUS_STYLE: Record<TaskStatus, TaskStatusStyle> = {
  Backlog: { glyph: ".", color: "#9CA3AF", column: "Backlog" },
  Ready: { glyph: "o", color: "#0EA5E9", column: "Ready" },
  "In Progress": { glyph: "#", color: "#2563EB", column: "In Progress" },
  Review: { glyph: "?", color: "#8B5CF6", column: "Review" },
  Done: { glyph: "=", color: "#16A34A", column: "Done" },
  Blocked: { glyph: "x", color: "#DC2626", column: "Blocked" },
};

/** Dependency connector glyphs. */
export const CONNECTOR_STYLE = {
  link: { glyph: "-", color: "#64748B" },
  arrow: { glyph: ">", color: "#E2E8F0" },
  overlap: { glyph: "+", color: "#F59E0B" },
} as const satisfies Record<string, StatusStyle>;

export const EMPTY_GLYPH = " ";

export function glyphFor(mark: CellMark | null): string {
  if (mark === null) return EMPTY_GLYPH;
  if (mark.type === "bar") return MILESTONE_STATUS_STYLE[mark.status].glyph;
  return CONNECTOR_STYLE[mark.type].glyph;
}

export function colorFor(mark: CellMark): string {
  if (mark.type === "bar") return MILESTONE_STATUS_STYLE[mark.status].color;
  return CONNECTOR_STYLE[mark.type].color;
}

/** Legend line shared by the text adapters. */
export function milestoneLegend(): string {
  const statuses = Object.entries(MILESTONE_STATUS_STYLE).map(
    ([status, style]) => `'${style.glyph}' ${status}`,
  );
  const connectors = Object.entries(CONNECTOR_STYLE).map(
    ([kind, style]) => `'${style.glyph}' ${kind}`,
  );
  return `Legend: ${[...statuses, ...connectors].join(", ")}`;
}

export function taskLegend(): string {
  const entries = Object.entries(TASK_STATUS_STYLE).map(
    ([status, style]) => `[${style.glyph}] ${status}`,
  );
  return `Cards: ${entries.join(", ")}`;
}
