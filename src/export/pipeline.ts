import { createHash } from "node:crypto";
import { join } from "node:path";
import { buildGraph, compareIds } from "../graph/build.js";
import { assertValidGraph } from "../graph/validator.js";
import { createTimeLayout } from "../layout/time-mapper.js";
import { atomicWrite } from "../ledger/writer.js";
import type { BoardDef, BoardsRegistry, Ledger } from "../ledger/types.js";
import { assignLanes, renderBoard } from "../render/board.js";
import { renderGantt } from "../render/gantt.js";
import type { RowOrder } from "../render/gantt.js";
import type { LaneMode } from "../render/types.js";
import { formatReportAscii } from "./ascii.js";
import { buildFeedManifest, serializeFeed } from "./feed.js";
import type { ArtifactContent, FeedManifest } from "./feed.js";
import { formatMarkdown } from "./markdown.js";
import { renderGanttPng } from "./raster.js";

export interface RenderSettings {
  title: string;
  /** ISO date of week 1. */
  baselineStartDate: string;
  /** Defaults to the latest endWeek in the ledger. */
  totalWeeks?: number;
  summaryColumnBudget: number;
  detailedColumnBudget: number;
  labelWidth: number;
  cardTitleWidth: number;
  /** Defaults to the first board by id, or a milestone board when none exist. */
  boardId?: string;
  rowOrder: RowOrder;
}

export const DEFAULT_BOARD_ID = "milestones";

const DEFAULT_BOARD: BoardDef = { title: "Milestone Board", laneBy: "milestone" };

export interface RenderBundle {
  summary: string;
  detailed: string;
  markdown: string;
  png: Buffer;
  feed: FeedManifest;
  /** Every file in write order; the feed comes last. */
  files: ArtifactContent[];
}

export function artifactNames(prefix: string) {
  return {
    summary: `${prefix}-summary.txt`,
    detailed: `${prefix}-detailed.txt`,
    markdown: `${prefix}.md`,
    png: `${prefix}.png`,
    feed: `${prefix}-feed.json`,
  };
}

export function resolveBoard(
  boards: BoardsRegistry,
  boardId?: string,
): { id: string; board: BoardDef } {
  if (boardId !== undefined) {
    const board = boards.boards[boardId];
    if (!board) throw new Error(`Unknown board "${boardId}"`);
    return { id: boardId, board };
  }
  const [first] = Object.keys(boards.boards).sort(compareIds);
  if (first !== undefined) return { id: first, board: boards.boards[first] };
  return { id: DEFAULT_BOARD_ID, board: DEFAULT_BOARD };
}

export function windowWeeks(ledger: Ledger, settings: RenderSettings): number {
  if (settings.totalWeeks !== undefined) return settings.totalWeeks;
  let latest = 1;
  for (const partition of [ledger.active, ledger.archived]) {
    for (const milestone of Object.values(partition.milestones)) {
      latest = Math.max(latest, milestone.endWeek);
    }
  }
  return latest;
}

/**
 * Render every artifact from one snapshot. Pure apart from reading the font
 * asset. Throws LedgerIntegrityError before any adapter runs when the graph
 * has dangling ids or a cycle.
 */
export function renderArtifacts(
  ledger: Ledger,
  boards: BoardsRegistry,
  settings: RenderSettings,
  prefix: string,
): RenderBundle {
  const graph = buildGraph(ledger);
  assertValidGraph(graph);

  const totalWeeks = windowWeeks(ledger, settings);
  const gantt = (mode: LaneMode, columnBudget: number) =>
    renderGantt(
      ledger,
      graph,
      createTimeLayout({ baselineStart: settings.baselineStartDate, totalWeeks, columnBudget }),
      { title: settings.title, mode, labelWidth: settings.labelWidth, order: settings.rowOrder },
    );

  const { id: boardId, board: boardDef } = resolveBoard(boards, settings.boardId);
  const board = renderBoard(ledger, graph, assignLanes(ledger, boardDef), {
    boardId,
    title: boardDef.title,
    cardTitleWidth: settings.cardTitleWidth,
  });

  const collapsed = gantt("collapsed", settings.summaryColumnBudget);
  const expanded = gantt("expanded", settings.detailedColumnBudget);

  const summary = formatReportAscii(collapsed, board);
  const detailed = formatReportAscii(expanded, board);
  const markdown = formatMarkdown(expanded, board);
  const png = renderGanttPng(expanded);

  const names = artifactNames(prefix);
  const rendered: ArtifactContent[] = [
    { name: names.summary, content: summary },
    { name: names.detailed, content: detailed },
    { name: names.markdown, content: markdown },
    { name: names.png, content: png },
  ];
  const feed = buildFeedManifest(ledger, board, rendered);

  return {
    summary,
    detailed,
    markdown,
    png,
    feed,
    files: [...rendered, { name: names.feed, content: serializeFeed(feed) }],
  };
}

/** Write each file atomically into `dir`. Returns the written paths in order. */
export async function writeArtifacts(dir: string, bundle: RenderBundle): Promise<string[]> {
  const paths: string[] = [];
  for (const file of bundle.files) {
    const path = join(dir, file.name);
    await atomicWrite(path, file.content);
    paths.push(path);
  }
  return paths;
}

// ---------------------------------------------------------------------------
// Render cache
// ---------------------------------------------------------------------------

function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (typeof value === "object" && value !== null) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) out[key] = canonical(Reflect.get(value, key));
    return out;
  }
  return value;
}

/** Content hash of everything a render depends on. Key order does not matter. */
export function snapshotHash(
  ledger: Ledger,
  boards: BoardsRegistry,
  settings: RenderSettings,
  prefix: string,
): string {
  return createHash("sha256")
    .update(JSON.stringify(canonical({ ledger, boards, settings, prefix })))
    .digest("hex");
}

/** Memoizes renderArtifacts by snapshot hash, keeping the most recent entries. */
export class RenderCache {
  private readonly entries = new Map<string, RenderBundle>();
  hits = 0;
  misses = 0;

  constructor(private readonly capacity = 8) {}

  render(
    ledger: Ledger,
    boards: BoardsRegistry,
    settings: RenderSettings,
    prefix: string,
  ): RenderBundle {
    const key = snapshotHash(ledger, boards, settings, prefix);
    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }
    this.misses++;
    const bundle = renderArtifacts(ledger, boards, settings, prefix);
    this.entries.set(key, bundle);
    while (this.entries.size > this.capacity) {
      const [oldest] = this.entries.keys();
      if (oldest === undefined) break;
      this.entries.delete(oldest);
    }
    return bundle;
  }

  get size(): number {
    return this.entries.size;
  }
}
