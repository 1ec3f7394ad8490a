import { createHash } from "node:crypto";
import type { Ledger, MilestoneStatus, TaskStatus } from "../ledger/types.js";
import type { BoardColumnId, BoardTree } from "../render/types.js";

/** A rendered file, before it is written anywhere. */
export interface ArtifactContent {
  name: string;
  content: string | Buffer;
}

export interface ArtifactDigest {
  name: string;
  sha256: string;
  bytes: number;
}

export interface SummaryCounts {
  milestones: {
    active: number;
    archived: number;
    byStatus: Record<MilestoneStatus, number>;
  };
  tasks: {
    active: number;
    archived: number;
    byStatus: Record<TaskStatus, number>;
    /** Active tasks shown in the synthetic Blocked column. */
    displayedBlocked: number;
  };
}

/** The payload handed to the messaging collaborator. */
export interface FeedManifest {
  generation: number;
  summaryCounts: SummaryCounts;
  laneOccupancy: Record<string, Record<BoardColumnId, number>>;
  contentHash: string;
  artifacts: ArtifactDigest[];
}

function sha256(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

function byteLength(content: string | Buffer): number {
  return typeof content === "string" ? Buffer.byteLength(content, "utf-8") : content.length;
}

/** SHA-256 over every artifact's name and bytes, in the order given. */
export function contentHash(artifacts: ArtifactContent[]): string {
  const hash = createHash("sha256");
  for (const artifact of artifacts) {
    hash.update(artifact.name);
    hash.update("\0");
    hash.update(artifact.content);
    hash.update("\0");
  }
  return hash.digest("hex");
}

function milestoneCounts(): Record<MilestoneStatus, number> {
  return { Planned: 0, "In Progress": 0, "At Risk": 0, Blocked: 0, Complete: 0 };
}

function taskCounts(): Record<TaskStatus, number> {
  return { Backlog: 0, Ready: 0, "In Progress": 0, Review: 0, Done: 0, Blocked: 0 };
}

function columnCounts(): Record<BoardColumnId, number> {
  return { Backlog: 0, Ready: 0, "In Progress": 0, Review: 0, Done: 0, Blocked: 0 };
}

export function summarize(ledger: Ledger, board: BoardTree): SummaryCounts {
  const milestoneStatus = milestoneCounts();
  for (const milestone of Object.values(ledger.active.milestones)) {
    milestoneStatus[milestone.status] += 1;
  }
  const taskStatus = taskCounts();
  for (const task of Object.values(ledger.active.tasks)) {
    taskStatus[task.status] += 1;
  }

  const blocked = new Set<string>();
  for (const lane of board.lanes) {
    for (const cell of lane.cells) {
      if (cell.columnId !== "Blocked") continue;
      for (const card of cell.cards) blocked.add(card.id);
    }
  }

  return {
    milestones: {
      active: Object.keys(ledger.active.milestones).length,
      archived: Object.keys(ledger.archived.milestones).length,
      byStatus: milestoneStatus,
    },
    tasks: {
      active: Object.keys(ledger.active.tasks).length,
      archived: Object.keys(ledger.archived.tasks).length,
      byStatus: taskStatus,
      displayedBlocked: blocked.size,
    },
  };
}

export function laneOccupancy(board: BoardTree): Record<string, Record<BoardColumnId, number>> {
  const occupancy: Record<string, Record<BoardColumnId, number>> = {};
  for (const lane of board.lanes) {
    const counts = columnCounts();
    for (const cell of lane.cells) counts[cell.columnId] = cell.cards.length;
    occupancy[lane.laneId] = counts;
  }
  return occupancy;
}

/** Build the feed manifest. Pure: hashes what it is given and touches no files. */
export function buildFeedManifest(
  ledger: Ledger,
  board: BoardTree,
  artifacts: ArtifactContent[],
): FeedManifest {
  return {
    generation: ledger.generation,
    summaryCounts: summarize(ledger, board),
    laneOccupancy: laneOccupancy(board),
    contentHash: contentHash(artifacts),
    artifacts: artifacts.map((artifact) => ({
      name: artifact.name,
      sha256: sha256(artifact.content),
      bytes: byteLength(artifact.content),
    })),
  };
}

export function serializeFeed(manifest: FeedManifest): string {
  return JSON.stringify(manifest, null, 2) + "\n";
}
