import { describe, it, expect, afterEach } from "vitest";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import {
  RenderCache,
  artifactNames,
  renderArtifacts,
  resolveBoard,
  snapshotHash,
  windowWeeks,
  writeArtifacts,
} from "../../src/export/pipeline.js";
import { LedgerIntegrityError } from "../../src/ledger/types.js";
import type { BoardsRegistry, Ledger } from "../../src/ledger/types.js";
import { RENDER, noBoards, sampleLedger } from "../fixtures.js";

const dirs: string[] = [];

afterEach(async () => {
  for (const dir of dirs.splice(0)) {
    await rm(dir, { recursive: true, force: true });
  }
});

describe("resolveBoard", () => {
  const boards: BoardsRegistry = {
    teams: ["core"],
    specialists: [],
    boards: {
      teams: { title: "Teams", laneBy: "team" },
      delivery: { title: "Delivery", laneBy: "milestone" },
    },
  };

  it("picks the named board", () => {
    expect(resolveBoard(boards, "teams").board.title).toBe("Teams");
  });

  it("falls back to the first board by id", () => {
    expect(resolveBoard(boards).id).toBe("delivery");
  });

  it("uses a milestone board when none are configured", () => {
    expect(resolveBoard(noBoards())).toEqual({
      id: "milestones",
      board: { title: "Milestone Board", laneBy: "milestone" },
    });
  });

  it("rejects an unknown board", () => {
    expect(() => resolveBoard(boards, "ops")).toThrow('Unknown board "ops"');
  });
});

describe("windowWeeks", () => {
  it("spans to the latest endWeek unless configured", () => {
    expect(windowWeeks(sampleLedger(), RENDER)).toBe(8);
    expect(windowWeeks(sampleLedger(), { ...RENDER, totalWeeks: 12 })).toBe(12);
  });
});

describe("renderArtifacts", () => {
  it("produces every file in write order, feed last", () => {
    const bundle = renderArtifacts(sampleLedger(), noBoards(), RENDER, "plan");
    expect(bundle.files.map((file) => file.name)).toEqual([
      "plan-summary.txt",
      "plan-detailed.txt",
      "plan.md",
      "plan.png",
      "plan-feed.json",
    ]);
    expect(bundle.feed.artifacts.map((artifact) => artifact.name)).toEqual([
      "plan-summary.txt",
      "plan-detailed.txt",
      "plan.md",
      "plan.png",
    ]);
  });

  it("renders the summary collapsed and the detail expanded", () => {
    const bundle = renderArtifacts(sampleLedger(), noBoards(), RENDER, "plan");
    expect(bundle.summary.split("\n").slice(0, 2)).toEqual([
      "Plan",
      "Baseline start: 2026-01-05, window: 8 weeks, columns: 26, mode: collapsed",
    ]);
    expect(bundle.detailed.split("\n")[1]).toBe(
      "Baseline start: 2026-01-05, window: 8 weeks, columns: 52, mode: expanded",
    );
    expect(bundle.markdown.startsWith("# Plan\n")).toBe(true);
  });

  it("serializes the manifest as the feed file", () => {
    const bundle = renderArtifacts(sampleLedger(), noBoards(), RENDER, "plan");
    const feed = bundle.files[4];
    expect(typeof feed.content === "string" ? JSON.parse(feed.content) : null).toEqual(bundle.feed);
  });

  it("aborts on a cycle before rendering anything", () => {
    const ledger = sampleLedger();
    ledger.active.tasks["T-201"].dependsOn = ["T-203"];
    expect(() => renderArtifacts(ledger, noBoards(), RENDER, "plan")).toThrow(LedgerIntegrityError);
  });

  it("aborts on a dangling dependency", () => {
    const ledger = sampleLedger();
    ledger.active.milestones["M-003"].dependsOn = ["M-404"];
    expect(() => renderArtifacts(ledger, noBoards(), RENDER, "plan")).toThrow(/M-404/);
  });
});

describe("writeArtifacts", () => {
  it("writes every file into the directory", async () => {
    const dir = join(tmpdir(), `plan-ledger-artifacts-${randomUUID()}`);
    dirs.push(dir);
    const bundle = renderArtifacts(sampleLedger(), noBoards(), RENDER, "plan");

    const paths = await writeArtifacts(dir, bundle);

    const names = artifactNames("plan");
    expect(paths).toEqual([
      join(dir, names.summary),
      join(dir, names.detailed),
      join(dir, names.markdown),
      join(dir, names.png),
      join(dir, names.feed),
    ]);
    expect(await readFile(join(dir, names.markdown), "utf-8")).toBe(bundle.markdown);
    expect((await readFile(join(dir, names.png))).equals(bundle.png)).toBe(true);
  });
});

describe("snapshotHash", () => {
  it("ignores object key order", () => {
    const ledger = sampleLedger();
    const reordered: Ledger = {
      archived: ledger.archived,
      active: {
        tasks: ledger.active.tasks,
        milestones: Object.fromEntries(Object.entries(ledger.active.milestones).reverse()),
      },
      generation: ledger.generation,
    };
    expect(snapshotHash(reordered, noBoards(), RENDER, "plan")).toBe(
      snapshotHash(ledger, noBoards(), RENDER, "plan"),
    );
  });

  it("changes with the content", () => {
    const ledger = sampleLedger();
    const before = snapshotHash(ledger, noBoards(), RENDER, "plan");
    ledger.active.tasks["T-301"].title = "Announce widely";
    expect(snapshotHash(ledger, noBoards(), RENDER, "plan")).not.toBe(before);
    expect(snapshotHash(sampleLedger(), noBoards(), RENDER, "other")).not.toBe(before);
  });
});

describe("RenderCache", () => {
  it("reuses the bundle for an identical snapshot", () => {
    const cache = new RenderCache();
    const first = cache.render(sampleLedger(), noBoards(), RENDER, "plan");
    const second = cache.render(sampleLedger(), noBoards(), RENDER, "plan");
    expect(second).toBe(first);
    expect({ hits: cache.hits, misses: cache.misses }).toEqual({ hits: 1, misses: 1 });
  });

  it("evicts the least recently used entry", () => {
    const cache = new RenderCache(2);
    cache.render(sampleLedger(), noBoards(), RENDER, "a");
    cache.render(sampleLedger(), noBoards(), RENDER, "b");
    cache.render(sampleLedger(), noBoards(), RENDER, "a");
    cache.render(sampleLedger(), noBoards(), RENDER, "c");
    expect(cache.size).toBe(2);

    cache.render(sampleLedger(), noBoards(), RENDER, "a");
    expect(cache.hits).toBe(2);
    cache.render(sampleLedger(), noBoards(), RENDER, "b");
    expect(cache.misses).toBe(4);
  });
});
