import { describe, it, expect } from "vitest";
import { buildGraph } from "../../src/graph/build.js";
import { assignLanes, displayColumn, renderBoard } from "../../src/render/board.js";
import { formatBoardAscii } from "../../src/export/ascii.js";
import { LedgerIntegrityError } from "../../src/ledger/types.js";
import type { BoardDef, Ledger } from "../../src/ledger/types.js";
import { ledgerOf, milestone, task } from "../fixtures.js";

function boardLedger(): Ledger {
  return ledgerOf({
    milestones: [
      milestone("M-001", { status: "Complete", taskIds: ["T-101"] }),
      milestone("M-002", {
        status: "In Progress",
        dependsOn: ["M-001"],
        taskIds: ["T-201", "T-202", "T-203", "T-204", "T-205"],
      }),
    ],
    tasks: [
      task("T-101", "M-001", { status: "Done" }),
      task("T-201", "M-002", { title: "Schema", status: "Done" }),
      task("T-202", "M-002", { title: "Parser", status: "In Progress", dependsOn: ["T-201"] }),
      task("T-203", "M-002", { title: "Ship", status: "Ready", dependsOn: ["T-202"] }),
      task("T-204", "M-002", { title: "Docs", status: "Review", dependsOn: ["T-202"], owner: "ops" }),
      task("T-205", "M-002", { title: "Vendor", status: "Blocked" }),
    ],
  });
}

const byMilestone: BoardDef = { title: "Milestone Board", laneBy: "milestone" };

function render(ledger: Ledger, board: BoardDef = byMilestone, cardTitleWidth = 40) {
  return renderBoard(ledger, buildGraph(ledger), assignLanes(ledger, board), {
    boardId: "milestones",
    title: board.title,
    cardTitleWidth,
  });
}

describe("displayColumn", () => {
  it("moves locked Ready and In Progress tasks to Blocked", () => {
    const ledger = boardLedger();
    const graph = buildGraph(ledger);
    expect(displayColumn(ledger.active.tasks["T-202"], graph)).toBe("In Progress");
    expect(displayColumn(ledger.active.tasks["T-203"], graph)).toBe("Blocked");
    expect(displayColumn(ledger.active.tasks["T-204"], graph)).toBe("Review");
    expect(displayColumn(ledger.active.tasks["T-205"], graph)).toBe("Blocked");
  });
});

describe("renderBoard", () => {
  it("places every card in exactly one column per lane", () => {
    const tree = render(boardLedger());
    expect(tree.lanes.map((lane) => lane.laneId)).toEqual(["M-001", "M-002"]);

    const lane = tree.lanes[1];
    const columns = Object.fromEntries(
      lane.cells.map((cell) => [cell.columnId, cell.cards.map((card) => card.id)]),
    );
    expect(columns).toEqual({
      Backlog: [],
      Ready: [],
      "In Progress": ["T-202"],
      Review: ["T-204"],
      Done: ["T-201"],
      Blocked: ["T-203", "T-205"],
    });

    const review = lane.cells[3].cards[0];
    expect(review.blockedBy).toEqual(["T-202"]);
    expect(review.owner).toBe("ops");
  });

  it("formats the board as plain text", () => {
    expect(formatBoardAscii(render(boardLedger()))).toBe(
      [
        "Milestone Board",
        "Columns: Backlog | Ready | In Progress | Review | Done | Blocked",
        "",
        "[lane M-001]",
        "Backlog: -",
        "Ready: -",
        "In Progress: -",
        "Review: -",
        "Done:",
        "  - [=] T-101 Task T-101",
        "Blocked: -",
        "",
        "[lane M-002]",
        "Backlog: -",
        "Ready: -",
        "In Progress:",
        "  - [#] T-202 Parser (deps=T-201)",
        "Review:",
        "  - [?] T-204 Docs (deps=T-202; blocked_by=T-202; owner=ops)",
        "Done:",
        "  - [=] T-201 Schema",
        "Blocked:",
        "  - [o] T-203 Ship (deps=T-202; blocked_by=T-202)",
        "  - [x] T-205 Vendor",
        "",
        "Cards: [.] Backlog, [o] Ready, [#] In Progress, [?] Review, [=] Done, [x] Blocked",
        "",
      ].join("\n"),
    );
  });

  it("leaves archived tasks off the board", () => {
    const ledger = boardLedger();
    ledger.archived.tasks["T-090"] = task("T-090", "M-001", { status: "Done", archivedOn: "2026-01-09" });
    const ids = render(ledger).lanes.flatMap((lane) =>
      lane.cells.flatMap((cell) => cell.cards.map((card) => card.id)),
    );
    expect(ids).not.toContain("T-090");
    expect(ids).toHaveLength(6);
  });

  it("truncates card titles to the configured width", () => {
    const ledger = boardLedger();
    ledger.active.tasks["T-205"].title = "  Long running migration ";
    const blocked = render(ledger, byMilestone, 8).lanes[1].cells[5].cards;
    expect(blocked.map((card) => card.title)).toEqual(["Ship", "Long ru…"]);
  });

  it("throws on a dependency cycle", () => {
    const ledger = boardLedger();
    ledger.active.tasks["T-201"].dependsOn = ["T-203"];
    expect(() => render(ledger)).toThrow(LedgerIntegrityError);
  });
});

describe("assignLanes", () => {
  it("lists configured lanes first, then others by id, then unassigned", () => {
    const ledger = ledgerOf({
      milestones: [milestone("M-001", { taskIds: ["T-101", "T-102", "T-103"] })],
      tasks: [
        task("T-101", "M-001", { boardRefs: [{ kind: "team", value: "core" }] }),
        task("T-102", "M-001", {
          boardRefs: [
            { kind: "team", value: "platform" },
            { kind: "team", value: "core" },
          ],
        }),
        task("T-103", "M-001", { boardRefs: [{ kind: "specialist", value: "qa" }] }),
      ],
    });
    const assignment = assignLanes(ledger, { title: "Teams", laneBy: "team", lanes: ["platform"] });
    expect(assignment.lanes).toEqual([
      { laneId: "platform", taskIds: ["T-102"] },
      { laneId: "core", taskIds: ["T-101", "T-102"] },
      { laneId: "unassigned", taskIds: ["T-103"] },
    ]);
  });

  it("keeps a configured lane even when it is empty", () => {
    const ledger = boardLedger();
    const assignment = assignLanes(ledger, { ...byMilestone, lanes: ["M-009"] });
    expect(assignment.lanes[0]).toEqual({ laneId: "M-009", taskIds: [] });
  });
});
