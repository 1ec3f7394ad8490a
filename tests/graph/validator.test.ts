import { describe, it, expect } from "vitest";
import { buildGraph } from "../../src/graph/build.js";
import {
  assertValidGraph,
  checkAcyclic,
  detectCycle,
  resolveAllIds,
  validateGraph,
} from "../../src/graph/validator.js";
import { LedgerIntegrityError } from "../../src/ledger/types.js";
import { ledgerOf, milestone, sampleLedger, task } from "../fixtures.js";

function cycleLedger() {
  return ledgerOf({
    milestones: [milestone("M-002", { taskIds: ["T-204", "T-205"] })],
    tasks: [
      task("T-204", "M-002", { dependsOn: ["T-205"] }),
      task("T-205", "M-002", { dependsOn: ["T-204"] }),
    ],
  });
}

describe("checkAcyclic", () => {
  it("returns null for the sample ledger", () => {
    expect(checkAcyclic(buildGraph(sampleLedger()))).toBeNull();
  });

  it("reports a two-task cycle without repeating the first id in the path", () => {
    const violation = checkAcyclic(buildGraph(cycleLedger()));
    expect(violation).toEqual({
      type: "CycleDetected",
      message: "Dependency cycle: T-204 → T-205 → T-204",
      context: { cycle: ["T-204", "T-205"] },
    });
  });

  it("reports the shortest cycle through the back-edge target", () => {
    // T-1 -> T-2 -> T-3 -> T-1, plus a shortcut T-1 -> T-3
    const ledger = ledgerOf({
      milestones: [milestone("M-001", { taskIds: ["T-001", "T-002", "T-003"] })],
      tasks: [
        task("T-001", "M-001", { dependsOn: ["T-002", "T-003"] }),
        task("T-002", "M-001", { dependsOn: ["T-003"] }),
        task("T-003", "M-001", { dependsOn: ["T-001"] }),
      ],
    });
    expect(detectCycle(buildGraph(ledger))).toEqual(["T-001", "T-003"]);
  });

  it("finds a cycle between milestones", () => {
    const ledger = ledgerOf({
      milestones: [
        milestone("M-001", { dependsOn: ["M-002"], taskIds: ["T-101"] }),
        milestone("M-002", { dependsOn: ["M-001"], taskIds: ["T-201"] }),
      ],
      tasks: [task("T-101", "M-001"), task("T-201", "M-002")],
    });
    expect(detectCycle(buildGraph(ledger))).toEqual(["M-001", "M-002"]);
  });
});

describe("resolveAllIds", () => {
  it("reports dependencies and containers that do not exist", () => {
    const ledger = ledgerOf({
      milestones: [milestone("M-001", { taskIds: ["T-101"] })],
      tasks: [
        task("T-101", "M-001", { dependsOn: ["T-999"] }),
        task("T-102", "M-404"),
      ],
    });
    expect(resolveAllIds(buildGraph(ledger))).toEqual([
      {
        type: "DanglingDependency",
        message: '"T-101" depends on non-existent "T-999"',
        context: { from: "T-101", to: "T-999", field: "dependsOn" },
      },
      {
        type: "DanglingDependency",
        message: '"T-102" belongs to non-existent milestone "M-404"',
        context: { from: "T-102", to: "M-404", field: "milestoneId" },
      },
    ]);
  });

  it("resolves ids held only in the archived partition", () => {
    expect(resolveAllIds(buildGraph(sampleLedger()))).toEqual([]);
  });
});

describe("assertValidGraph", () => {
  it("throws LedgerIntegrityError carrying every fatal violation", () => {
    const ledger = cycleLedger();
    ledger.active.tasks["T-204"].dependsOn.push("T-999");
    const graph = buildGraph(ledger);

    expect(validateGraph(graph).map((v) => v.type)).toEqual([
      "DanglingDependency",
      "CycleDetected",
    ]);
    expect(() => assertValidGraph(graph)).toThrow(LedgerIntegrityError);
  });
});
