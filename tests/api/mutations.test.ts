import { describe, it, expect } from "vitest";
import { applyMutation } from "../../src/api/mutations.js";
import type { MutationOptions, MutationResult } from "../../src/api/mutations.js";
import { diffLedgers } from "../../src/api/diff.js";
import type { LedgerRecord, ParsedRequest } from "../../src/api/types.js";
import { validateLedger } from "../../src/ledger/invariants.js";
import type { Ledger, LedgerViolation } from "../../src/ledger/types.js";
import { ledgerOf, milestone, noBoards, task } from "../fixtures.js";

const OPTIONS: MutationOptions = {
  force: false,
  removeDependents: false,
  reopen: "keep",
  today: "2026-03-02",
};

/**
 * M-001 Complete (T-101, T-102 Done) -> M-002 In Progress.
 * T-201 (Done) depends on T-102; T-202 (In Progress) depends on T-201.
 */
function reopenLedger(): Ledger {
  return ledgerOf({
    milestones: [
      milestone("M-001", {
        status: "Complete",
        taskIds: ["T-101", "T-102"],
        completedOn: "2026-01-16",
      }),
      milestone("M-002", {
        status: "In Progress",
        dependsOn: ["M-001"],
        taskIds: ["T-201", "T-202"],
      }),
    ],
    tasks: [
      task("T-101", "M-001", { status: "Done" }),
      task("T-102", "M-001", { status: "Done" }),
      task("T-201", "M-002", { status: "Done", dependsOn: ["T-102"] }),
      task("T-202", "M-002", { status: "In Progress", dependsOn: ["T-201"] }),
    ],
    archivedMilestones: [milestone("H-001", { status: "Complete", taskIds: ["T-090"] })],
    archivedTasks: [task("T-090", "H-001", { status: "Done" })],
  });
}

function run(
  ledger: Ledger,
  request: ParsedRequest,
  options: Partial<MutationOptions> = {},
): MutationResult {
  return applyMutation(ledger, request, { ...OPTIONS, ...options });
}

function applied(result: MutationResult): { ledger: Ledger; summary: string; record: LedgerRecord } {
  if (!result.ok) throw new Error(result.violations.map((v) => v.message).join("; "));
  return result;
}

function rejected(result: MutationResult): LedgerViolation[] {
  if (result.ok) throw new Error(`expected a rejection, got "${result.summary}"`);
  return result.violations;
}

describe("milestone writes", () => {
  it("creates a milestone with inline tasks", () => {
    const { ledger, summary } = applied(
      run(reopenLedger(), {
        method: "POST",
        resource: "milestones",
        body: {
          id: "M-003",
          title: "Launch",
          status: "Planned",
          startWeek: 3,
          endWeek: 4,
          tasks: [{ id: "T-301", title: "Announce", status: "Backlog" }],
        },
      }),
    );
    expect(summary).toBe("created milestone M-003 with 1 task(s)");
    expect(ledger.active.milestones["M-003"].taskIds).toEqual(["T-301"]);
    expect(ledger.active.tasks["T-301"]).toEqual({
      id: "T-301",
      title: "Announce",
      milestoneId: "M-003",
      status: "Backlog",
      dependsOn: [],
      boardRefs: [],
    });
  });

  it("stamps completedOn on a milestone created Complete", () => {
    const { record } = applied(
      run(reopenLedger(), {
        method: "POST",
        resource: "milestones",
        body: { id: "M-004", title: "Done already", status: "Complete", startWeek: 1, endWeek: 1, taskIds: ["T-401"] },
      }),
    );
    expect(record).toMatchObject({ id: "M-004", completedOn: "2026-03-02" });
  });

  it("never reuses an id, archived ones included", () => {
    const body = { title: "Again", status: "Planned", startWeek: 1, endWeek: 1 };
    expect(rejected(run(reopenLedger(), { method: "POST", resource: "milestones", body: { ...body, id: "H-001" } }))).toEqual([
      {
        type: "DuplicateId",
        message: 'Id "H-001" is already in use; archived ids are never reused',
        context: { id: "H-001" },
      },
    ]);
  });

  it("reports schema failures of inline tasks", () => {
    const violations = rejected(
      run(reopenLedger(), {
        method: "POST",
        resource: "milestones",
        body: {
          id: "M-003",
          title: "Launch",
          status: "Planned",
          startWeek: 3,
          endWeek: 4,
          tasks: [{ id: "T-301", title: "Announce", status: "Someday" }],
        },
      }),
    );
    expect(violations.map((v) => v.type)).toEqual(["BadStatusValue"]);
  });

  it("keeps task statuses when a milestone is reopened under the keep policy", () => {
    const { ledger, summary, record } = applied(
      run(reopenLedger(), { method: "PATCH", resource: "milestones", id: "M-001", body: { status: "In Progress" } }),
    );
    expect(summary).toBe("updated milestone M-001; reopened, tasks kept");
    expect(record).not.toHaveProperty("completedOn");
    expect(ledger.active.tasks["T-101"].status).toBe("Done");
  });

  it("resets Done tasks and their Done dependents under the reset policy", () => {
    const { ledger, summary } = applied(
      run(
        reopenLedger(),
        { method: "PATCH", resource: "milestones", id: "M-001", body: { status: "In Progress" } },
        { reopen: "reset" },
      ),
    );
    expect(summary).toBe("updated milestone M-001; reopened, reset T-101, T-102, T-201 to In Progress");
    expect(ledger.active.tasks["T-201"].status).toBe("In Progress");
    expect(ledger.active.tasks["T-202"].status).toBe("In Progress");
  });

  it("stamps completedOn when a milestone is completed", () => {
    const { record } = applied(
      run(reopenLedger(), { method: "PATCH", resource: "milestones", id: "M-002", body: { status: "Complete" } }),
    );
    expect(record).toMatchObject({ status: "Complete", completedOn: "2026-03-02" });
  });

  it("refuses to archive a milestone that active records still reference", () => {
    const violations = rejected(run(reopenLedger(), { method: "DELETE", resource: "milestones", id: "M-001" }));
    expect(violations).toEqual([
      {
        type: "ActiveReferenceExists",
        message:
          'Milestone "M-001" is still referenced by active records: M-002, T-101, T-102; archive those first or use force',
        context: { id: "M-001", referencedBy: ["M-002", "T-101", "T-102"] },
      },
    ]);
  });

  it("archives with force", () => {
    const before = reopenLedger();
    const { ledger, summary } = applied(
      run(before, { method: "DELETE", resource: "milestones", id: "M-001" }, { force: true }),
    );
    expect(summary).toBe("archived milestone M-001");
    expect(ledger.active.milestones).not.toHaveProperty("M-001");
    expect(ledger.archived.milestones["M-001"].archivedOn).toBe("2026-03-02");
    expect(diffLedgers(before, ledger).map((c) => [c.id, c.action, c.fields])).toEqual([
      ["M-001", "archive", ["archivedOn"]],
    ]);
  });
});

describe("task writes", () => {
  it("links a new task into its milestone", () => {
    const { ledger, summary } = applied(
      run(reopenLedger(), {
        method: "POST",
        resource: "tasks",
        body: { id: "T-203", title: "Docs", milestoneId: "M-002", status: "Backlog" },
      }),
    );
    expect(summary).toBe("created task T-203");
    expect(ledger.active.milestones["M-002"].taskIds).toEqual(["T-201", "T-202", "T-203"]);
  });

  it("will not add tasks to an archived milestone", () => {
    const violations = rejected(
      run(reopenLedger(), {
        method: "POST",
        resource: "tasks",
        body: { id: "T-091", title: "Late", milestoneId: "H-001", status: "Backlog" },
      }),
    );
    expect(violations[0]).toMatchObject({
      type: "BadRequest",
      message: 'Milestone "H-001" is archived and cannot take new tasks',
    });
  });

  it("moves a task between milestones", () => {
    const { ledger, summary } = applied(
      run(reopenLedger(), { method: "PATCH", resource: "tasks", id: "T-202", body: { milestoneId: "M-001" } }),
    );
    expect(summary).toBe("updated task T-202; moved from M-002 to M-001");
    expect(ledger.active.milestones["M-001"].taskIds).toEqual(["T-101", "T-102", "T-202"]);
    expect(ledger.active.milestones["M-002"].taskIds).toEqual(["T-201"]);
  });

  it("moves a task out of a milestone archived with force", () => {
    const { ledger: archived } = applied(
      run(reopenLedger(), { method: "DELETE", resource: "milestones", id: "M-001" }, { force: true }),
    );
    const { ledger, summary } = applied(
      run(archived, { method: "PATCH", resource: "tasks", id: "T-101", body: { milestoneId: "M-002" } }),
    );
    expect(summary).toBe("updated task T-101; moved from M-001 to M-002");
    expect(ledger.active.milestones["M-002"].taskIds).toEqual(["T-201", "T-202", "T-101"]);
    expect(ledger.archived.milestones["M-001"].taskIds).toEqual(["T-101", "T-102"]);
    expect(validateLedger(ledger, noBoards())).toEqual([]);
  });

  it("rejects an id change", () => {
    expect(
      rejected(run(reopenLedger(), { method: "PATCH", resource: "tasks", id: "T-101", body: { id: "T-999" } })),
    ).toEqual([
      {
        type: "ImmutableId",
        message: 'Id "T-101" cannot be changed to "T-999"',
        context: { id: "T-101", requested: "T-999" },
      },
    ]);
  });

  it("treats archived records as read-only", () => {
    const [violation] = rejected(
      run(reopenLedger(), { method: "PATCH", resource: "tasks", id: "T-090", body: { title: "Edit" } }),
    );
    expect(violation.message).toBe('task "T-090" is archived and can no longer be changed');
    const [missing] = rejected(run(reopenLedger(), { method: "DELETE", resource: "tasks", id: "T-777" }));
    expect(missing.message).toBe('task "T-777" not found');
  });

  it("refuses to archive a task with active dependents", () => {
    const [violation] = rejected(run(reopenLedger(), { method: "DELETE", resource: "tasks", id: "T-201" }));
    expect(violation).toEqual({
      type: "ActiveReferenceExists",
      message: 'Task "T-201" is depended on by active tasks: T-202; use force or remove those references',
      context: { id: "T-201", referencedBy: ["T-202"] },
    });
  });

  it("strips the reference from dependents when asked", () => {
    const before = reopenLedger();
    const { ledger, summary } = applied(
      run(before, { method: "DELETE", resource: "tasks", id: "T-201" }, { removeDependents: true }),
    );
    expect(summary).toBe("archived task T-201; removed from dependsOn of T-202");
    expect(ledger.active.tasks["T-202"].dependsOn).toEqual([]);
    expect(ledger.archived.tasks["T-201"].archivedOn).toBe("2026-03-02");
    expect(diffLedgers(before, ledger).map((c) => [c.id, c.action, c.fields])).toEqual([
      ["T-201", "archive", ["archivedOn"]],
      ["T-202", "update", ["dependsOn"]],
    ]);
  });

  it("leaves the input ledger untouched", () => {
    const before = reopenLedger();
    run(before, { method: "DELETE", resource: "tasks", id: "T-201" }, { force: true });
    expect(before).toEqual(reopenLedger());
  });
});
