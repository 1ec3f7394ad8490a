import type { RenderSettings } from "../src/export/pipeline.js";
import type { BoardsRegistry, Ledger, Milestone, Task, TaskStatus } from "../src/ledger/types.js";

export function milestone(id: string, overrides: Partial<Milestone> = {}): Milestone {
  return {
    id,
    title: `Milestone ${id}`,
    status: "Planned",
    startWeek: 1,
    endWeek: 2,
    dependsOn: [],
    taskIds: [],
    ...overrides,
  };
}

export function task(id: string, milestoneId: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    title: `Task ${id}`,
    milestoneId,
    status: "Backlog",
    dependsOn: [],
    boardRefs: [],
    ...overrides,
  };
}

export interface LedgerInput {
  generation?: number;
  milestones?: Milestone[];
  tasks?: Task[];
  archivedMilestones?: Milestone[];
  archivedTasks?: Task[];
}

function byId<T extends { id: string }>(records: T[] = []): Record<string, T> {
  const out: Record<string, T> = {};
  for (const record of records) out[record.id] = record;
  return out;
}

export function ledgerOf(input: LedgerInput): Ledger {
  return {
    generation: input.generation ?? 0,
    active: { milestones: byId(input.milestones), tasks: byId(input.tasks) },
    archived: { milestones: byId(input.archivedMilestones), tasks: byId(input.archivedTasks) },
  };
}

export function noBoards(): BoardsRegistry {
  return { teams: [], specialists: [], boards: {} };
}

export const RENDER: RenderSettings = {
  title: "Plan",
  baselineStartDate: "2026-01-05",
  summaryColumnBudget: 26,
  detailedColumnBudget: 52,
  labelWidth: 24,
  cardTitleWidth: 40,
  rowOrder: "history-first",
};

/**
 * Three milestones in a chain plus one archived pilot:
 * H-001 (archived) ; M-001 Complete -> M-002 In Progress -> M-003 Planned.
 * M-002 holds a task chain T-201 (Done) -> T-202 (In Progress) -> T-203 (Ready).
 */
export function sampleLedger(): Ledger {
  return ledgerOf({
    milestones: [
      milestone("M-001", {
        title: "Foundations",
        status: "Complete",
        startWeek: 1,
        endWeek: 2,
        taskIds: ["T-101"],
        completedOn: "2026-01-16",
      }),
      milestone("M-002", {
        title: "Engine",
        status: "In Progress",
        startWeek: 2,
        endWeek: 4,
        dependsOn: ["M-001"],
        taskIds: ["T-201", "T-202", "T-203"],
      }),
      milestone("M-003", {
        title: "Launch",
        startWeek: 6,
        endWeek: 8,
        dependsOn: ["M-002"],
        taskIds: ["T-301"],
      }),
    ],
    tasks: [
      task("T-101", "M-001", { title: "Repo setup", status: "Done" }),
      task("T-201", "M-002", { title: "Schema", status: "Done" }),
      task("T-202", "M-002", { title: "Parser", status: "In Progress", dependsOn: ["T-201"] }),
      task("T-203", "M-002", { title: "Ship", status: "Ready", dependsOn: ["T-202"] }),
      task("T-301", "M-003", { title: "Announce", dependsOn: ["T-203"] }),
    ],
    archivedMilestones: [
      milestone("H-001", {
        title: "Pilot",
        status: "Complete",
        startWeek: 1,
        endWeek: 1,
        taskIds: ["T-090"],
        archivedOn: "2026-01-09",
      }),
    ],
    archivedTasks: [task("T-090", "H-001", { title: "Spike", status: "Done", archivedOn: "2026-01-09" })],
  });
}

/** Small deterministic PRNG so the random ledgers are the same on every run. */
export function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const ALL_STATUSES: TaskStatus[] = ["Backlog", "Ready", "In Progress", "Review", "Done", "Blocked"];

/** One milestone M-001 holding `size` tasks T-100.. whose edges only point at earlier tasks. */
export function randomDag(seed: number, size: number, statuses: TaskStatus[] = ALL_STATUSES): Ledger {
  const random = mulberry32(seed);
  const tasks: Task[] = [];
  for (let i = 0; i < size; i++) {
    const id = `T-${String(100 + i)}`;
    const dependsOn = tasks.filter(() => random() < 0.25).map((t) => t.id);
    const status = statuses[Math.floor(random() * statuses.length)];
    tasks.push(task(id, "M-001", { status, dependsOn }));
  }
  return ledgerOf({
    milestones: [milestone("M-001", { taskIds: tasks.map((t) => t.id) })],
    tasks,
  });
}
