import { z } from "zod";

export const MILESTONE_ID_PATTERN = /^[HM]-\d{3}$/;
export const TASK_ID_PATTERN = /^(T|A-H)-\d{3,4}(?:-\d{2})?$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const MILESTONE_STATUSES = [
  "Planned",
  "In Progress",
  "At Risk",
  "Blocked",
  "Complete",
] as const;

export const TASK_STATUSES = [
  "Backlog",
  "Ready",
  "In Progress",
  "Review",
  "Done",
  "Blocked",
] as const;

export const milestoneStatusEnum = z.enum(MILESTONE_STATUSES);
export const taskStatusEnum = z.enum(TASK_STATUSES);
export const boardRefKindEnum = z.enum(["milestone", "team", "specialist"]);

const milestoneId = z.string().regex(MILESTONE_ID_PATTERN);
const taskId = z.string().regex(TASK_ID_PATTERN);
const isoDate = z.string().regex(ISO_DATE_PATTERN);

export const boardRefSchema = z.object({
  kind: boardRefKindEnum,
  value: z.string().min(1),
});

/** Validates a milestone record. Ids are checked for shape only. */
export const milestoneSchema = z
  .object({
    id: milestoneId,
    title: z.string().min(1),
    status: milestoneStatusEnum,
    startWeek: z.number().int().min(1),
    endWeek: z.number().int().min(1),
    dependsOn: z.array(milestoneId).default([]),
    taskIds: z.array(taskId),
    completedOn: isoDate.optional(),
    archivedOn: isoDate.optional(),
  })
  .refine((m) => m.endWeek >= m.startWeek, {
    message: "endWeek must not be before startWeek",
    path: ["endWeek"],
  });

/** Validates a task record. */
export const taskSchema = z.object({
  id: taskId,
  title: z.string().min(1),
  milestoneId: milestoneId,
  status: taskStatusEnum,
  dependsOn: z.array(taskId).default([]),
  owner: z.string().min(1).optional(),
  boardRefs: z.array(boardRefSchema).default([]),
  archivedOn: isoDate.optional(),
});

/** Top-level shape of active.yaml / archived.yaml. Records are validated one by one. */
export const partitionDocumentSchema = z.object({
  generation: z.number().int().min(0).default(0),
  milestones: z.record(z.string(), z.unknown()).default({}),
  tasks: z.record(z.string(), z.unknown()).default({}),
});

export const boardDefSchema = z.object({
  title: z.string().min(1),
  laneBy: boardRefKindEnum.default("milestone"),
  lanes: z.array(z.string()).optional(),
});

/** Validates boards.yaml. */
export const boardsRegistrySchema = z.object({
  teams: z.array(z.string().min(1)).default([]),
  specialists: z.array(z.string().min(1)).default([]),
  boards: z.record(z.string(), boardDefSchema).default({}),
});

export type PartitionDocument = z.infer<typeof partitionDocumentSchema>;
