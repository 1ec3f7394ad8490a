import { z } from "zod";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected an ISO date (YYYY-MM-DD)");

export const lockConfigSchema = z.object({
  retries: z.number().int().min(0).default(20),
  retryMs: z.number().int().positive().default(50),
});

export const rowOrderSchema = z.union([
  z.enum(["history-first", "topological"]),
  z.array(z.string()),
]);

export const renderConfigSchema = z.object({
  title: z.string().min(1).default("Project Timeline"),
  baselineStartDate: isoDate.default("2026-01-05"),
  totalWeeks: z.number().int().positive().optional(),
  summaryColumnBudget: z.number().int().positive().default(52),
  detailedColumnBudget: z.number().int().positive().default(104),
  labelWidth: z.number().int().min(8).default(28),
  cardTitleWidth: z.number().int().min(4).default(48),
  boardId: z.string().optional(),
  rowOrder: rowOrderSchema.default("history-first"),
});

export const ledgerConfigSchema = z.object({
  ledgerDir: z.string().default("ledger"),
  artifactsDir: z.string().default("artifacts"),
  artifactPrefix: z.string().regex(/^[\w.-]+$/).default("plan"),
  /** What reopening a Complete milestone does to its Done tasks. */
  reopenPolicy: z.enum(["keep", "reset"]).default("keep"),
  lock: lockConfigSchema.default({}),
  render: renderConfigSchema.default({}),
});

export type LedgerConfigInput = z.input<typeof ledgerConfigSchema>;
export type LedgerConfig = z.infer<typeof ledgerConfigSchema>;
export type ReopenPolicy = LedgerConfig["reopenPolicy"];
