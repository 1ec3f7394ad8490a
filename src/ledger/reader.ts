import { readFile } from "node:fs/promises";
import { parse as yamlParse } from "yaml";
import { sortIds } from "../graph/build.js";
import { activePath, archivedPath, boardsPath, previousArchivedPath } from "./paths.js";
import { boardsRegistrySchema, partitionDocumentSchema } from "./schemas.js";
import type { PartitionDocument } from "./schemas.js";
import { parseRecord } from "./validator.js";
import { emptyPartition } from "./types.js";
import type { BoardsRegistry, Ledger, LedgerPartition, LedgerViolation } from "./types.js";

/** Both partition documents as read from disk, records not yet validated. */
export interface RawLedger {
  active: PartitionDocument;
  archived: PartitionDocument;
}

export interface LoadedLedger {
  /** Records that passed schema validation. */
  ledger: Ledger;
  /** Schema violations of the records that were left out. */
  violations: LedgerViolation[];
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

/** Read and parse a YAML document, or undefined when the file is missing. */
async function readOptionalYaml(path: string): Promise<unknown> {
  try {
    const raw = await readFile(path, "utf-8");
    return yamlParse(raw) ?? {};
  } catch (err: unknown) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

/** Read and parse a YAML document. A missing file reads as an empty document. */
async function readYaml(path: string): Promise<unknown> {
  return (await readOptionalYaml(path)) ?? {};
}

/**
 * Load both partition documents. When a commit stopped after the archived
 * rename, archived.yaml is one generation ahead of active.yaml; the archived
 * document kept from before that commit is used instead, which rolls the
 * ledger back to the last complete generation.
 */
export async function loadLedgerDocuments(ledgerDir: string): Promise<RawLedger> {
  const active = partitionDocumentSchema.parse(await readYaml(activePath(ledgerDir)));
  const archived = partitionDocumentSchema.parse(await readYaml(archivedPath(ledgerDir)));
  if (active.generation === archived.generation) return { active, archived };

  if (archived.generation === active.generation + 1) {
    const saved = await readOptionalYaml(previousArchivedPath(ledgerDir));
    if (saved !== undefined) {
      const previous = partitionDocumentSchema.parse(saved);
      if (previous.generation === active.generation) return { active, archived: previous };
    }
  }
  throw new Error(
    `Ledger partitions disagree on generation (active ${active.generation}, archived ${archived.generation}); the last commit did not finish`,
  );
}

function parsePartition(doc: PartitionDocument, violations: LedgerViolation[]): LedgerPartition {
  const partition = emptyPartition();
  for (const id of sortIds(Object.keys(doc.milestones))) {
    const result = parseRecord("milestone", doc.milestones[id], id);
    if (result.ok) partition.milestones[id] = result.value;
    else violations.push(...result.violations);
  }
  for (const id of sortIds(Object.keys(doc.tasks))) {
    const result = parseRecord("task", doc.tasks[id], id);
    if (result.ok) partition.tasks[id] = result.value;
    else violations.push(...result.violations);
  }
  return partition;
}

/** Validate every record; malformed ones are reported and left out of the snapshot. */
export function parseLedger(raw: RawLedger): LoadedLedger {
  const violations: LedgerViolation[] = [];
  const ledger: Ledger = {
    generation: raw.active.generation,
    active: parsePartition(raw.active, violations),
    archived: parsePartition(raw.archived, violations),
  };
  return { ledger, violations };
}

export async function loadLedger(ledgerDir: string): Promise<LoadedLedger> {
  return parseLedger(await loadLedgerDocuments(ledgerDir));
}

/** Load boards.yaml. A missing registry has no teams, specialists or boards. */
export async function loadBoards(ledgerDir: string): Promise<BoardsRegistry> {
  return boardsRegistrySchema.parse(await readYaml(boardsPath(ledgerDir)));
}
