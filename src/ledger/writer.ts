import { mkdir, open, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";
import { stringify as yamlStringify } from "yaml";
import { sortIds } from "../graph/build.js";
import { activePath, archivedPath, boardsPath, lockPath, previousArchivedPath } from "./paths.js";
import { loadLedgerDocuments } from "./reader.js";
import type { BoardsRegistry, Ledger, LedgerPartition } from "./types.js";

// ---------------------------------------------------------------------------
// Atomic write helper
// ---------------------------------------------------------------------------

/** Write to a sibling temp file, then rename over the target. */
export async function atomicWrite(targetPath: string, content: string | Buffer): Promise<void> {
  await mkdir(dirname(targetPath), { recursive: true });
  const temp = `${targetPath}.${randomUUID()}.tmp`;
  try {
    await writeFile(temp, content);
    await rename(temp, targetPath);
  } catch (err) {
    await unlink(temp).catch(() => undefined);
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function partitionDocument(generation: number, partition: LedgerPartition) {
  const milestones: Record<string, unknown> = {};
  for (const id of sortIds(Object.keys(partition.milestones))) {
    milestones[id] = partition.milestones[id];
  }
  const tasks: Record<string, unknown> = {};
  for (const id of sortIds(Object.keys(partition.tasks))) {
    tasks[id] = partition.tasks[id];
  }
  return { generation, milestones, tasks };
}

/** YAML text of one partition, ids in sorted order. */
export function serializePartition(generation: number, partition: LedgerPartition): string {
  return yamlStringify(partitionDocument(generation, partition));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Persist a snapshot. The last complete archived document is kept in
 * archived.prev.yaml, then the archived document goes first and the active
 * one last. A crash between the two renames leaves archived.yaml ahead of
 * active.yaml, and the next load rolls back to the kept copy.
 */
export async function writeLedger(ledgerDir: string, ledger: Ledger): Promise<void> {
  await mkdir(ledgerDir, { recursive: true });
  const current = await loadLedgerDocuments(ledgerDir);
  await atomicWrite(previousArchivedPath(ledgerDir), yamlStringify(current.archived));
  await atomicWrite(archivedPath(ledgerDir), serializePartition(ledger.generation, ledger.archived));
  await atomicWrite(activePath(ledgerDir), serializePartition(ledger.generation, ledger.active));
}

export async function writeBoards(ledgerDir: string, boards: BoardsRegistry): Promise<void> {
  await atomicWrite(boardsPath(ledgerDir), yamlStringify(boards));
}

// ---------------------------------------------------------------------------
// Advisory lock
// ---------------------------------------------------------------------------

export interface LockOptions {
  retries: number;
  retryMs: number;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    // EPERM means the process exists but belongs to someone else
    return typeof err === "object" && err !== null && "code" in err && err.code === "EPERM";
  }
}

async function tryCreateLock(path: string): Promise<boolean> {
  try {
    // O_CREAT | O_EXCL | O_WRONLY: fails if the file already exists
    const handle = await open(path, "wx");
    await handle.writeFile(String(process.pid), "utf-8");
    await handle.close();
    return true;
  } catch (err: unknown) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "EEXIST") {
      return false;
    }
    throw err;
  }
}

/** A lock without a readable pid is only stale once it is this old; its holder may still be writing it. */
const UNOWNED_LOCK_GRACE_MS = 2_000;

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Remove a lock whose owning process is gone. Returns true if it was removed.
 * An unreadable or empty pid counts as gone only after the grace period.
 */
async function clearStaleLock(path: string): Promise<boolean> {
  let content: string;
  let modifiedMs: number;
  try {
    content = await readFile(path, "utf-8");
    modifiedMs = (await stat(path)).mtimeMs;
  } catch (err: unknown) {
    if (isMissingFile(err)) return false;
    throw err;
  }
  const owner = Number.parseInt(content.trim(), 10);
  if (Number.isInteger(owner)) {
    if (processAlive(owner)) return false;
  } else if (Date.now() - modifiedMs < UNOWNED_LOCK_GRACE_MS) {
    return false;
  }
  await unlink(path).catch(() => undefined);
  return true;
}

/**
 * Acquire the single-writer lock for a ledger directory. Retries on contention;
 * a lock left by a dead process is cleared on the last attempt.
 * Returns the release function.
 */
export async function acquireLock(
  ledgerDir: string,
  options: LockOptions,
): Promise<() => Promise<void>> {
  await mkdir(ledgerDir, { recursive: true });
  const path = lockPath(ledgerDir);

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    if (await tryCreateLock(path)) {
      return async () => {
        await unlink(path).catch(() => undefined);
      };
    }
    if (attempt === options.retries && (await clearStaleLock(path)) && (await tryCreateLock(path))) {
      return async () => {
        await unlink(path).catch(() => undefined);
      };
    }
    if (attempt < options.retries) await sleep(options.retryMs);
  }

  throw new Error(`Failed to acquire ledger lock at ${path} after ${options.retries + 1} attempts`);
}

/** Run `fn` while holding the ledger lock. */
export async function withLedgerLock<T>(
  ledgerDir: string,
  options: LockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const release = await acquireLock(ledgerDir, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
