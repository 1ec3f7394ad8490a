import { join } from "node:path";

export function activePath(ledgerDir: string): string {
  return join(ledgerDir, "active.yaml");
}

export function archivedPath(ledgerDir: string): string {
  return join(ledgerDir, "archived.yaml");
}

/** Archived partition as it was before the last commit started. */
export function previousArchivedPath(ledgerDir: string): string {
  return join(ledgerDir, "archived.prev.yaml");
}

export function boardsPath(ledgerDir: string): string {
  return join(ledgerDir, "boards.yaml");
}

export function lockPath(ledgerDir: string): string {
  return join(ledgerDir, ".ledger.lock");
}
