import { writeArtifacts } from "../export/pipeline.js";
import type { RenderBundle } from "../export/pipeline.js";
import { loadBoards, loadLedger } from "../ledger/reader.js";
import { withLedgerLock, writeLedger } from "../ledger/writer.js";
import type { LockOptions } from "../ledger/writer.js";
import type { BoardsRegistry, Ledger, LedgerViolation } from "../ledger/types.js";

export interface LedgerSnapshot {
  ledger: Ledger;
  boards: BoardsRegistry;
  /** Stored records that failed schema validation and were left out. */
  violations: LedgerViolation[];
}

/** Persistence seen by the request handler. */
export interface LedgerStore {
  load(): Promise<LedgerSnapshot>;
  /** Run `fn` as the single writer. */
  withLock<T>(fn: () => Promise<T>): Promise<T>;
  save(ledger: Ledger): Promise<void>;
  /** Write rendered files; returns their paths. */
  saveArtifacts(bundle: RenderBundle): Promise<string[]>;
}

export interface FileStoreOptions {
  ledgerDir: string;
  artifactsDir: string;
  lock: LockOptions;
}

/** YAML partitions in ledgerDir, artifacts in artifactsDir, lock file beside the ledger. */
export class FileLedgerStore implements LedgerStore {
  constructor(private readonly options: FileStoreOptions) {}

  async load(): Promise<LedgerSnapshot> {
    const { ledger, violations } = await loadLedger(this.options.ledgerDir);
    const boards = await loadBoards(this.options.ledgerDir);
    return { ledger, boards, violations };
  }

  withLock<T>(fn: () => Promise<T>): Promise<T> {
    return withLedgerLock(this.options.ledgerDir, this.options.lock, fn);
  }

  save(ledger: Ledger): Promise<void> {
    return writeLedger(this.options.ledgerDir, ledger);
  }

  saveArtifacts(bundle: RenderBundle): Promise<string[]> {
    return writeArtifacts(this.options.artifactsDir, bundle);
  }
}
