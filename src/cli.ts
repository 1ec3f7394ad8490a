#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { handleRequest, openLedger } from "./api/index.js";
import type { LedgerRequest } from "./api/index.js";
import { loadConfig } from "./config/loader.js";
import { serializeFeed } from "./export/feed.js";
import { renderArtifacts, writeArtifacts } from "./export/pipeline.js";
import { checkStoredLedger } from "./ledger/invariants.js";
import { loadBoards, loadLedger, loadLedgerDocuments } from "./ledger/reader.js";
import { LedgerIntegrityError } from "./ledger/types.js";
import type { BoardsRegistry, LedgerViolation } from "./ledger/types.js";
import type { LoadedLedger } from "./ledger/reader.js";
import { formatHumanResponse, formatHumanSuite } from "./reporter/human.js";
import { formatJsonReport } from "./reporter/json.js";
import { runValidationSuite } from "./suite/validation-suite.js";

const __dirname_cli = dirname(fileURLToPath(import.meta.url));
const cliPkgVersion = String(
  JSON.parse(readFileSync(join(__dirname_cli, "..", "package.json"), "utf-8")).version,
);

/** Exit codes: 0 success, 1 violations, 2 usage or runtime error. */
const EXIT_VIOLATIONS = 1;
const EXIT_ERROR = 2;

interface ApiOptions {
  body?: string;
  bodyFile?: string;
  apply?: boolean;
  force?: boolean;
  removeDependents?: boolean;
  reopen?: string;
  generation?: string;
  json?: boolean;
}

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(EXIT_ERROR);
}

function printViolations(violations: LedgerViolation[]): void {
  for (const violation of violations) {
    console.error(`  ${violation.type}: ${violation.message}`);
  }
}

/** Exit before rendering a ledger that would not pass validation. */
function refuseViolations(loaded: LoadedLedger, boards: BoardsRegistry): void {
  const violations = checkStoredLedger(loaded, boards);
  if (violations.length === 0) return;
  console.error("Error: ledger has violations; nothing rendered");
  printViolations(violations);
  process.exit(EXIT_VIOLATIONS);
}

async function readBody(opts: ApiOptions): Promise<unknown> {
  if (opts.body !== undefined && opts.bodyFile !== undefined) {
    throw new Error("Use either --body or --body-file, not both");
  }
  const text = opts.bodyFile !== undefined ? await readFile(opts.bodyFile, "utf-8") : opts.body;
  if (text === undefined) return undefined;
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Request body is not valid JSON: ${message}`);
  }
}

function parseReopen(value: string | undefined): LedgerRequest["reopen"] {
  if (value === undefined) return undefined;
  if (value === "keep" || value === "reset") return value;
  throw new Error(`--reopen must be "keep" or "reset", got "${value}"`);
}

function parseGeneration(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const generation = Number(value);
  if (!Number.isInteger(generation) || generation < 0) {
    throw new Error(`--generation must be a non-negative integer, got "${value}"`);
  }
  return generation;
}

const program = new Command();

program
  .name("plan-ledger")
  .description("plan-ledger: milestone and task ledger with deterministic timeline and board renders")
  .version(cliPkgVersion);

program
  .command("api")
  .description("Send a request to the mutation surface (dry-run unless --apply)")
  .argument("<method>", "GET | POST | PATCH | DELETE")
  .argument("<path>", "/milestones, /milestones/<id>, /tasks or /tasks/<id>")
  .option("--body <json>", "Inline JSON body")
  .option("--body-file <path>", "Path to a JSON body file")
  .option("--apply", "Write changes and regenerate artifacts")
  .option("--force", "Archive even while active records still reference the id")
  .option("--remove-dependents", "On task DELETE, drop the id from active dependents")
  .option("--reopen <policy>", "keep | reset, when a Complete milestone is reopened")
  .option("--generation <n>", "Reject unless the ledger is at this generation")
  .option("--json", "Output structured JSON instead of a human-readable report")
  .action(async (method: string, path: string, opts: ApiOptions) => {
    try {
      const config = await loadConfig(process.cwd());
      const { store, options } = openLedger(config);
      const response = await handleRequest(
        store,
        {
          method,
          path,
          body: await readBody(opts),
          apply: opts.apply ?? false,
          force: opts.force ?? false,
          removeDependents: opts.removeDependents ?? false,
          reopen: parseReopen(opts.reopen),
          expectedGeneration: parseGeneration(opts.generation),
        },
        options,
      );
      console.log(opts.json ? formatJsonReport(response) : formatHumanResponse(response));
      process.exit(response.ok ? 0 : EXIT_VIOLATIONS);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("validate")
  .description("Run the validation suite over the stored ledger")
  .option("--json", "Output structured JSON instead of a human-readable report")
  .action(async (opts: { json?: boolean }) => {
    try {
      const config = await loadConfig(process.cwd());
      const raw = await loadLedgerDocuments(config.ledgerDir);
      const boards = await loadBoards(config.ledgerDir);
      const report = runValidationSuite(raw, boards, {
        settings: config.render,
        prefix: config.artifactPrefix,
      });
      console.log(opts.json ? formatJsonReport(report) : formatHumanSuite(report));
      process.exit(report.ok ? 0 : EXIT_VIOLATIONS);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("render")
  .description("Regenerate every artifact from the stored ledger")
  .action(async () => {
    try {
      const config = await loadConfig(process.cwd());
      const loaded = await loadLedger(config.ledgerDir);
      const boards = await loadBoards(config.ledgerDir);
      refuseViolations(loaded, boards);
      const { ledger } = loaded;
      const bundle = renderArtifacts(ledger, boards, config.render, config.artifactPrefix);
      const paths = await writeArtifacts(config.artifactsDir, bundle);
      console.log(`Rendered generation ${ledger.generation}:`);
      for (const path of paths) console.log(`  ${path}`);
    } catch (err) {
      if (err instanceof LedgerIntegrityError) {
        console.error("Error: render aborted");
        printViolations(err.violations);
        process.exit(EXIT_VIOLATIONS);
      }
      fail(err);
    }
  });

program
  .command("feed")
  .description("Print the feed manifest for the stored ledger without writing files")
  .action(async () => {
    try {
      const config = await loadConfig(process.cwd());
      const loaded = await loadLedger(config.ledgerDir);
      const boards = await loadBoards(config.ledgerDir);
      refuseViolations(loaded, boards);
      const bundle = renderArtifacts(loaded.ledger, boards, config.render, config.artifactPrefix);
      process.stdout.write(serializeFeed(bundle.feed));
    } catch (err) {
      if (err instanceof LedgerIntegrityError) {
        console.error("Error: render aborted");
        printViolations(err.violations);
        process.exit(EXIT_VIOLATIONS);
      }
      fail(err);
    }
  });

program.parseAsync(process.argv).catch(fail);
