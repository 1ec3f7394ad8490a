import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { ledgerConfigSchema } from "./schema.js";
import type { LedgerConfig } from "./schema.js";

export const CONFIG_FILE = ".ledger.json";

/** Config with ledgerDir and artifactsDir resolved against the project directory. */
export interface ResolvedConfig extends LedgerConfig {
  projectDir: string;
}

function resolveDir(projectDir: string, dir: string): string {
  return isAbsolute(dir) ? dir : join(projectDir, dir);
}

export async function loadConfig(projectDir: string = process.cwd()): Promise<ResolvedConfig> {
  let raw: unknown;

  try {
    const content = await readFile(join(projectDir, CONFIG_FILE), "utf-8");
    raw = JSON.parse(content);
  } catch (err: unknown) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
      // No config file, use defaults
    } else {
      throw err;
    }
  }

  const config = ledgerConfigSchema.parse(raw ?? {});
  return {
    ...config,
    projectDir,
    ledgerDir: resolveDir(projectDir, config.ledgerDir),
    artifactsDir: resolveDir(projectDir, config.artifactsDir),
  };
}
