import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { handleRequest, openLedger } from "./api/index.js";
import { loadConfig } from "./config/loader.js";
import { renderArtifacts } from "./export/pipeline.js";
import { checkStoredLedger } from "./ledger/invariants.js";
import { loadBoards, loadLedger, loadLedgerDocuments } from "./ledger/reader.js";
import { runValidationSuite } from "./suite/validation-suite.js";

function textResult(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

const projectDirParam = z.string().optional().describe("Project directory (defaults to cwd)");

/**
 * Create an MCP server exposing the ledger tools.
 * Exported for testing; call `startServer()` to run with stdio transport.
 */
export function createServer(): McpServer {
  const server = new McpServer(
    { name: "plan-ledger", version: "1.0.0" },
    { capabilities: { tools: {} } },
  );

  server.tool(
    "ledger_request",
    "Send a GET/POST/PATCH/DELETE request to the ledger. Dry-run unless apply is true.",
    {
      projectDir: projectDirParam,
      method: z.enum(["GET", "POST", "PATCH", "DELETE"]),
      path: z.string().describe("/milestones, /milestones/<id>, /tasks or /tasks/<id>"),
      body: z.record(z.string(), z.unknown()).optional().describe("Record fields"),
      apply: z.boolean().optional(),
      force: z.boolean().optional(),
      removeDependents: z.boolean().optional(),
      reopen: z.enum(["keep", "reset"]).optional(),
      expectedGeneration: z.number().int().min(0).optional(),
    },
    async ({ projectDir, ...request }) => {
      const config = await loadConfig(projectDir ?? process.cwd());
      const { store, options } = openLedger(config);
      return textResult(await handleRequest(store, request, options));
    },
  );

  server.tool(
    "ledger_validate",
    "Run the validation suite (schema, graph, invariants, render idempotence)",
    { projectDir: projectDirParam },
    async ({ projectDir }) => {
      const config = await loadConfig(projectDir ?? process.cwd());
      const raw = await loadLedgerDocuments(config.ledgerDir);
      const boards = await loadBoards(config.ledgerDir);
      return textResult(
        runValidationSuite(raw, boards, { settings: config.render, prefix: config.artifactPrefix }),
      );
    },
  );

  server.tool(
    "ledger_feed",
    "Render the ledger in memory and return the feed manifest; refused while the ledger has violations",
    { projectDir: projectDirParam },
    async ({ projectDir }) => {
      const config = await loadConfig(projectDir ?? process.cwd());
      const loaded = await loadLedger(config.ledgerDir);
      const boards = await loadBoards(config.ledgerDir);
      const violations = checkStoredLedger(loaded, boards);
      if (violations.length > 0) {
        return textResult({ ok: false, summary: "ledger has violations; nothing rendered", violations });
      }
      return textResult(
        renderArtifacts(loaded.ledger, boards, config.render, config.artifactPrefix).feed,
      );
    },
  );

  return server;
}

/** Start the MCP server on stdio transport. */
async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

// Run when executed directly
const isMain =
  typeof process !== "undefined" &&
  process.argv[1] &&
  (process.argv[1].endsWith("/server.js") || process.argv[1].endsWith("\\server.js"));

if (isMain) {
  startServer().catch((err) => {
    process.stderr.write(`plan-ledger MCP server error: ${String(err)}\n`);
    process.exit(1);
  });
}
