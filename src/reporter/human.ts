import type { LedgerResponse, RecordChange } from "../api/types.js";
import type { LedgerViolation } from "../ledger/types.js";
import type { SuiteReport } from "../suite/validation-suite.js";

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function formatViolations(violations: LedgerViolation[]): string[] {
  const lines = ["### Violations"];
  for (const violation of violations) {
    lines.push(`- **${violation.type}**: ${violation.message}`);
  }
  lines.push("");
  return lines;
}

function formatChange(change: RecordChange): string {
  const fields = change.action === "update" && change.fields.length > 0
    ? ` (${change.fields.join(", ")})`
    : "";
  return `- ${change.action} ${change.kind} ${change.id}${fields}`;
}

export function formatHumanResponse(response: LedgerResponse): string {
  const lines: string[] = [];
  const status = response.ok ? "OK" : "REJECTED";

  lines.push(`## ${response.method} ${response.path}`);
  lines.push(`**Mode:** ${response.mode}`);
  lines.push(`**Status:** ${status}`);
  lines.push(`**Generation:** ${response.generation}`);
  lines.push(`**Summary:** ${response.summary}`);
  lines.push("");

  if (response.diff.length > 0) {
    lines.push("### Proposed changes");
    for (const change of response.diff) lines.push(formatChange(change));
    lines.push("");
  }

  if (response.violations.length > 0) lines.push(...formatViolations(response.violations));

  if (response.records) {
    lines.push("### Records");
    for (const record of response.records) {
      lines.push(`- ${record.id} ${record.title} [${record.status}]`);
    }
    lines.push("");
  } else if (response.record && response.mode === "read") {
    lines.push("### Record");
    lines.push("```json");
    lines.push(JSON.stringify(response.record, null, 2));
    lines.push("```");
    lines.push("");
  }

  if (response.mode === "dry-run" && response.ok) {
    lines.push("write: skipped (use --apply)");
  }
  if (response.artifacts) {
    lines.push("### Regenerated");
    for (const path of response.artifacts) lines.push(`- ${path}`);
  }

  return lines.join("\n");
}

export function formatHumanSuite(report: SuiteReport): string {
  const lines: string[] = [];
  lines.push("## Ledger Validation Report");
  lines.push(`**Status:** ${report.ok ? "PASSED" : "FAILED"}`);
  lines.push(`**Generation:** ${report.generation}`);
  lines.push("");

  lines.push("### Checks");
  for (const check of report.checks) {
    const icon = check.status === "pass" ? "[x]" : "[ ]";
    let suffix = "";
    if (check.status === "fail") suffix = ` - ${plural(check.violations, "violation")}`;
    if (check.detail) suffix += ` (${check.detail})`;
    lines.push(`- ${icon} ${check.name}: ${check.status.toUpperCase()}${suffix}`);
  }
  lines.push("");

  if (report.violations.length > 0) lines.push(...formatViolations(report.violations));
  return lines.join("\n");
}
