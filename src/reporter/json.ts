import type { LedgerResponse } from "../api/types.js";
import type { SuiteReport } from "../suite/validation-suite.js";

export function formatJsonReport(result: LedgerResponse | SuiteReport): string {
  return JSON.stringify(result, null, 2);
}
