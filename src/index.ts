export * from "./ledger/types.js";
export { validateRecord, parseRecord } from "./ledger/validator.js";
export { validateLedger, validateRecords, checkLedgerInvariants } from "./ledger/invariants.js";
export { loadLedger, loadLedgerDocuments, loadBoards, parseLedger } from "./ledger/reader.js";
export type { RawLedger, LoadedLedger } from "./ledger/reader.js";
export { writeLedger, writeBoards, withLedgerLock } from "./ledger/writer.js";

export * from "./graph/index.js";

export { createTimeLayout } from "./layout/time-mapper.js";
export type { TimeLayout, TimeLayoutOptions, ColumnSpan } from "./layout/time-mapper.js";

export { renderGantt } from "./render/gantt.js";
export type { GanttOptions, RowOrder } from "./render/gantt.js";
export { assignLanes, renderBoard, displayColumn, UNASSIGNED_LANE } from "./render/board.js";
export type { BoardOptions, LaneAssignment } from "./render/board.js";
export { MILESTONE_STATUS_STYLE, TASK_STATUS_STYLE, CONNECTOR_STYLE } from "./render/status-table.js";
export type * from "./render/types.js";
export { BOARD_COLUMNS } from "./render/types.js";

export { formatGanttAscii, formatBoardAscii, formatReportAscii } from "./export/ascii.js";
export { formatMarkdown } from "./export/markdown.js";
export { renderGanttPng } from "./export/raster.js";
export { buildFeedManifest, contentHash, serializeFeed } from "./export/feed.js";
export type { FeedManifest, ArtifactContent } from "./export/feed.js";
export {
  renderArtifacts,
  writeArtifacts,
  snapshotHash,
  RenderCache,
} from "./export/pipeline.js";
export type { RenderBundle, RenderSettings } from "./export/pipeline.js";

export { runValidationSuite } from "./suite/validation-suite.js";
export type { SuiteReport, CheckResult } from "./suite/validation-suite.js";

export * from "./api/index.js";

export { loadConfig } from "./config/loader.js";
export type { ResolvedConfig } from "./config/loader.js";
export type { LedgerConfig, LedgerConfigInput } from "./config/schema.js";
