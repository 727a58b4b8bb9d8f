export * from "./types.js";
export {
  normalizeGraphError,
  isAuthFailure,
  describeError,
  DeviceSourceError,
  FleetError,
  ExportError,
  type NormalizedGraphError,
  type GraphErrorType,
} from "./errors.js";
export { discoverColumns, resolveSettingName, compareOrdinal, type PassOptions } from "./columns.js";
export { buildRow, buildRows } from "./rows.js";
export { toCsv, writeCsvReport } from "./export.js";
export {
  findInactiveDevices,
  daysSinceSync,
  DEFAULT_INACTIVE_DAYS,
  INACTIVE_COLUMNS,
  type InactiveDeviceReport,
  type InactiveDeviceRow,
} from "./inactivity.js";
export {
  listFleet,
  buildComplianceReport,
  runComplianceReport,
  runInactiveDevicesReport,
  type ReportDeps,
  type ComplianceReportRequest,
  type InactiveDevicesReportRequest,
} from "./report.js";
export { GraphIntuneSource, type GraphLike, type GraphApiVersion } from "./clients.graph.js";
export {
  loadReportConfig,
  graphSettingsFromEnv,
  ReportConfigError,
  type ReportConfig,
  type GraphSettings,
} from "./config.js";
export { consoleLogger } from "./logger.js";
export { mapInOrder } from "./pool.js";
export { createIntuneSourceFromEnv } from "./compose.js";
