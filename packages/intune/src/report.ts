// packages/intune/src/report.ts
import type { ComplianceReport, ComplianceSource, Device, DeviceSource, Logger } from "./types.js";
import { IDENTITY_COLUMNS } from "./types.js";
import { DeviceSourceError, ExportError, FleetError, describeError } from "./errors.js";
import { discoverColumns, type PassOptions } from "./columns.js";
import { buildRows } from "./rows.js";
import { writeCsvReport } from "./export.js";
import { findInactiveDevices, type InactiveDeviceReport } from "./inactivity.js";

export interface ReportDeps {
  devices: DeviceSource;
  compliance: ComplianceSource;
  logger: Logger;
}

export interface ComplianceReportRequest {
  /** CSV destination; omit to build the report without writing it. */
  path?: string;
  filter?: string;
  concurrency?: number;
}

export interface InactiveDevicesReportRequest {
  path?: string;
  filter?: string;
  days?: number;
  now?: Date;
}

/** Lists the fleet, turning source failures and an empty fleet into a FleetError. */
export async function listFleet(source: DeviceSource, logger: Logger, filter?: string): Promise<Device[]> {
  let devices: Device[];
  try {
    devices = await source.listDevices(filter);
  } catch (e) {
    if (e instanceof DeviceSourceError && e.kind === "auth") {
      logger.error(`not authorized to list managed devices: ${e.message}`);
      throw new FleetError("auth", `not authorized to list managed devices: ${e.message}`, { cause: e });
    }
    logger.error(`listing managed devices failed: ${describeError(e)}`);
    throw new FleetError("transport", `listing managed devices failed: ${describeError(e)}`, { cause: e });
  }
  if (devices.length === 0) {
    const scope = filter ? ` matching "${filter}"` : "";
    logger.error(`no managed devices${scope}`);
    throw new FleetError("empty", `no managed devices${scope}`);
  }
  logger.info(`listed ${devices.length} managed device(s)`);
  return devices;
}

/** Discovers columns, then materializes one row per device against them. */
export async function buildComplianceReport(
  devices: readonly Device[],
  source: ComplianceSource,
  opts: Omit<PassOptions, "onWarning">
): Promise<ComplianceReport> {
  const warnings: string[] = [];
  const pass: PassOptions = { ...opts, onWarning: (line) => warnings.push(line) };

  const settingColumns = await discoverColumns(devices, source, pass);
  opts.logger.info(`discovered ${settingColumns.length} setting column(s)`);
  const rows = await buildRows(devices, settingColumns, source, pass);

  return { columns: [...IDENTITY_COLUMNS, ...settingColumns], rows, warnings };
}

export async function runComplianceReport(
  deps: ReportDeps,
  req: ComplianceReportRequest = {}
): Promise<ComplianceReport> {
  const devices = await listFleet(deps.devices, deps.logger, req.filter);
  const report = await buildComplianceReport(devices, deps.compliance, {
    logger: deps.logger,
    concurrency: req.concurrency,
  });
  if (req.path) await exportOrAttach(req.path, report, deps.logger);
  return report;
}

export async function runInactiveDevicesReport(
  deps: Pick<ReportDeps, "devices" | "logger">,
  req: InactiveDevicesReportRequest = {}
): Promise<InactiveDeviceReport> {
  const devices = await listFleet(deps.devices, deps.logger, req.filter);
  const report = findInactiveDevices(devices, { days: req.days, now: req.now });
  deps.logger.info(`${report.rows.length} of ${devices.length} device(s) inactive for ${report.days}+ day(s)`);
  if (req.path) await exportOrAttach(req.path, report, deps.logger);
  return report;
}

async function exportOrAttach<R extends { columns: string[]; rows: Array<Record<string, string>> }>(
  path: string,
  report: R,
  logger: Logger
): Promise<void> {
  try {
    const out = await writeCsvReport(path, report.columns, report.rows, logger);
    logger.info(`wrote ${report.rows.length} row(s) to ${out.path}`);
  } catch (e) {
    if (e instanceof ExportError) {
      logger.error(e.message);
      e.report = report;
    }
    throw e;
  }
}
