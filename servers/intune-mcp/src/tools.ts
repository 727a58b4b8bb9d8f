// servers/intune-mcp/src/tools.ts
import { z } from "zod";
import type { ToolDef, ToolResult } from "mcp-http";
import {
  ExportError,
  FleetError,
  normalizeGraphError,
  runComplianceReport,
  runInactiveDevicesReport,
  type ComplianceSource,
  type DeviceSource,
  type Logger,
  type ReportConfig,
} from "@fleetreport/intune-core";
import { asContent, renderComplianceSummary, renderInactiveSummary } from "./presenters.js";

export interface MakeIntuneToolsOptions {
  source: DeviceSource & ComplianceSource;
  config: ReportConfig;
  logger: Logger;
  namespace?: string;
}

function toolError(e: unknown): ToolResult {
  if (e instanceof FleetError) {
    return { content: [{ type: "json", json: { status: "error", error: { type: e.name, reason: e.reason, message: e.message } } }], isError: true };
  }
  if (e instanceof ExportError) {
    return { content: [{ type: "json", json: { status: "error", error: { type: e.name, path: e.path, message: e.message } } }], isError: true };
  }
  return { content: [{ type: "json", json: normalizeGraphError(e) }], isError: true };
}

export function makeIntuneTools(opts: MakeIntuneToolsOptions): ToolDef[] {
  const { source, config, logger, namespace = "intune." } = opts;
  const n = (s: string) => `${namespace}${s}`;

  const complianceInput = z
    .object({
      path: z.string().min(1).optional(),
      filter: z.string().optional(),
      concurrency: z.number().int().min(1).max(32).optional(),
      includeRows: z.boolean().default(false),
    })
    .strict();

  const device_compliance_report: ToolDef<typeof complianceInput> = {
    name: n("device_compliance_report"),
    description:
      "Build the per-device compliance setting report (one column per discovered setting, 'none' where a device has no state) and optionally write it as CSV.",
    inputSchema: complianceInput,
    handler: async (a) => {
      try {
        const report = await runComplianceReport(
          { devices: source, compliance: source, logger },
          {
            path: a.path,
            filter: a.filter ?? config.devices.filter,
            concurrency: a.concurrency ?? config.compliance.concurrency,
          }
        );
        return {
          content: asContent(renderComplianceSummary(report, a.path), {
            status: "ok",
            columns: report.columns,
            rowCount: report.rows.length,
            warnings: report.warnings,
            ...(a.includeRows ? { rows: report.rows } : {}),
          }),
        };
      } catch (e) {
        return toolError(e);
      }
    },
  };

  const inactiveInput = z
    .object({
      path: z.string().min(1).optional(),
      filter: z.string().optional(),
      days: z.number().int().positive().optional(),
    })
    .strict();

  const inactive_devices_report: ToolDef<typeof inactiveInput> = {
    name: n("inactive_devices_report"),
    description: "List managed devices that have not synced with Intune within the given number of days (default from config).",
    inputSchema: inactiveInput,
    handler: async (a) => {
      try {
        const report = await runInactiveDevicesReport(
          { devices: source, logger },
          { path: a.path, filter: a.filter ?? config.devices.filter, days: a.days ?? config.inactivity.days }
        );
        return { content: asContent(renderInactiveSummary(report, a.path), { status: "ok", ...report }) };
      } catch (e) {
        return toolError(e);
      }
    },
  };

  return [device_compliance_report, inactive_devices_report];
}
