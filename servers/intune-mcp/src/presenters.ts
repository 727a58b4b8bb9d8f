// servers/intune-mcp/src/presenters.ts
import type { McpContent } from "mcp-http";
import { IDENTITY_COLUMNS, NO_STATE, type ComplianceReport, type InactiveDeviceReport } from "@fleetreport/intune-core";

const IDENTITY = new Set<string>(IDENTITY_COLUMNS);
const OK_STATES = new Set(["compliant", "notapplicable", "remediated", NO_STATE]);

function stateIcon(s: string) {
  const k = s.toLowerCase();
  if (k === "compliant") return "🟢";
  if (k === "noncompliant" || k === "error") return "🔴";
  if (k === "ingraceperiod" || k === "conflict") return "🟠";
  return "⚪️";
}

function countBy<T>(items: readonly T[], key: (t: T) => string): Array<[string, number]> {
  const m = new Map<string, number>();
  for (const it of items) m.set(key(it), (m.get(key(it)) ?? 0) + 1);
  return [...m.entries()].sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

export function renderComplianceSummary(report: ComplianceReport, path?: string): string {
  const settings = report.columns.filter((c) => !IDENTITY.has(c));
  const states = countBy(report.rows, (r) => r.ComplianceState || "unknown")
    .map(([s, n]) => `${stateIcon(s)} ${s}: ${n}`)
    .join(" · ");

  const lines: string[] = [
    `### Device compliance — ${report.rows.length} device(s), ${settings.length} setting column(s)`,
    "",
    `**Compliance state:** ${states || "—"}`,
  ];
  if (path) lines.push("", `**Export:** \`${path}\``);

  const failing = settings
    .map((c) => ({ c, n: report.rows.filter((r) => !OK_STATES.has((r[c] ?? NO_STATE).toLowerCase())).length }))
    .filter((x) => x.n > 0)
    .sort((a, b) => b.n - a.n);

  if (failing.length) {
    lines.push("", "| Setting | Devices not compliant |", "|---|---:|");
    for (const { c, n } of failing) lines.push(`| \`${c}\` | ${n} |`);
  } else {
    lines.push("", "✅ No setting reports a failing state.");
  }

  if (report.warnings.length) {
    lines.push("", `<details><summary>${report.warnings.length} warning(s)</summary>`, "");
    for (const w of report.warnings) lines.push(`- ${w}`);
    lines.push("", "</details>");
  }
  return lines.join("\n");
}

export function renderInactiveSummary(report: InactiveDeviceReport, path?: string): string {
  const lines: string[] = [
    `### Inactive devices — ${report.rows.length} without a sync in ${report.days}+ day(s)`,
  ];
  if (path) lines.push("", `**Export:** \`${path}\``);
  if (!report.rows.length) {
    lines.push("", "✅ Every device synced recently.");
    return lines.join("\n");
  }
  lines.push("", "| Device | User | Last sync | Days |", "|---|---|---|---:|");
  for (const r of report.rows) {
    lines.push(`| \`${r.DeviceName || r.DeviceId}\` | ${r.UserPrincipalName || "—"} | ${r.LastSyncDateTime || "—"} | ${r.DaysSinceLastSync} |`);
  }
  return lines.join("\n");
}

export function asContent(text: string, json: unknown): McpContent[] {
  return [{ type: "text", text }, { type: "json", json }];
}
