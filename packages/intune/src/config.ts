// packages/intune/src/config.ts
import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { DEFAULT_INACTIVE_DAYS } from "./inactivity.js";

// ────────── Report config (YAML)
export const ReportConfigSchema = z
  .object({
    devices: z.object({ filter: z.string().optional() }).strict().default({}),
    graph: z.object({ apiVersion: z.enum(["v1.0", "beta"]).default("beta") }).strict().default({}),
    compliance: z.object({ concurrency: z.number().int().min(1).max(32).default(1) }).strict().default({}),
    inactivity: z.object({ days: z.number().int().positive().default(DEFAULT_INACTIVE_DAYS) }).strict().default({}),
  })
  .strict();

export type ReportConfig = z.infer<typeof ReportConfigSchema>;

// ────────── Graph credentials (env)
export const MsftCloudSchema = z.enum(["Public", "AzureUSGovernment"]);

const GraphEnvSchema = z.object({
  GRAPH_TENANT_ID: z.string().min(1).optional(),
  AZURE_TENANT_ID: z.string().min(1).optional(),
  GRAPH_CLIENT_ID: z.string().min(1, "GRAPH_CLIENT_ID is required"),
  GRAPH_CLIENT_SECRET: z.string().min(1, "GRAPH_CLIENT_SECRET is required"),
  MSFT_CLOUD: MsftCloudSchema.default("Public"),
});

export interface GraphSettings {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  cloud: z.infer<typeof MsftCloudSchema>;
}

export class ReportConfigError extends Error {
  constructor(message: string) { super(message); this.name = "ReportConfigError"; }
}

function formatIssues(issues: readonly z.ZodIssue[], source: string): string {
  return issues
    .map((i) => ` - ${source} :: ${i.path.length ? i.path.join(".") : "<root>"}: ${i.message} (${i.code})`)
    .join("\n");
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function deepMerge(a: unknown, b: unknown): unknown {
  if (Array.isArray(a) && Array.isArray(b)) return b;
  if (isPlainObject(a) && isPlainObject(b)) {
    const out: Record<string, unknown> = { ...a };
    for (const k of Object.keys(b)) out[k] = deepMerge(a[k], b[k]);
    return out;
  }
  return b ?? a;
}

/**
 * Reads the YAML file at `file`, or REPORT_CONFIG, or ./report.yaml when it
 * exists. A missing default file yields the defaults; a missing explicit one
 * is an error.
 */
export function loadReportConfig(file?: string, overrides?: unknown): ReportConfig {
  const explicit = file || process.env.REPORT_CONFIG || undefined;
  const p = path.resolve(explicit ?? "report.yaml");
  let doc: unknown = {};
  if (fs.existsSync(p)) {
    try {
      doc = YAML.parse(fs.readFileSync(p, "utf8")) ?? {};
    } catch (e) {
      throw new ReportConfigError(`Invalid YAML in ${p}: ${e instanceof Error ? e.message : String(e)}`);
    }
  } else if (explicit) {
    throw new ReportConfigError(`Report config not found: ${p}`);
  }
  const res = ReportConfigSchema.safeParse(deepMerge(doc, overrides ?? {}));
  if (!res.success) {
    throw new ReportConfigError(`Invalid report config in ${p}:\n${formatIssues(res.error.issues, p)}`);
  }
  return res.data;
}

export function graphSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): GraphSettings {
  const res = GraphEnvSchema.safeParse(env);
  if (!res.success) throw new ReportConfigError(`Invalid Graph environment:\n${formatIssues(res.error.issues, "env")}`);
  const tenantId = res.data.GRAPH_TENANT_ID ?? res.data.AZURE_TENANT_ID;
  if (!tenantId) throw new ReportConfigError("GRAPH_TENANT_ID (or AZURE_TENANT_ID) is required");
  return {
    tenantId,
    clientId: res.data.GRAPH_CLIENT_ID,
    clientSecret: res.data.GRAPH_CLIENT_SECRET,
    cloud: res.data.MSFT_CLOUD,
  };
}
