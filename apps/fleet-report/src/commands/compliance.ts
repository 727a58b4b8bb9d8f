import { Command, InvalidArgumentError } from "commander";
import {
  createIntuneSourceFromEnv,
  loadReportConfig,
  runComplianceReport,
  type Logger,
  type ReportConfig,
} from "@fleetreport/intune-core";

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

export interface ConfigFlags {
  config?: string;
  filter?: string;
  concurrency?: number;
  days?: number;
}

/** Report config with command-line flags layered over the YAML file, validated together. */
export function loadCommandConfig(flags: ConfigFlags): ReportConfig {
  return loadReportConfig(flags.config, {
    devices: { filter: flags.filter },
    compliance: { concurrency: flags.concurrency },
    inactivity: { days: flags.days },
  });
}

export function registerComplianceCommand(program: Command, logger: Logger) {
  program
    .command("compliance")
    .description("Export per-device compliance setting states as CSV (one column per discovered setting)")
    .requiredOption("-p, --path <file>", "CSV destination")
    .option("-f, --filter <odata>", "OData $filter for managed devices")
    .option("-c, --concurrency <n>", "devices fetched in parallel", parsePositiveInt)
    .option("--config <file>", "report config YAML")
    .action(async (opts: { path: string; filter?: string; concurrency?: number; config?: string }) => {
      const config = loadCommandConfig(opts);
      const source = createIntuneSourceFromEnv(config);
      const report = await runComplianceReport(
        { devices: source, compliance: source, logger },
        { path: opts.path, filter: config.devices.filter, concurrency: config.compliance.concurrency }
      );
      if (report.warnings.length) logger.warn(`${report.warnings.length} device(s) reported fetch warnings`);
    });
}
