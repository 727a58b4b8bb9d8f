import { Command } from "commander";
import {
  createIntuneSourceFromEnv,
  runInactiveDevicesReport,
  type Logger,
} from "@fleetreport/intune-core";
import { loadCommandConfig, parsePositiveInt } from "./compliance.js";

export function registerInactiveCommand(program: Command, logger: Logger) {
  program
    .command("inactive")
    .description("Export managed devices that have not synced within N days as CSV")
    .requiredOption("-p, --path <file>", "CSV destination")
    .option("-d, --days <n>", "days without a sync", parsePositiveInt)
    .option("-f, --filter <odata>", "OData $filter for managed devices")
    .option("--config <file>", "report config YAML")
    .action(async (opts: { path: string; days?: number; filter?: string; config?: string }) => {
      const config = loadCommandConfig(opts);
      await runInactiveDevicesReport(
        { devices: createIntuneSourceFromEnv(config), logger },
        { path: opts.path, filter: config.devices.filter, days: config.inactivity.days }
      );
    });
}
