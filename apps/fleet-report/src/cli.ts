import "dotenv/config";
import { Command } from "commander";
import { consoleLogger, describeError } from "@fleetreport/intune-core";
import { registerComplianceCommand } from "./commands/compliance.js";
import { registerInactiveCommand } from "./commands/inactive.js";

function buildProgram() {
  const logger = consoleLogger("fleet-report");
  const program = new Command();
  program
    .name("fleet-report")
    .description("Intune managed device reports over Microsoft Graph")
    .version("0.1.0");

  registerComplianceCommand(program, logger);
  registerInactiveCommand(program, logger);
  return program;
}

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error(`[fleet-report] ${describeError(err)}`);
  process.exitCode = 1;
});
