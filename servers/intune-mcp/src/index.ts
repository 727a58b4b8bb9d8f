// servers/intune-mcp/src/index.ts
import "dotenv/config";
import { startMcpHttpServer } from "mcp-http";
import { consoleLogger, createIntuneSourceFromEnv, loadReportConfig } from "@fleetreport/intune-core";
import { makeIntuneTools } from "./tools.js";

const PORT = Number(process.env.PORT ?? 8716);

const logger = consoleLogger("intune-mcp");
const config = loadReportConfig();
const tools = makeIntuneTools({ source: createIntuneSourceFromEnv(config), config, logger });

logger.info(`intune-mcp listening on :${PORT} | graph api=${config.graph.apiVersion}`);
startMcpHttpServer({ name: "intune-mcp", version: "0.1.0", port: PORT, tools, logger: logger.info });
