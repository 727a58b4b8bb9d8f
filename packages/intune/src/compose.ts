// packages/intune/src/compose.ts
import { graphResourceFor, makeGraphClient } from "@fleetreport/auth";
import { GraphIntuneSource } from "./clients.graph.js";
import { graphSettingsFromEnv, type GraphSettings, type ReportConfig } from "./config.js";

/** Graph-backed device + compliance source from credentials (defaults to the environment). */
export function createIntuneSourceFromEnv(config: ReportConfig, settings: GraphSettings = graphSettingsFromEnv()) {
  const graph = makeGraphClient(settings);
  return new GraphIntuneSource(graph, {
    graphResource: graphResourceFor(settings.cloud),
    apiVersion: config.graph.apiVersion,
  });
}
