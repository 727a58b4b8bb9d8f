export { makeGraphClient, graphResourceFor, type MsftCloud } from "./graph.js";
