import type { Logger } from "./types.js";

export function consoleLogger(tag = "intune-report"): Logger {
  return {
    info: (line) => console.log(`[${tag}] ${line}`),
    warn: (line) => console.warn(`[${tag}] ${line}`),
    error: (line) => console.error(`[${tag}] ${line}`),
  };
}
