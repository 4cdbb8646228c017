import pino, { type Logger } from "pino";

import { loadConfig } from "@/config";

export type { Logger } from "pino";

let root: Logger | undefined;

export function getLogger(): Logger {
  if (!root) {
    root = pino({ name: "match-timekeeper", level: loadConfig().logLevel });
  }
  return root;
}

export function createLogger(component: string): Logger {
  return getLogger().child({ component });
}
