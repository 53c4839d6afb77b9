import { destination, pino, type Logger } from "pino";

const root: Logger = pino(
  {
    name: "labctl",
    level: process.env.LABCTL_LOG_LEVEL ?? "info",
    base: null,
  },
  // stdout carries command output; logs go to stderr.
  destination(2),
);

export type { Logger };

export function createLogger(module: string): Logger {
  return root.child({ module });
}
