import { pino, type Logger } from "pino";

export type { Logger };

/**
 * Root logger shared by every sdk component that is not handed one.
 * Level comes from LOG_LEVEL so embedding processes can quiet it.
 */
export const rootLogger: Logger = pino({
  name: "federation",
  level: process.env.LOG_LEVEL ?? "info",
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export function componentLogger(component: string, parent: Logger = rootLogger): Logger {
  return parent.child({ component });
}
