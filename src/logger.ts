import pino, { type Logger } from "pino";
import { config } from "./config";

export type { Logger } from "pino";

export const rootLogger: Logger = pino({
  name: "quality-remediation",
  level: config.logLevel
});

export const createLogger = (component: string): Logger => rootLogger.child({ component });

export const toErrorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
