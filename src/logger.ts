import { Logger, type ILogObj } from "tslog";

/**
 * Structured log object with the fields the layout stages attach.
 */
export interface LayoutLogObj extends ILogObj {
  stage?: string;
  count?: number;
  [key: string]: unknown;
}

export type LogMode = "silent" | "error" | "info" | "debug";

const MIN_LEVELS: Record<LogMode, number> = {
  silent: 7,
  error: 5,
  info: 3,
  debug: 2,
};

export type LayoutLogger = Logger<LayoutLogObj>;

/**
 * Create a logger with human-readable pretty output.
 */
export function createLogger(name: string, mode: LogMode = "info"): LayoutLogger {
  return new Logger<LayoutLogObj>({
    name,
    type: mode === "silent" ? "hidden" : "pretty",
    minLevel: MIN_LEVELS[mode],
    hideLogPositionForProduction: true,
  });
}

/**
 * Create a logger with structured JSON output.
 */
export function createJsonLogger(name: string, mode: LogMode = "debug"): LayoutLogger {
  return new Logger<LayoutLogObj>({
    name,
    type: "json",
    minLevel: MIN_LEVELS[mode],
    hideLogPositionForProduction: true,
  });
}
