import bunyan from "bunyan";

const LEVELS: bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type Logger = bunyan;

function resolveLevel(level?: string): bunyan.LogLevelString {
  const requested = level ?? process.env.LOG_LEVEL ?? "info";
  return LEVELS.find((l) => l === requested) ?? "info";
}

/**
 * Bunyan logger for a picross component. Level falls back to LOG_LEVEL, then "info".
 */
export function createLogger(name: string, level?: string): Logger {
  return bunyan.createLogger({ name, level: resolveLevel(level) });
}
