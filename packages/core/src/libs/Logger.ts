import bunyan from "bunyan";

const LOG_LEVELS: readonly bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Read a bunyan level name, case-insensitively. Unknown names fall back. */
export function parseLogLevel(
  value: string | undefined,
  fallback: bunyan.LogLevelString = "info"
): bunyan.LogLevelString {
  const wanted = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? fallback;
}

/**
 * Every process logs under one name; records are told apart by `component`
 * (server, ledger, migrate).
 */
export function createLogger(
  component: string,
  level: bunyan.LogLevelString = parseLogLevel(process.env.LOG_LEVEL)
): bunyan {
  return bunyan.createLogger({
    name: "matchproof",
    component,
    level,
    serializers: bunyan.stdSerializers,
  });
}
