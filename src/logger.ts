import pino from "pino";

/**
 * Creates the process-wide pino logger.
 *
 * - Level labels instead of numbers, ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaults to `info`
 * - Every record carries `service: "newsgate"`
 * - JSON to stdout unless a destination is given
 *
 * @param level - Optional override for the log level
 * @param destination - Optional stream, used by tests to capture output
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: "newsgate" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
