import pino from "pino";

/**
 * Creates the structured JSON logger shared by every pipeline stage.
 *
 * - String level labels and ISO 8601 timestamps
 * - Level from the `level` argument, then `LOG_LEVEL`, then `info`
 * - Writes to stderr unless a destination is given, so preview output on
 *   stdout stays readable
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "daily-brief",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return pino(options, destination ?? pino.destination(2));
}
