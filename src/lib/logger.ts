import winston from "winston";

const level = process.env.LOG_LEVEL || "info";

const lineFormat = winston.format.printf(
  ({ timestamp, level, message, label, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${timestamp} | ${level} | ${label} | ${message}${extra}`;
  }
);

/**
 * Create a logger tagged with the module it belongs to.
 */
export function createLogger(label: string): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.label({ label }),
      winston.format.timestamp(),
      winston.format.splat(),
      lineFormat
    ),
    transports: [new winston.transports.Console()],
  });
}

/** Milliseconds since `start`, formatted for log lines. */
export function getTimeTakenSincePoint(start: number): string {
  const elapsed = Date.now() - start;
  return elapsed < 1000 ? `${elapsed}ms` : `${(elapsed / 1000).toFixed(2)}s`;
}
