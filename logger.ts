import winston from "winston";

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
    const contextStr = typeof context === "string" ? ` [${context}]` : "";
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} ${level.toUpperCase()}${contextStr} ${String(message)}${metaStr}`;
  }),
);

// stdout fica livre para o relatório do dry-run
export const consoleTransport = new winston.transports.Console({
  format: consoleFormat,
  stderrLevels: Object.keys(winston.config.npm.levels),
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  transports: [consoleTransport],
  exitOnError: false,
});

export function childLogger(context: string): winston.Logger {
  return logger.child({ context });
}

export function setLogLevel(level: string): void {
  logger.level = level;
}
