import winston from "winston";

const level = process.env.LOG_LEVEL ?? "info";

/** Process-wide structured logger. Call sites pass context as the second argument. */
export const logger = winston.createLogger({
  level,
  format: winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json()),
  defaultMeta: { service: "maestro" },
  transports: [new winston.transports.Console()],
});
