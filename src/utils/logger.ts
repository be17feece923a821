import winston from "winston";

// Reconcile logs carry the PodSet key as `key` metadata via logger.child()
const line = winston.format.printf(({ timestamp, level, message, key }) => {
  const scope = typeof key === "string" ? ` [${key}]` : "";
  return `[${timestamp}] ${level.toUpperCase()}${scope}: ${message}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp({
      format: "HH:mm:ss",
    }),
    line,
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
