import winston from "winston";

import { config } from "@/config/config";

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
