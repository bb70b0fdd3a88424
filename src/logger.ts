/**
 * Winston-based logging.
 *
 * The pi TUI owns the terminal, so the extension logs to a file under the agent
 * directory unless `LOG_TO_CONSOLE` is set. Under `NODE_ENV=test` only errors
 * reach the console.
 */

import winston from "winston";
import { LOG_COMPONENT } from "./constants";
import { getLogPath } from "./paths";

export type LogLevel = "error" | "warn" | "info" | "debug";

export type LoggerConfig = {
  level: LogLevel;
  format: "json" | "simple";
  transports: ("console" | "file")[];
  filename: string;
};

function parseLevel(raw: string | undefined): LogLevel {
  return raw === "error" || raw === "warn" || raw === "debug" ? raw : "info";
}

export function getLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const filename = getLogPath();

  if (env.NODE_ENV === "test") {
    return { level: "error", format: "simple", transports: ["console"], filename };
  }

  const transports: LoggerConfig["transports"] = ["file"];
  if (env.LOG_TO_CONSOLE === "1" || env.LOG_TO_CONSOLE === "true") transports.push("console");

  return {
    level: parseLevel(env.LOG_LEVEL),
    format: env.LOG_FORMAT === "json" ? "json" : "simple",
    transports,
    filename,
  };
}

function createFormat(config: LoggerConfig): winston.Logform.Format {
  if (config.format === "json") {
    return winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json());
  }

  return winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
    }),
  );
}

function createTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];
  if (config.transports.includes("console")) {
    transports.push(new winston.transports.Console({ level: config.level }));
  }
  if (config.transports.includes("file")) {
    transports.push(new winston.transports.File({ filename: config.filename, level: config.level }));
  }
  return transports;
}

let loggerInstance: winston.Logger | null = null;

export function initializeLogger(config: LoggerConfig = getLoggerConfig()): winston.Logger {
  loggerInstance = winston.createLogger({
    level: config.level,
    format: createFormat(config),
    transports: createTransports(config),
    exitOnError: false,
  });
  return loggerInstance;
}

export function getLogger(): winston.Logger {
  return loggerInstance ?? initializeLogger();
}

/**
 * Child logger tagged with the extension and component name.
 *
 * @example
 * ```typescript
 * const logger = createComponentLogger("monitor");
 * logger.info("Loop started", { pollIntervalHours: 2 });
 * ```
 */
export function createComponentLogger(component: string, parent: winston.Logger = getLogger()): winston.Logger {
  return parent.child({ component: `${LOG_COMPONENT}:${component}` });
}
