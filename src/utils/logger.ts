import winston, { Logger, format } from "winston";
import path from "path";
import fs from "fs";
import DailyRotateFile from "winston-daily-rotate-file";

import type { DecodedValue, DynamicValue } from "../types/remittance.types";
import { redactFields, sanitizeHeaders } from "./redaction";

/**
 * Logger Configuration Interface
 */
interface LoggerConfig {
  logDir: string;
  logLevel: string;
  appName: string;
  environment: string;
  maxSize: number;
  maxFiles: number;
  enableConsole: boolean;
  enableFile: boolean;
  silent: boolean;
}

/**
 * Ensure log directory exists
 */
const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Custom filter to match specific log level only
 */
const createLevelFilter = (targetLevel: string) => {
  return format((info) => {
    return info.level === targetLevel ? info : false;
  })();
};

/**
 * Get default configuration with environment overrides
 */
const getConfig = (): LoggerConfig => ({
  logDir: process.env.LOG_FILE_PATH || "./logs",
  logLevel: process.env.LOG_LEVEL || "info",
  appName: process.env.APP_NAME || "remit-soap-client",
  environment: process.env.NODE_ENV || "development",
  maxSize: parseInt(process.env.LOG_MAX_SIZE || "5242880", 10), // 5MB
  maxFiles: parseInt(process.env.LOG_MAX_FILES || "5", 10),
  enableConsole: true,
  // file transports are opt-in
  enableFile: process.env.LOG_FILE === "true",
  silent: process.env.LOG_SILENT === "true",
});

/**
 * Custom format for console output with better readability
 */
const getConsoleFormat = () => {
  return format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.colorize({ all: true }),
    format.printf(({ timestamp, level, message, service, ...meta }) => {
      const metaStr = Object.keys(meta).length
        ? `\n${JSON.stringify(meta, null, 2)}`
        : "";
      return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
    }),
  );
};

/**
 * Custom format for file output with detailed context
 */
const getFileFormat = () => {
  return format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.errors({ stack: true }),
    format.splat(),
    format.metadata({
      fillExcept: ["message", "level", "timestamp", "service"],
    }),
    format.json(),
  );
};

/**
 * Create Winston Logger instance
 */
const createLogger = (customConfig?: Partial<LoggerConfig>): Logger => {
  const config = { ...getConfig(), ...customConfig };

  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        level: config.logLevel,
        format:
          config.environment === "production"
            ? format.combine(format.timestamp(), format.json())
            : getConsoleFormat(),
      }),
    );
  }

  if (config.enableFile) {
    ensureLogDir(config.logDir);

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, "combined-%DATE%.log"),
        datePattern: "YYYY-MM-DD",
        level: "info",
        format: getFileFormat(),
        maxSize: config.maxSize,
        maxFiles: `${config.maxFiles}d`,
        auditFile: path.join(config.logDir, ".combined-audit.json"),
        zippedArchive: false,
      }),
      new DailyRotateFile({
        filename: path.join(config.logDir, "error-%DATE%.log"),
        datePattern: "YYYY-MM-DD",
        level: "error",
        format: getFileFormat(),
        maxSize: config.maxSize,
        maxFiles: `${config.maxFiles}d`,
        auditFile: path.join(config.logDir, ".error-audit.json"),
        zippedArchive: false,
      }),
    );

    // Debug log (development only)
    if (config.environment !== "production") {
      transports.push(
        new DailyRotateFile({
          filename: path.join(config.logDir, "debug-%DATE%.log"),
          datePattern: "YYYY-MM-DD",
          format: format.combine(createLevelFilter("debug"), getFileFormat()),
          maxSize: config.maxSize,
          maxFiles: `${config.maxFiles}d`,
          auditFile: path.join(config.logDir, ".debug-audit.json"),
          zippedArchive: false,
        }),
      );
    }
  }

  return winston.createLogger({
    level: config.logLevel,
    silent: config.silent,
    format: getFileFormat(),
    defaultMeta: {
      service: config.appName,
      environment: config.environment,
    },
    transports,
  });
};

/**
 * Utility logging methods. Headers and payload fields pass through
 * redaction before they reach a transport.
 */
const loggerUtils = {
  logRequest: (
    logger: Logger,
    method: string,
    url: string,
    statusCode: number,
    duration: number,
    headers: Record<string, string> = {},
  ) => {
    logger.info("HTTP Request", {
      method,
      url,
      statusCode,
      duration: `${duration}ms`,
      headers: sanitizeHeaders(headers),
    });
  },

  logError: (
    logger: Logger,
    error: Error,
    context?: Record<string, unknown>,
  ) => {
    logger.error("Error occurred", {
      error: error.message,
      name: error.name,
      stack: error.stack,
      ...context,
    });
  },

  logPayload: (
    logger: Logger,
    label: string,
    payload: DynamicValue | DecodedValue,
  ) => {
    if (!logger.isDebugEnabled()) return;
    logger.debug(label, { payload: redactFields(payload) });
  },
};

const logger = createLogger();

export default logger;
export { createLogger, loggerUtils };
export type { LoggerConfig, Logger };
