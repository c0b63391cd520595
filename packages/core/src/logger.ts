/**
 * Winston-based logging shared by the engine packages.
 */

import winston from "winston";
import { loadLoggingConfig } from "./config";

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "HH:mm:ss.SSS" }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const moduleStr = module ? `[${String(module)}]` : "[readiness]";
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} ${level} ${moduleStr} ${String(message)}${metaStr}`;
  })
);

let loggerInstance: winston.Logger | null = null;

const initLogger = (): winston.Logger => {
  const { level, silent } = loadLoggingConfig();
  return winston.createLogger({
    level,
    silent,
    transports: [new winston.transports.Console({ format: consoleFormat, level })],
    exitOnError: false
  });
};

export const getLogger = (): winston.Logger => {
  if (!loggerInstance) {
    loggerInstance = initLogger();
  }
  return loggerInstance;
};

/** Replaces the shared logger, e.g. to route records into a host application's logger. */
export const setLogger = (logger: winston.Logger): void => {
  loggerInstance = logger;
};

export class ModuleLogger {
  constructor(
    private readonly resolve: () => winston.Logger,
    private readonly module: string
  ) {}

  private log(level: string, message: string, meta?: Record<string, unknown>): void {
    this.resolve().log(level, message, { module: this.module, ...meta });
  }

  public debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  public error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  public logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      name: error.name,
      stack: error.stack
    });
  }
}

// Resolved lazily so setLogger also redirects loggers created at import time.
export const createModuleLogger = (moduleName: string): ModuleLogger =>
  new ModuleLogger(getLogger, moduleName);
