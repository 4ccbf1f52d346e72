/**
 * Structured logging for the sync engine.
 * Writes to `debug` namespaces and mirrors every entry into Sentry.
 */

import * as Sentry from "@sentry/node";
import debug from "debug";
import { mapDict } from "./utility.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogExtra = Record<string, unknown>;

/** Call signature shared with `debug` instances */
export type LogFn = (formatter: string, ...args: unknown[]) => void;

export type DebugInstances = Record<LogLevel, LogFn>;

export const LOG_NAMESPACE = "govee-sync";

export class Logger {
  private readonly component: string;
  private readonly loggers: DebugInstances;

  constructor(component: string, loggers: DebugInstances) {
    this.component = component;
    this.loggers = loggers;
  }

  debug(message: string, extra?: LogExtra): void {
    this.log(this.loggers.debug, message, this.withScopeTags(extra));
    this.addBreadcrumb("debug", message, extra);
    Sentry.logger.debug(message, { component: this.component, ...extra });
  }

  info(message: string, extra?: LogExtra): void {
    this.log(this.loggers.info, message, this.withScopeTags(extra));
    this.addBreadcrumb("info", message, extra);
    Sentry.logger.info(message, { component: this.component, ...extra });
  }

  warn(message: string, extra?: LogExtra): void {
    this.log(this.loggers.warn, message, this.withScopeTags(extra));
    this.addBreadcrumb("warning", message, extra);
    Sentry.logger.warn(message, { component: this.component, ...extra });
    Sentry.captureMessage(message, this.captureContext("warning", extra));
  }

  error(message: string, error?: unknown, extra?: LogExtra): void {
    if (error !== undefined) {
      this.loggers.error("%s %O", message, error);
    } else {
      this.log(this.loggers.error, message, this.withScopeTags(extra));
    }

    this.addBreadcrumb("error", message, extra);
    Sentry.logger.error(message, {
      component: this.component,
      ...extra,
      error: error instanceof Error ? error.message : error,
    });

    if (error !== undefined) {
      Sentry.captureException(error, this.captureContext("error", extra));
    } else {
      Sentry.captureMessage(message, this.captureContext("error", extra));
    }
  }

  /**
   * Uses "%s %O" when extra data is present, "%s" otherwise
   */
  private log(logFn: LogFn, message: string, extra: LogExtra): void {
    if (Object.keys(extra).length > 0) {
      logFn("%s %O", message, extra);
    } else {
      logFn("%s", message);
    }
  }

  /**
   * Tags set on the current Sentry scope (e.g. the device a cycle is
   * working on) are appended to the local output as `tag.<name>`.
   */
  private withScopeTags(extra: LogExtra = {}): LogExtra {
    const { tags } = Sentry.getCurrentScope().getScopeData();
    return {
      ...extra,
      ...mapDict(tags, (key, value) => [`tag.${key}`, value]),
    };
  }

  private captureContext = (
    level: Sentry.SeverityLevel,
    extra?: LogExtra
  ): Sentry.CaptureContext => ({
    level,
    tags: { component: this.component },
    ...(extra && Object.keys(extra).length > 0 ? { extra } : {}),
  });

  private addBreadcrumb = (
    level: Sentry.SeverityLevel,
    message: string,
    data: LogExtra | undefined
  ) =>
    Sentry.addBreadcrumb({
      type: level === "debug" || level === "error" ? level : "default",
      level,
      category: this.component,
      message,
      ...(data ? { data } : {}),
    });
}

/**
 * Creates a logger for a component, writing to the debug namespaces
 * `govee-sync:<component>:<level>`.
 */
export const createLogger = (component: string) =>
  new Logger(component, {
    debug: debug(`${LOG_NAMESPACE}:${component}:debug`),
    info: debug(`${LOG_NAMESPACE}:${component}:info`),
    warn: debug(`${LOG_NAMESPACE}:${component}:warn`),
    error: debug(`${LOG_NAMESPACE}:${component}:error`),
  });
