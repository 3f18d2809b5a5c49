// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API for every service, backed by one pino root.
 * - Contextual .bind(ctx) returns a child handle; contexts accumulate.
 * - Overloaded methods:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *
 * Runtime Controls:
 * - LOG_LEVEL = debug | info | warn | error | silent   [default: info]
 *   (initLogger({ level }) wins over the env.)
 *
 * Notes:
 * - The root is created lazily so modules can bind at import time; call
 *   initLogger() once at boot to stamp the service name on every line.
 */

import pino, { type Logger as PinoLogger, type LevelWithSilent } from "pino";

type Json = Record<string, unknown>;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/** Public interface for bound logger handles. */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  debug(msg: string): void;
  debug(obj: Json, msg?: string): void;

  info(msg: string): void;
  info(obj: Json, msg?: string): void;

  warn(msg: string): void;
  warn(obj: Json, msg?: string): void;

  error(msg: string): void;
  error(obj: Json, msg?: string): void;

  serializeError(err: unknown): { name?: string; message: string; stack?: string };
}

let ROOT: PinoLogger | null = null;

export function parseLogLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? "").toLowerCase().trim();
  const hit = LEVELS.find((l) => l === v);
  return hit ?? "info";
}

/** Create (or replace) the root logger. Returns the underlying pino instance. */
export function initLogger(opts: { service: string; level?: LogLevel }): PinoLogger {
  const level: LevelWithSilent = opts.level ?? parseLogLevel(process.env.LOG_LEVEL);
  ROOT = pino({
    level,
    base: { service: opts.service },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return ROOT;
}

/** Root pino instance; pino-http and anything pino-native hang off this. */
export function getRootLogger(): PinoLogger {
  if (!ROOT) {
    ROOT = pino({
      level: parseLogLevel(process.env.LOG_LEVEL),
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }
  return ROOT;
}

export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(initialCtx);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

class BoundLogger implements IBoundLogger {
  #child: PinoLogger | null = null;

  constructor(private readonly ctx: Json) {}

  // Resolved on first write so a later initLogger() still applies.
  private target(): PinoLogger {
    if (!this.#child) this.#child = getRootLogger().child(this.ctx);
    return this.#child;
  }

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  public debug(arg: Json | string, msg?: string): void {
    const t = this.target();
    if (typeof arg === "string") t.debug(arg);
    else t.debug(arg, msg);
  }

  public info(arg: Json | string, msg?: string): void {
    const t = this.target();
    if (typeof arg === "string") t.info(arg);
    else t.info(arg, msg);
  }

  public warn(arg: Json | string, msg?: string): void {
    const t = this.target();
    if (typeof arg === "string") t.warn(arg);
    else t.warn(arg, msg);
  }

  public error(arg: Json | string, msg?: string): void {
    const t = this.target();
    if (typeof arg === "string") t.error(arg);
    else t.error(arg, msg);
  }

  public serializeError(err: unknown): { name?: string; message: string; stack?: string } {
    if (err instanceof Error) {
      return { name: err.name, message: err.message, stack: err.stack };
    }
    return { message: String(err) };
  }
}
