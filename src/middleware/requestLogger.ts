import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { config, LogLevel } from "../config";

type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function write(level: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.logLevel]) {
    return;
  }

  const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
  const args: unknown[] = meta ? [line, meta] : [line];

  if (level === "error") console.error(...args);
  else if (level === "warn") console.warn(...args);
  else console.log(...args);
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => write("debug", message, meta),
  info: (message: string, meta?: LogMeta) => write("info", message, meta),
  warn: (message: string, meta?: LogMeta) => write("warn", message, meta),
  error: (message: string, meta?: LogMeta) => write("error", message, meta),
};

export const REQUEST_ID_HEADER = "x-request-id";

export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const requestId = req.header(REQUEST_ID_HEADER) || uuidv4();
  const startedAt = Date.now();

  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on("finish", () => {
    logger.info(`${req.method} ${req.path}`, {
      requestId,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    });
  });

  next();
};
