import { randomUUID } from "crypto";
import type { Request, Response, NextFunction } from "express";
import { maskUserId, scrubPII, scrubUnknown } from "@shared/utils";

const SERVICE_NAME = process.env.SERVICE_NAME || "erp-dashboard-api";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerContext {
  requestId?: string;
  userId?: string;
  resource?: string;
  company?: string;
  event?: string;
  context?: Record<string, unknown>;
}

interface LogPayload extends LoggerContext {
  errorMessage?: string | null;
  errorStack?: string | null;
}

export type LogSink = (line: string) => void;

const defaultSink: LogSink = line => {
  console.log(line);
};

export class StructuredLogger {
  constructor(
    private readonly baseContext: LoggerContext = {},
    private readonly sink: LogSink = defaultSink,
  ) {}

  child(context: LoggerContext) {
    return new StructuredLogger({ ...this.baseContext, ...context }, this.sink);
  }

  private emit(level: LogLevel, message: string, context: LoggerContext = {}, error?: unknown) {
    const merged = { ...this.baseContext, ...context } satisfies LoggerContext;
    const cleanedContext = merged.context ? scrubPII(merged.context) : undefined;

    const payload: LogPayload = {
      requestId: merged.requestId,
      userId: merged.userId === undefined ? undefined : maskUserId(merged.userId),
      resource: merged.resource,
      company: merged.company,
      event: merged.event,
      context: cleanedContext,
      errorMessage: null,
      errorStack: null,
    };

    if (error instanceof Error) {
      payload.errorMessage = error.message;
      payload.errorStack = error.stack ?? null;
    } else if (typeof error === "string") {
      payload.errorMessage = error;
    } else if (error) {
      payload.errorMessage = JSON.stringify(error);
    }

    const logLine = {
      timestamp: new Date().toISOString(),
      level,
      service: SERVICE_NAME,
      message,
      ...payload,
    };

    this.sink(JSON.stringify(logLine));
  }

  debug(message: string, context?: LoggerContext) {
    if (process.env.LOG_LEVEL !== "debug") {
      return;
    }
    this.emit("debug", message, context);
  }

  info(message: string, context?: LoggerContext) {
    this.emit("info", message, context);
  }

  warn(message: string, context?: LoggerContext, error?: unknown) {
    this.emit("warn", message, context, error);
  }

  error(message: string, context?: LoggerContext, error?: unknown) {
    this.emit("error", message, context, error);
  }
}

export const logger = new StructuredLogger();

export function createRequestLogger(requestId?: string) {
  return logger.child({ requestId: requestId ?? randomUUID() });
}

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction) {
  const header = req.headers["x-request-id"];
  const incoming = Array.isArray(header) ? header[0] : header;
  const requestId = incoming && incoming.length > 0 ? incoming : randomUUID();
  const requestLogger = createRequestLogger(requestId);

  req.requestId = requestId;
  req.logger = requestLogger;
  res.setHeader("X-Request-Id", requestId);

  const start = process.hrtime.bigint();
  let capturedJsonResponse: unknown;
  const originalJson = res.json;
  res.json = function patchedJson(body: unknown) {
    capturedJsonResponse = body;
    return originalJson.call(res, body);
  } as typeof res.json;

  res.on("finish", () => {
    if (!req.path.startsWith("/api")) {
      return;
    }

    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    // Report tables can be large; only error bodies are worth keeping in the log
    const sanitizedResponse =
      res.statusCode >= 400 && capturedJsonResponse ? scrubUnknown(capturedJsonResponse) : undefined;
    (req.logger ?? requestLogger).info("HTTP request completed", {
      event: "http.response",
      requestId,
      context: {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs,
        response: sanitizedResponse,
      },
    });
  });

  next();
}

export function updateRequestLoggerContext(req: Request, context: LoggerContext) {
  if (req.logger) {
    req.logger = req.logger.child(context);
  } else {
    req.logger = logger.child(context);
  }
}

export function getLogger(req?: Request) {
  return req?.logger ?? logger;
}

export type RequestLogger = StructuredLogger;
