import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { API_CONFIG } from "../config";
import { AppError, ErrorCode, ValidationError } from "../errors";
import { logger } from "./requestLogger";

export interface ApiErrorBody {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

function errorBody(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiErrorBody {
  return {
    success: false,
    error: { code, message, ...(details !== undefined && { details }) },
  };
}

function toAppError(err: unknown): AppError | null {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof ZodError) {
    return new ValidationError("Invalid request", {
      issues: err.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  // express.json() marks malformed bodies with a 400 status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    return new ValidationError("Malformed JSON body");
  }
  return exposedClientError(err);
}

function clientErrorCode(status: number): ErrorCode {
  if (status === 400) return "INVALID_INPUT";
  if (status === 404) return "NOT_FOUND";
  if (status === 413) return "PAYLOAD_TOO_LARGE";
  if (status === 415) return "UNSUPPORTED_MEDIA_TYPE";
  return "BAD_REQUEST";
}

/** 4xx errors raised by body-parser and friends, flagged `expose` when safe to show. */
function exposedClientError(err: unknown): AppError | null {
  if (!(err instanceof Error) || !("status" in err) || !("expose" in err)) {
    return null;
  }

  const { status, expose } = err;
  if (typeof status !== "number" || expose !== true || status < 400 || status > 499) {
    return null;
  }

  return new AppError(clientErrorCode(status), status, err.message);
}

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn("404 - Not Found", {
    method: req.method,
    url: req.url,
    ip: req.ip,
  });

  res.status(404).json(
    errorBody("NOT_FOUND", "Endpoint not found", {
      availableVersions: API_CONFIG.supported.map((v) => `/api/${v}`),
    })
  );
};

const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  // check response already sent
  if (res.headersSent) {
    return next(err);
  }

  const appError = toAppError(err);
  if (appError) {
    logger.debug(appError.message, {
      code: appError.code,
      url: req.url,
      method: req.method,
    });
    res.status(appError.status).json(errorBody(appError.code, appError.message, appError.details));
    return;
  }

  logger.error("Unhandled error", {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    url: req.url,
    method: req.method,
  });

  res.status(500).json(errorBody("INTERNAL_ERROR", "Internal server error"));
};

export default errorHandler;
