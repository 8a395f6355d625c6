import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { BaseAppError, ErrorMeta } from "../errors";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";

const STATUS_BY_AREA: ReadonlyArray<[string, number]> = [
  ["signal/", 400],
  ["validation/", 400],
  ["auth/apiKeyNotConfigured", 500],
  ["auth/", 401],
  ["membership/", 502],
  ["profile/", 503],
  ["llm/", 500],
  ["store/", 500],
  ["config/", 500]
];

/**
 * Global Express error handler. Application errors are recognised by their
 * code prefix, so errors that crossed a module boundary still map correctly.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  const appError = toAppErrorShape(err);

  if (appError) {
    const statusCode = getStatusCodeByCode(appError.code);
    if (statusCode >= 500) {
      logger.error(LOG_SOURCES.SERVER, appError.message, { ...appError.meta, code: appError.code, path: req.path });
    }

    res.status(statusCode).json({
      error: {
        code: appError.code,
        message: appError.message,
        details: appError.meta
      }
    });
    return;
  }

  // Malformed JSON bodies surface from express.json() with a 400 status
  if (isBodyParseError(err)) {
    res.status(400).json({
      error: {
        code: `${BaseAppError.ERROR_PREFIX}validation/invalidJson`,
        message: "Request body is not valid JSON",
        details: {}
      }
    });
    return;
  }

  logger.error(LOG_SOURCES.SERVER, err instanceof Error ? err : LOG_MESSAGES.UNKNOWN_ERROR, {
    path: req.path,
    method: req.method
  });

  if (err instanceof Error) {
    res.status(500).json({
      error: {
        code: "INTERNAL_ERROR",
        message: err.message,
        details: {}
      }
    });
    return;
  }

  res.status(500).json({
    error: {
      code: "UNKNOWN_ERROR",
      message: "An unknown error occurred",
      details: {}
    }
  });
}

function toAppErrorShape(err: unknown): { code: string; message: string; meta: ErrorMeta } | null {
  if (err instanceof BaseAppError) {
    return { code: err.code, message: err.message, meta: err.meta ?? {} };
  }

  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    if (err.code.startsWith(BaseAppError.ERROR_PREFIX)) {
      const message = "message" in err && typeof err.message === "string" ? err.message : "";
      return { code: err.code, message, meta: {} };
    }
  }

  return null;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "status" in err && err.status === 400;
}

/**
 * Maps error codes to HTTP status codes by area prefix.
 */
export function getStatusCodeByCode(errorCode: string): number {
  const area = errorCode.startsWith(BaseAppError.ERROR_PREFIX)
    ? errorCode.substring(BaseAppError.ERROR_PREFIX.length)
    : errorCode;

  for (const [prefix, status] of STATUS_BY_AREA) {
    if (area.startsWith(prefix)) {
      return status;
    }
  }

  return 500;
}
