import { Request, Response, NextFunction } from "express";
import { AuthErrors } from "../errors";
import { logger } from "../utils/logger";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";

const BEARER_PREFIX = "Bearer ";

/**
 * Shared API key check. The key comes from the `x-api-key` header or an
 * `Authorization: Bearer <key>` header.
 */
export function requireApiKey(req: Request, res: Response, next: NextFunction): void {
  const apiKey = extractApiKey(req);

  if (!apiKey) {
    logger.warn(LOG_SOURCES.AUTH, LOG_MESSAGES.API_KEY_MISSING, { ip: req.ip, path: req.path });
    next(new AuthErrors.ApiKeyMissingError());
    return;
  }

  const validApiKey = process.env.API_KEY;

  if (!validApiKey) {
    logger.error(LOG_SOURCES.AUTH, LOG_MESSAGES.API_KEY_NOT_CONFIGURED);
    next(new AuthErrors.ApiKeyNotConfiguredError());
    return;
  }

  if (apiKey !== validApiKey) {
    logger.warn(LOG_SOURCES.AUTH, LOG_MESSAGES.API_KEY_INVALID, { ip: req.ip, path: req.path });
    next(new AuthErrors.UnauthorizedError());
    return;
  }

  logger.debug(LOG_SOURCES.AUTH, LOG_MESSAGES.API_KEY_VALID, { path: req.path });
  next();
}

function extractApiKey(req: Request): string | undefined {
  const headerKey = req.header("x-api-key");
  if (headerKey) {
    return headerKey;
  }

  const authHeader = req.header("authorization");
  if (authHeader && authHeader.startsWith(BEARER_PREFIX)) {
    return authHeader.substring(BEARER_PREFIX.length);
  }

  return undefined;
}
