import { Request, Response, NextFunction } from "express";
import { AppError } from "../../../shared/errors/AppError";
import { HttpError } from "../../../shared/errors/HttpError";
import {
  ValidationError,
  EntityNotFoundError,
} from "../../../shared/errors/DomainError";
import { container } from "../../../di/Container";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IConfig } from "../../../shared/config/IConfig";
import { TYPES } from "../../../di/types";

const CLIENT_ERROR_CODES: ReadonlyMap<number, string> = new Map([
  [413, "PAYLOAD_TOO_LARGE"],
  [415, "UNSUPPORTED_MEDIA_TYPE"],
]);

/**
 * Status of a 4xx error raised by express or body-parser with `expose`
 * set, or null for anything else.
 */
function exposedClientStatus(err: Error): number | null {
  if (!("expose" in err) || err.expose !== true) {
    return null;
  }
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : null;
  if (typeof status !== "number" || status < 400 || status >= 500) {
    return null;
  }
  return status;
}

/**
 * Centralized Error Handler Middleware
 *
 * Maps domain errors to HTTP errors and sends appropriate responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const logger = container.resolve<ILogger>(TYPES.Logger);
  const isProduction =
    container.resolve<IConfig>(TYPES.Config).nodeEnv === "production";

  const context = { path: req.path, method: req.method };
  const clientStatus = exposedClientStatus(err);
  if (err instanceof AppError && err.isOperational) {
    logger.warn("Request failed", { ...context, error: err.toJSON() });
  } else if (clientStatus !== null) {
    logger.warn("Request rejected", {
      ...context,
      error: { name: err.name, message: err.message, status: clientStatus },
    });
  } else {
    logger.error("Error handler caught error", err, context);
  }

  if (err instanceof HttpError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Map domain errors to HTTP errors
  if (err instanceof ValidationError) {
    res.status(400).json({
      error: err.message,
      code: err.code,
      field: err.field,
    });
    return;
  }

  if (err instanceof EntityNotFoundError) {
    res.status(404).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Malformed JSON from express.json()
  if (err instanceof SyntaxError && "body" in err) {
    res.status(400).json({
      error: "Malformed JSON body",
      code: "BAD_REQUEST",
    });
    return;
  }

  // Other client errors from express.json(): oversized body, bad charset
  if (clientStatus !== null) {
    res.status(clientStatus).json({
      error: err.message,
      code: CLIENT_ERROR_CODES.get(clientStatus) ?? "BAD_REQUEST",
    });
    return;
  }

  if (err instanceof AppError) {
    res.status(500).json({
      error: isProduction ? "Internal server error" : err.message,
      code: err.code,
    });
    return;
  }

  // Unknown error
  res.status(500).json({
    error: isProduction ? "Internal server error" : err.message,
    code: "INTERNAL_ERROR",
    ...(!isProduction && { stack: err.stack }),
  });
}
