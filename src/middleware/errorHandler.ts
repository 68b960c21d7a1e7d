import { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import type { AppConfig } from "../config/appConfig";
import { AppError, ValidationError } from "../util/errors";

// body-parser marks its errors with `type` and a 4xx `status`
const isMalformedBody = (err: unknown): boolean =>
  typeof err === "object" &&
  err !== null &&
  "type" in err &&
  err.type === "entity.parse.failed";

const hasClientStatus = (err: unknown): err is { status: number; message: string } =>
  typeof err === "object" &&
  err !== null &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 500 &&
  "message" in err &&
  typeof err.message === "string";

export const createErrorHandler = (config: Pick<AppConfig, "nodeEnv">): ErrorRequestHandler => {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    const error = isMalformedBody(err) ? new ValidationError("Malformed JSON body") : err;

    if (error instanceof AppError) {
      res.status(error.statusCode).json({
        success: false,
        code: error.code,
        message: error.message,
        ...(error.field ? { field: error.field } : {}),
      });
      return;
    }

    if (hasClientStatus(error)) {
      res.status(error.status).json({ success: false, code: "VALIDATION_ERROR", message: error.message });
      return;
    }

    console.error(`❌ Error on ${req.method} ${req.originalUrl}:`, error);

    res.status(500).json({
      success: false,
      code: "INTERNAL_ERROR",
      message: "Internal Server Error",
      // Include stack trace only in development mode
      stack: config.nodeEnv === "development" && error instanceof Error ? error.stack : undefined,
    });
  };
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ success: false, code: "NOT_FOUND", message: "Route not found" });
};
