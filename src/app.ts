import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import multer from "multer";
import type { ErrorResponse } from "../shared/schema.js";
import { AppError, FileTooLargeError, ValidationError } from "./errors.js";
import { logger } from "./logger.js";
import { registerRoutes, type RouteDependencies } from "./routes.js";

const MAX_LOG_LINE = 80;

function hasHttpStatus(err: unknown): err is { status: number; message: string } {
  return (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number" &&
    "message" in err &&
    typeof err.message === "string"
  );
}

// Upload limits are reported by multer with its own error type
function fromMulterError(err: unknown): unknown {
  if (!(err instanceof multer.MulterError)) return err;
  if (err.code === "LIMIT_FILE_SIZE") {
    return new FileTooLargeError("File is too large", { cause: err });
  }
  return new ValidationError(err.message, { cause: err });
}

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const err = fromMulterError(error);
  let status = 500;
  let body: ErrorResponse = { message: "Internal Server Error" };

  if (err instanceof AppError) {
    status = err.status;
    body = { message: err.message, error: err.code };
  } else if (hasHttpStatus(err) && err.status >= 400 && err.status < 500) {
    // body-parser rejections such as malformed JSON
    status = err.status;
    body = { message: err.message, error: "VALIDATION_FAILED" };
  }

  if (status >= 500) {
    logger.error(`❌ ${body.message}`, err);
  }
  res.status(status).json(body);
}

export function createApp(deps: RouteDependencies): Express {
  const app = express();

  app.use(cors({
    origin: deps.config.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));

  app.use(express.json({ limit: '5mb' }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = (bodyJson?: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > MAX_LOG_LINE) {
        logLine = logLine.slice(0, MAX_LOG_LINE - 1) + "…";
      }

      logger.info(logLine);
    });

    next();
  });

  registerRoutes(app, deps);

  // Catch-all for undefined routes
  app.use((_req, res) => {
    res.status(404).json({ message: 'Endpoint not found' });
  });

  app.use(errorHandler);

  return app;
}
