import express, { Application, Request, Response, NextFunction } from "express";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import { createRoutes } from "./routes";
import { PipelineError, RequestValidationError } from "./errors";
import { logger } from "./utils/logger";
import type { PipelineDependencies } from "./types";

export interface AppOptions {
  swaggerDocument?: Record<string, unknown> | null;
  publicDir?: string;
}

interface ErrorBody {
  error: {
    kind: string;
    message: string;
    fields?: Array<{ field: string; message: string }>;
  };
}

function isBodyParserError(err: unknown): err is Error & { type: string; status: number } {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof RequestValidationError) {
    return { status: err.httpStatus, body: { error: { kind: err.kind, message: err.publicMessage(), fields: err.fields } } };
  }
  if (err instanceof PipelineError) {
    return { status: err.httpStatus, body: { error: { kind: err.kind, message: err.publicMessage() } } };
  }
  if (isBodyParserError(err) && err.status < 500) {
    return {
      status: err.status === 413 ? 413 : 400,
      body: { error: { kind: "validation_error", message: err.type === "entity.parse.failed" ? "Request body is not valid JSON." : err.message } }
    };
  }
  return { status: 500, body: { error: { kind: "internal_error", message: "Unexpected server error" } } };
}

export function createApp(deps: PipelineDependencies, options: AppOptions = {}): Application {
  const log = logger.server;
  const app: Application = express();

  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false, limit: "1mb" }));

  if (options.publicDir) {
    app.use(express.static(options.publicDir));
  }

  if (options.swaggerDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(options.swaggerDocument));
  }

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  app.use(createRoutes(deps));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      log.error("Request failed", { path: req.path, status, error: err instanceof Error ? err.message : String(err) });
    } else {
      log.warn("Request rejected", { path: req.path, status, kind: body.error.kind });
    }
    res.status(status).json(body);
  });

  return app;
}
