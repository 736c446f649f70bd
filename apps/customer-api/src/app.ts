import { STATUS_CODES } from "http";
import express, { Express, NextFunction, Request, Response } from "express";
import compression from "compression";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { ErrorBody } from "@customer-service/types";
import { CustomerRepository } from "./customers";
import { BadRequestError, HttpError, MethodNotAllowedError, NotFoundError } from "./errors";
import { logger } from "./logger";
import { createRouter } from "./routes";

export interface AppOptions {
  customers: CustomerRepository;
  rateLimitPerMinute?: number;
}

// body-parser failures (bad JSON, body too large) carry their own 4xx status
const clientErrorStatus = (err: unknown): number | null => {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
};

export const createApp = ({ customers, rateLimitPerMinute = 5_000 }: AppOptions): Express => {
  const app = express();

  app.use(helmet());
  app.use(compression());

  app.use(
    rateLimit({
      windowMs: 60_000,
      max: rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  // Request logger middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info({
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        ms: Date.now() - start,
      });
    });
    next();
  });

  app.use(createRouter(customers));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Cannot ${req.method} ${req.path}`));
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof MethodNotAllowedError) {
      res.set("Allow", err.allowed.join(", "));
      res.status(err.status).json({ error: err.message } satisfies ErrorBody);
      return;
    }

    if (err instanceof HttpError) {
      const body: ErrorBody = { error: err.title, message: err.message };
      if (err instanceof BadRequestError && err.issues) body.issues = err.issues;
      res.status(err.status).json(body);
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== null) {
      const message = err instanceof Error ? err.message : "Bad request";
      res.status(status).json({ error: STATUS_CODES[status] ?? "Bad Request", message } satisfies ErrorBody);
      return;
    }

    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" } satisfies ErrorBody);
  });

  return app;
};
