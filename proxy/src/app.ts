import path from "node:path";
import cors from "cors";
import express, { Express, NextFunction, Request, Response } from "express";
import { HttpError, toErrorMessage } from "./lib/errors";
import { Logger } from "./lib/logger";
import { StorefrontService } from "./lib/service";
import { createDiscoveryRouter } from "./routes/discoveryRoutes";
import { createStorefrontRouter } from "./routes/storefrontRoutes";

export const DEFAULT_PUBLIC_DIR = path.resolve(__dirname, "..", "public");

// Express and body parsers tag their own client errors with a 4xx status.
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) {
    return null;
  }
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

export interface AppOptions {
  service: StorefrontService;
  logger: Logger;
  allowedOrigin: string;
  publicDir?: string;
}

export function createApp(options: AppOptions): Express {
  const { service, allowedOrigin } = options;
  const logger = options.logger.child("server");
  const app = express();
  app.disable("x-powered-by");

  app.use(
    cors({
      origin: [allowedOrigin],
      methods: ["GET"]
    })
  );

  app.use((request: Request, response: Response, next: NextFunction) => {
    const started = Date.now();
    response.on("finish", () => {
      logger.info("http_request", {
        method: request.method,
        path: request.path,
        status_code: response.statusCode,
        duration_ms: Date.now() - started
      });
    });
    next();
  });

  app.use("/", createDiscoveryRouter(options.publicDir ?? DEFAULT_PUBLIC_DIR, options.logger.child("discovery")));
  app.use("/", createStorefrontRouter(service, options.logger.child("routes")));

  app.use((request: Request, response: Response) => {
    response.status(404).json({ detail: `Not Found: ${request.method} ${request.path}` });
  });

  app.use((error: unknown, request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }

    if (error instanceof HttpError) {
      const metadata = { path: request.path, status: error.status, error };
      if (error.status >= 500) {
        logger.error("request_failed", metadata);
      } else {
        logger.warn("request_rejected", metadata);
      }
      response.status(error.status).json({ detail: error.detail });
      return;
    }

    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== null) {
      logger.warn("request_rejected", { path: request.path, status: clientStatus, error });
      response.status(clientStatus).json({ detail: toErrorMessage(error) });
      return;
    }

    logger.error("unhandled_error", { path: request.path, error });
    response.status(500).json({ detail: "Internal Server Error" });
  });

  return app;
}
