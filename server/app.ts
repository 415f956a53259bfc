import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server } from "http";
import multer from "multer";
import { ZodError } from "zod";
import { registerRoutes } from "./routes";
import type { Services } from "./services";
import { MonitoringError } from "./lib/errors";
import { log, logError } from "./lib/logger";

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    const issue = err.errors[0];
    return res.status(400).json({
      error: "VALIDATION_ERROR",
      message: issue.message,
      field: issue.path.join("."),
    });
  }
  if (err instanceof MonitoringError) {
    if (err.status >= 500) logError(err.message, "express", err);
    return res.status(err.status).json(err.toJSON());
  }
  if (err instanceof multer.MulterError) {
    return res.status(400).json({ error: "VALIDATION_ERROR", message: err.message, field: err.field });
  }
  if (isBodyParseError(err)) {
    return res.status(400).json({ error: "VALIDATION_ERROR", message: "Malformed JSON body" });
  }

  logError("Unhandled error", "express", err);
  return res.status(500).json({ error: "INTERNAL_ERROR", message: "Internal Server Error" });
}

export async function createApp(services: Services): Promise<{ app: Express; httpServer: Server }> {
  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    res.on("finish", () => {
      if (path === "/health") return;
      const duration = Date.now() - start;
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    });
    next();
  });

  await registerRoutes(httpServer, app, services);
  app.use(errorHandler);

  return { app, httpServer };
}
