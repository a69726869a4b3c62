import express, { Express, NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import rateLimit from "express-rate-limit";
import { Coordinator } from "./analysis/orchestration";
import { rebuildReport } from "./analysis/report";
import { CATEGORY_ORDER } from "./analysis/rules";
import { CodesweepError, StoreConnectivityError, describeError } from "./errors";
import { FindingStore } from "./store/types";
import { logger } from "./logger";

// Request timeout (analysis of a large file against remote stores can be slow)
const DEFAULT_TIMEOUT_MS = 30_000;
const ANALYZE_TIMEOUT_MS = 120_000;

// Upper bound on submitted file content
const MAX_BODY_SIZE = "2mb";

export interface AppState {
  isShuttingDown: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function statusForError(error: unknown): number {
  return error instanceof StoreConnectivityError ? 503 : 500;
}

/**
 * Build the HTTP front end. The caller owns `primaryStore` and the
 * coordinator and closes both on shutdown.
 */
export function createApp(
  coordinator: Coordinator,
  primaryStore: FindingStore,
  state: AppState = { isShuttingDown: false }
): Express {
  const app = express();

  // Trust proxy - correct client IP detection for rate limiting behind load balancers
  app.set("trust proxy", 1);

  const generalLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    message: { error: "Too many requests, please try again later" },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === "/health",
  });

  const analyzeLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 30,
    message: { error: "Too many analysis requests" },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(generalLimiter);
  app.use("/api/analyze", analyzeLimiter);

  app.use((_req: Request, res: Response, next: NextFunction) => {
    if (state.isShuttingDown) {
      res.status(503).json({ error: "Server is shutting down" });
      return;
    }
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    const timeout = req.path === "/api/analyze" ? ANALYZE_TIMEOUT_MS : DEFAULT_TIMEOUT_MS;
    res.setTimeout(timeout, () => {
      if (!res.headersSent) {
        res.status(408).json({ error: "Request timeout" });
      }
    });
    next();
  });

  app.use(bodyParser.json({ limit: MAX_BODY_SIZE }));

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      message: "codesweep analysis service is running",
      version: process.env.npm_package_version || "1.0.0",
    });
  });

  app.get("/health", async (_req: Request, res: Response) => {
    const health: {
      status: "healthy" | "unhealthy";
      timestamp: string;
      uptime: number;
      checks: { store: { status: string; label: string; latency?: number } };
    } = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: { store: { status: "connected", label: primaryStore.label } },
    };

    try {
      const start = Date.now();
      await primaryStore.ping();
      health.checks.store.latency = Date.now() - start;
    } catch (err) {
      logger.warn("Health check failed", { store: primaryStore.label, error: describeError(err) });
      health.checks.store.status = "error";
      health.status = "unhealthy";
    }

    res.status(health.status === "unhealthy" ? 503 : 200).json(health);
  });

  app.get("/status", (_req: Request, res: Response) => {
    const forks: Record<string, boolean> = {};
    for (const category of CATEGORY_ORDER) {
      forks[category] = coordinator.usesIsolatedStore(category);
    }
    res.status(200).json({ mode: coordinator.mode, policy: coordinator.policy, forks });
  });

  app.post("/api/analyze", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.filename !== "string" || typeof body.content !== "string") {
      res.status(400).json({
        success: false,
        error: "Body must be JSON with string fields: filename, content",
      });
      return;
    }
    const filename = body.filename;
    const content = body.content;
    if (filename.trim().length === 0) {
      res.status(400).json({ success: false, error: "filename must not be empty" });
      return;
    }

    try {
      logger.info("API analysis requested", { filename, bytes: content.length });
      const report = await coordinator.submit(content, filename);
      res.status(200).json({ success: true, report });
    } catch (error) {
      logger.error("API analysis failed", { filename, error: describeError(error) });
      res.status(statusForError(error)).json({
        success: false,
        error: describeError(error),
        code: error instanceof CodesweepError ? error.code : undefined,
      });
    }
  });

  app.get("/api/submissions/:id/report", async (req: Request, res: Response) => {
    const submissionId = Number(req.params.id);
    if (!Number.isInteger(submissionId) || submissionId <= 0) {
      res.status(400).json({ success: false, error: "id must be a positive integer" });
      return;
    }

    try {
      const report = await rebuildReport(primaryStore, submissionId);
      res.status(200).json({ success: true, report });
    } catch (error) {
      logger.error("Report rebuild failed", { submissionId, error: describeError(error) });
      res.status(statusForError(error)).json({ success: false, error: describeError(error) });
    }
  });

  return app;
}
