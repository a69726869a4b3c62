/**
 * Structured lifecycle events emitted while a submission is analyzed.
 */

import { describeError } from "../errors";
import { logger } from "../logger";
import { Category } from "./rules";

export type ExecutionMode = "forked" | "sequential";

export type AnalysisEvent =
  | { type: "submission:registered"; submissionId: number; filename: string; mode: ExecutionMode }
  | { type: "analyzer:start"; submissionId: number; category: Category; store: string }
  | { type: "analyzer:finish"; submissionId: number; category: Category; findings: number; durationMs: number }
  | { type: "analyzer:error"; submissionId: number; category: Category; error: unknown; durationMs: number }
  | { type: "submission:merged"; submissionId: number; totalIssues: number; complete: boolean }
  | { type: "submission:failed"; submissionId: number; categories: Category[] };

export type AnalysisObserver = (event: AnalysisEvent) => void;

/**
 * Default observer: one log line per event.
 */
export const loggingObserver: AnalysisObserver = (event) => {
  switch (event.type) {
    case "submission:registered":
      logger.info("[Coordinator] Submission registered", {
        submissionId: event.submissionId,
        filename: event.filename,
        mode: event.mode,
      });
      break;
    case "analyzer:start":
      logger.debug("[Coordinator] Analyzer started", {
        submissionId: event.submissionId,
        category: event.category,
        store: event.store,
      });
      break;
    case "analyzer:finish":
      logger.info("[Coordinator] Analyzer finished", {
        submissionId: event.submissionId,
        category: event.category,
        findings: event.findings,
        durationMs: event.durationMs,
      });
      break;
    case "analyzer:error":
      logger.error("[Coordinator] Analyzer failed", {
        submissionId: event.submissionId,
        category: event.category,
        error: describeError(event.error),
        durationMs: event.durationMs,
      });
      break;
    case "submission:merged":
      logger.info("[Coordinator] Submission merged", {
        submissionId: event.submissionId,
        totalIssues: event.totalIssues,
        complete: event.complete,
      });
      break;
    case "submission:failed":
      logger.error("[Coordinator] Submission failed", {
        submissionId: event.submissionId,
        categories: event.categories,
      });
      break;
  }
};
