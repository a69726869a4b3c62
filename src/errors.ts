/**
 * Error taxonomy for codesweep.
 *
 * Every error the engine raises on purpose extends CodesweepError and carries
 * a stable `code` so HTTP and CLI surfaces can report it without matching on
 * messages.
 */

import type { Category } from "./analysis/rules";

export type CodesweepErrorCode =
  | "CONFIGURATION_ERROR"
  | "STORE_CONNECTIVITY_ERROR"
  | "ANALYZER_LOGIC_ERROR"
  | "ANALYSIS_FAILED";

export class CodesweepError extends Error {
  constructor(
    public readonly code: CodesweepErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CodesweepError";
  }
}

/**
 * Invalid or missing configuration. Fatal at startup, never retried.
 */
export class ConfigurationError extends CodesweepError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
    this.name = "ConfigurationError";
  }
}

/**
 * A store (primary or fork) could not complete an operation.
 */
export class StoreConnectivityError extends CodesweepError {
  constructor(
    public readonly store: string,
    public readonly operation: string,
    cause: unknown
  ) {
    super("STORE_CONNECTIVITY_ERROR", `Store ${store} failed during ${operation}: ${describeError(cause)}`, { cause });
    this.name = "StoreConnectivityError";
  }
}

/**
 * An analyzer could not process its input.
 */
export class AnalyzerLogicError extends CodesweepError {
  constructor(
    public readonly category: Category,
    message: string,
    public readonly ruleId?: string,
    cause?: unknown
  ) {
    super("ANALYZER_LOGIC_ERROR", `[${category}${ruleId ? `:${ruleId}` : ""}] ${message}`, { cause });
    this.name = "AnalyzerLogicError";
  }
}

export interface AnalyzerFailure {
  category: Category;
  error: unknown;
}

/**
 * A submission aborted under the all-or-nothing policy. `cause` is the
 * first failure in category order.
 */
export class AnalysisFailedError extends CodesweepError {
  constructor(
    public readonly submissionId: number,
    public readonly failures: AnalyzerFailure[]
  ) {
    const first = failures[0];
    super(
      "ANALYSIS_FAILED",
      first
        ? `Analysis of submission #${submissionId} failed in ${first.category}: ${describeError(first.error)}`
        : `Analysis of submission #${submissionId} failed`,
      { cause: first?.error }
    );
    this.name = "AnalysisFailedError";
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown";
}
