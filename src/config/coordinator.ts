/**
 * Coordinator configuration resolved from environment variables.
 */

import { CATEGORY_ORDER, Category } from "../analysis/rules";
import { ConfigurationError } from "../errors";
import { assertSupportedStoreUrl } from "../store";

export type PartialFailurePolicy = "all-or-nothing" | "best-effort";

export const PARTIAL_FAILURE_POLICIES: readonly PartialFailurePolicy[] = ["all-or-nothing", "best-effort"];

export interface CoordinatorConfig {
  /** Store that owns submissions and merged findings. */
  primaryStoreUrl: string;
  /** Isolated store per analyzer, used in forked mode. */
  forks: Partial<Record<Category, string>>;
  partialFailurePolicy: PartialFailurePolicy;
}

export type EnvSource = Record<string, string | undefined>;

const FORK_ENV_VARS: Record<Category, string> = {
  security: "SECURITY_FORK_URL",
  quality: "QUALITY_FORK_URL",
  performance: "PERFORMANCE_FORK_URL",
  best_practices: "BEST_PRACTICES_FORK_URL",
};

function isPartialFailurePolicy(value: string): value is PartialFailurePolicy {
  return PARTIAL_FAILURE_POLICIES.some((policy) => policy === value);
}

function readNonEmpty(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Build and validate the coordinator configuration. Every store URL must
 * name a supported scheme; stores are not opened here.
 *
 * @param fallbackPrimaryUrl - used when DATABASE_URL is unset; without it a
 *   missing DATABASE_URL is a ConfigurationError
 */
export function resolveCoordinatorConfig(env: EnvSource, fallbackPrimaryUrl?: string): CoordinatorConfig {
  const primaryStoreUrl = readNonEmpty(env, "DATABASE_URL") ?? fallbackPrimaryUrl;
  if (!primaryStoreUrl) {
    throw new ConfigurationError("DATABASE_URL is required");
  }
  assertSupportedStoreUrl(primaryStoreUrl);

  const forks: Partial<Record<Category, string>> = {};
  for (const category of CATEGORY_ORDER) {
    const url = readNonEmpty(env, FORK_ENV_VARS[category]);
    if (url) {
      assertSupportedStoreUrl(url);
      forks[category] = url;
    }
  }

  const policy = readNonEmpty(env, "PARTIAL_FAILURE_POLICY") ?? "all-or-nothing";
  if (!isPartialFailurePolicy(policy)) {
    throw new ConfigurationError(
      `PARTIAL_FAILURE_POLICY must be one of ${PARTIAL_FAILURE_POLICIES.join(", ")} (got "${policy}")`
    );
  }

  return { primaryStoreUrl, forks, partialFailurePolicy: policy };
}

