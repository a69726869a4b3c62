/**
 * Configuration schema types for .codesweep.yml files.
 *
 * The file sits in the configured config directory and customizes which
 * rules run and how their findings are graded.
 */

import { RuleConfig, RuleId, RuleOverride } from "../analysis/rules";

/**
 * File filtering configuration options.
 */
export interface CodesweepFilesConfig {
  /**
   * Glob patterns for filenames every analyzer skips.
   * Example: ["vendor/**", "**\/*.min.js"]
   */
  ignore?: string[];
}

/**
 * Complete .codesweep.yml configuration schema.
 */
export interface CodesweepConfig {
  /**
   * Config file version. Currently only version 1 is supported.
   */
  version: number;

  /**
   * Rule-level configuration. Keys are RuleId strings.
   */
  rules?: Partial<Record<RuleId, RuleConfig>>;

  files?: CodesweepFilesConfig;

  /**
   * Path-specific rule overrides.
   * Applied in order; later overrides take precedence.
   */
  overrides?: RuleOverride[];
}

export const SUPPORTED_CONFIG_VERSION = 1;

export const CONFIG_FILE_NAME = ".codesweep.yml";
