/**
 * Configuration loader for codesweep.
 *
 * Loads .codesweep.yml, validates it field by field and resolves the
 * effective rule configuration per filename.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import { logger } from "../logger";
import {
  RequiredRuleConfig,
  RuleConfig,
  RuleId,
  RuleOverride,
  defaultRuleConfig,
  isSeverity,
  isValidRuleId,
} from "../analysis/rules";
import { CONFIG_FILE_NAME, CodesweepConfig, SUPPORTED_CONFIG_VERSION } from "./schema";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The validated configuration (or defaults if no file was found).
   */
  raw: CodesweepConfig;

  /**
   * Check if a file should be skipped by every analyzer.
   */
  isFileIgnored(filename: string): boolean;

  /**
   * Effective rule configuration, merging defaults -> rules -> matching
   * overrides in order.
   */
  getRuleConfig(ruleId: RuleId, filename?: string): RequiredRuleConfig;
}

function defaultRawConfig(): CodesweepConfig {
  return {
    version: SUPPORTED_CONFIG_VERSION,
    rules: {},
    files: { ignore: [] },
    overrides: [],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown, where: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    logger.warn("[Config] Expected a list of globs, ignoring", { where });
    return [];
  }
  return value.filter((entry): entry is string => {
    if (typeof entry !== "string") {
      logger.warn("[Config] Ignoring non-string glob", { where, entry: String(entry) });
      return false;
    }
    return true;
  });
}

function parseRuleConfig(value: unknown, where: string): RuleConfig | null {
  if (!isRecord(value)) {
    logger.warn("[Config] Rule entry must be a mapping, ignoring", { where });
    return null;
  }

  const result: RuleConfig = {};
  if (value.enabled !== undefined) {
    if (typeof value.enabled === "boolean") {
      result.enabled = value.enabled;
    } else {
      logger.warn("[Config] Invalid 'enabled' value, ignoring", { where });
    }
  }
  if (value.severity !== undefined) {
    const severity = typeof value.severity === "string" ? value.severity.toUpperCase() : value.severity;
    if (isSeverity(severity)) {
      result.severity = severity;
    } else {
      logger.warn("[Config] Invalid 'severity' value, ignoring", { where, severity: String(value.severity) });
    }
  }
  return result;
}

function parseRules(value: unknown, where: string): Partial<Record<RuleId, RuleConfig>> {
  const rules: Partial<Record<RuleId, RuleConfig>> = {};
  if (value === undefined || value === null) {
    return rules;
  }
  if (!isRecord(value)) {
    logger.warn("[Config] 'rules' must be a mapping, ignoring", { where });
    return rules;
  }

  for (const [key, entry] of Object.entries(value)) {
    if (!isValidRuleId(key)) {
      logger.warn("[Config] Unknown rule id, ignoring", { where, rule: key });
      continue;
    }
    const parsed = parseRuleConfig(entry, `${where}.${key}`);
    if (parsed) {
      rules[key] = parsed;
    }
  }
  return rules;
}

function parseOverrides(value: unknown): RuleOverride[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    logger.warn("[Config] 'overrides' must be a list, ignoring");
    return [];
  }

  const overrides: RuleOverride[] = [];
  value.forEach((entry: unknown, index: number) => {
    const where = `overrides[${index}]`;
    if (!isRecord(entry)) {
      logger.warn("[Config] Override must be a mapping, ignoring", { where });
      return;
    }
    const patterns = toStringList(entry.patterns, `${where}.patterns`);
    if (patterns.length === 0) {
      logger.warn("[Config] Override has no patterns, ignoring", { where });
      return;
    }
    overrides.push({ patterns, rules: parseRules(entry.rules, `${where}.rules`) });
  });
  return overrides;
}

/**
 * Turn a parsed YAML document into a validated config. Invalid parts are
 * dropped with a warning; the rest is kept.
 */
export function parseConfig(document: unknown): CodesweepConfig {
  if (document === undefined || document === null) {
    return defaultRawConfig();
  }
  if (!isRecord(document)) {
    logger.warn("[Config] Config root must be a mapping, using defaults");
    return defaultRawConfig();
  }

  let version = SUPPORTED_CONFIG_VERSION;
  if (document.version !== undefined) {
    if (document.version === SUPPORTED_CONFIG_VERSION) {
      version = document.version;
    } else {
      logger.warn("[Config] Unsupported config version, reading as version 1", {
        version: String(document.version),
      });
    }
  }

  const files = isRecord(document.files) ? document.files : {};

  return {
    version,
    rules: parseRules(document.rules, "rules"),
    files: { ignore: toStringList(files.ignore, "files.ignore") },
    overrides: parseOverrides(document.overrides),
  };
}

/**
 * Load configuration from a YAML string. Does not touch the filesystem.
 */
export function loadConfigFromString(yamlContent: string): LoadedConfig {
  let rawConfig = defaultRawConfig();

  try {
    rawConfig = parseConfig(yaml.load(yamlContent));
  } catch (err) {
    logger.warn("[Config] Failed to parse YAML, using defaults", {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  return buildLoadedConfig(rawConfig);
}

/**
 * Load configuration from `<configDir>/.codesweep.yml`, or defaults when the
 * file is absent or unreadable.
 */
export function loadConfig(configDir: string): LoadedConfig {
  const configPath = path.join(configDir, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) {
    return createDefaultConfig();
  }

  let contents: string;
  try {
    contents = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    logger.warn(`[Config] Failed to read ${CONFIG_FILE_NAME}, using defaults`, {
      path: configPath,
      error: err instanceof Error ? err.message : String(err),
    });
    return createDefaultConfig();
  }

  logger.debug("[Config] Loaded rule configuration", { path: configPath });
  return loadConfigFromString(contents);
}

/**
 * Defaults only: every rule enabled, nothing ignored.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig(defaultRawConfig());
}

function matchesAnyGlob(filename: string, patterns: readonly string[]): boolean {
  const normalized = filename.replace(/\\/g, "/");
  return patterns.some((pattern) => minimatch(normalized, pattern, { dot: true }));
}

function mergeRuleConfig(base: RequiredRuleConfig, override: RuleConfig): RequiredRuleConfig {
  return {
    enabled: override.enabled ?? base.enabled,
    severity: override.severity ?? base.severity,
  };
}

function buildLoadedConfig(rawConfig: CodesweepConfig): LoadedConfig {
  const ignorePatterns = rawConfig.files?.ignore ?? [];
  const overrides = rawConfig.overrides ?? [];

  function getRuleConfig(ruleId: RuleId, filename?: string): RequiredRuleConfig {
    let result = defaultRuleConfig();

    const globalRuleConfig = rawConfig.rules?.[ruleId];
    if (globalRuleConfig) {
      result = mergeRuleConfig(result, globalRuleConfig);
    }

    if (filename) {
      for (const override of overrides) {
        const overrideRuleConfig = override.rules[ruleId];
        if (overrideRuleConfig && matchesAnyGlob(filename, override.patterns)) {
          result = mergeRuleConfig(result, overrideRuleConfig);
        }
      }
    }

    return result;
  }

  return {
    raw: rawConfig,
    isFileIgnored: (filename) => matchesAnyGlob(filename, ignorePatterns),
    getRuleConfig,
  };
}
