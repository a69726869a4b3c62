/**
 * Rule-table-driven analyzers.
 *
 * All four categories share one class: the category picks the rule table,
 * the bound store receives persisted findings and the loaded config filters
 * and re-grades what the rules report.
 */

import { AnalyzerLogicError } from "../errors";
import { LoadedConfig, createDefaultConfig } from "../config/loader";
import { filterSuppressedFindings, parseSuppressionDirectives } from "../config/suppression";
import { FINDING_COLUMNS, FindingRow, FindingStore, findingsTable } from "../store/types";
import { Finding, RULE_TABLES, Rule, createSourceFile, evaluateRules } from "./detectors";
import { Category } from "./rules";

export interface Analyzer {
  readonly category: Category;
  /** Store that `persist` writes to. */
  readonly store: FindingStore;

  /**
   * Pure: the same text and filename always give the same findings, in the
   * same order.
   */
  analyze(text: string, filename: string): Finding[];

  /**
   * Append one row per finding to `<category>_findings`, creating the table
   * if needed. Not idempotent at row level. Resolves to the rows appended.
   */
  persist(findings: readonly Finding[], submissionId: number): Promise<number>;
}

export interface AnalyzerOptions {
  config?: LoadedConfig;
  /** Replaces the category's built-in rule table. */
  rules?: readonly Rule[];
}

export function toFindingRow(finding: Finding, submissionId: number): FindingRow {
  return {
    submission_id: submissionId,
    issue_type: finding.issue,
    line_number: finding.line,
    severity: finding.severity,
    description: finding.snippet,
    suggested_fix: finding.remediation,
  };
}

export class RuleAnalyzer implements Analyzer {
  private readonly rules: readonly Rule[];
  private readonly config: LoadedConfig;

  constructor(
    readonly category: Category,
    readonly store: FindingStore,
    options: AnalyzerOptions = {}
  ) {
    this.rules = options.rules ?? RULE_TABLES[category];
    this.config = options.config ?? createDefaultConfig();
  }

  analyze(text: string, filename: string): Finding[] {
    if (text.includes("\u0000")) {
      throw new AnalyzerLogicError(this.category, `${filename} contains NUL characters and cannot be analyzed as text`);
    }

    if (this.config.isFileIgnored(filename)) {
      return [];
    }

    const file = createSourceFile(text, filename);
    const findings: Finding[] = [];
    for (const finding of evaluateRules(this.category, this.rules, file)) {
      const ruleConfig = this.config.getRuleConfig(finding.kind, filename);
      if (!ruleConfig.enabled) {
        continue;
      }
      findings.push(ruleConfig.severity ? { ...finding, severity: ruleConfig.severity } : finding);
    }

    return filterSuppressedFindings(findings, parseSuppressionDirectives(text));
  }

  async persist(findings: readonly Finding[], submissionId: number): Promise<number> {
    const table = findingsTable(this.category);
    await this.store.ensureSchema(table, FINDING_COLUMNS);
    if (findings.length === 0) {
      return 0;
    }
    return this.store.insert(
      table,
      findings.map((finding) => toFindingRow(finding, submissionId))
    );
  }
}

export function createAnalyzer(category: Category, store: FindingStore, options: AnalyzerOptions = {}): Analyzer {
  return new RuleAnalyzer(category, store, options);
}
