/**
 * Submission orchestration: register, fan out to the four analyzers, wait
 * for all of them, merge in category order and report.
 */

import { AnalysisFailedError, AnalyzerFailure, describeError } from "../errors";
import { LoadedConfig } from "../config/loader";
import { CoordinatorConfig, PartialFailurePolicy } from "../config/coordinator";
import { logger } from "../logger";
import { openStore } from "../store";
import { FindingRow, FindingStore, MERGED_FINDING_COLUMNS, MERGED_FINDINGS_TABLE } from "../store/types";
import { Analyzer, AnalyzerOptions, createAnalyzer, toFindingRow } from "./analyzer";
import { Finding } from "./detectors";
import { AnalysisEvent, AnalysisObserver, ExecutionMode, loggingObserver } from "./events";
import { Report, buildReport } from "./report";
import { CATEGORY_ORDER, Category } from "./rules";

export type AnalyzerFactory = (category: Category, store: FindingStore, options: AnalyzerOptions) => Analyzer;

export interface CoordinatorOptions {
  /** Rule configuration handed to every analyzer. */
  ruleConfig?: LoadedConfig;
  /** Receives lifecycle events. Defaults to logging them. */
  observer?: AnalysisObserver;
  /** Opens fork stores by URL. */
  openStore?: (url: string) => FindingStore;
  createAnalyzer?: AnalyzerFactory;
}

/**
 * Outcome of one analyzer invocation. Failures are values here, not
 * exceptions, so the failure policy decides what happens to the rest.
 */
export type AnalyzerOutcome =
  | { category: Category; status: "fulfilled"; findings: Finding[] }
  | { category: Category; status: "rejected"; error: unknown };

/**
 * Forked mode needs isolated stores for at least security and quality.
 */
export function selectExecutionMode(config: CoordinatorConfig): ExecutionMode {
  return config.forks.security && config.forks.quality ? "forked" : "sequential";
}

export class Coordinator {
  readonly mode: ExecutionMode;
  readonly policy: PartialFailurePolicy;

  private readonly observer: AnalysisObserver;
  private readonly openForkStore: (url: string) => FindingStore;
  private readonly analyzerFactory: AnalyzerFactory;
  private readonly ruleConfig?: LoadedConfig;
  private readonly forkStores = new Map<string, FindingStore>();
  private analyzers: Analyzer[] | null = null;

  constructor(
    private readonly config: CoordinatorConfig,
    private readonly primaryStore: FindingStore,
    options: CoordinatorOptions = {}
  ) {
    this.mode = selectExecutionMode(config);
    this.policy = config.partialFailurePolicy;
    this.observer = options.observer ?? loggingObserver;
    this.openForkStore = options.openStore ?? openStore;
    this.analyzerFactory = options.createAnalyzer ?? createAnalyzer;
    this.ruleConfig = options.ruleConfig;
  }

  /**
   * Analyze one file. Resolves with the Report, or rejects with a single
   * error: AnalysisFailedError under all-or-nothing, or the store error if
   * registration or the merge fails.
   */
  async submit(content: string, filename: string): Promise<Report> {
    const analyzers = this.getAnalyzers();
    const submissionId = await this.primaryStore.newSubmissionId(filename, content);
    this.emit({ type: "submission:registered", submissionId, filename, mode: this.mode });

    const outcomes =
      this.mode === "forked"
        ? await Promise.all(analyzers.map((analyzer) => this.settle(analyzer, submissionId, content, filename)))
        : await this.runSequentially(analyzers, submissionId, content, filename);

    const failures: AnalyzerFailure[] = [];
    const findings: Partial<Record<Category, Finding[]>> = {};
    for (const outcome of outcomes) {
      if (outcome.status === "fulfilled") {
        findings[outcome.category] = outcome.findings;
      } else {
        failures.push({ category: outcome.category, error: outcome.error });
      }
    }
    failures.sort((a, b) => CATEGORY_ORDER.indexOf(a.category) - CATEGORY_ORDER.indexOf(b.category));

    if (failures.length > 0 && this.policy === "all-or-nothing") {
      this.emit({ type: "submission:failed", submissionId, categories: failures.map((f) => f.category) });
      throw new AnalysisFailedError(submissionId, failures);
    }

    await this.merge(submissionId, findings);

    const report = buildReport({ submissionId, filename, mode: this.mode, findings, failures });
    this.emit({
      type: "submission:merged",
      submissionId,
      totalIssues: report.totalIssues,
      complete: report.complete,
    });
    return report;
  }

  /**
   * Store each analyzer writes to: its fork in forked mode, otherwise the
   * primary store.
   */
  storeFor(category: Category): FindingStore {
    const url = this.config.forks[category];
    if (!url || !this.usesIsolatedStore(category)) {
      return this.primaryStore;
    }

    let store = this.forkStores.get(url);
    if (!store) {
      store = this.openForkStore(url);
      this.forkStores.set(url, store);
    }
    return store;
  }

  usesIsolatedStore(category: Category): boolean {
    const url = this.config.forks[category];
    return this.mode === "forked" && url !== undefined && url !== this.config.primaryStoreUrl;
  }

  /**
   * Close the fork stores this coordinator opened. The primary store is left
   * to its owner.
   */
  async close(): Promise<void> {
    const stores = [...this.forkStores.values()];
    this.forkStores.clear();
    this.analyzers = null;
    await Promise.all(stores.map((store) => store.close()));
  }

  private getAnalyzers(): Analyzer[] {
    if (!this.analyzers) {
      this.analyzers = CATEGORY_ORDER.map((category) =>
        this.analyzerFactory(category, this.storeFor(category), { config: this.ruleConfig })
      );
    }
    return this.analyzers;
  }

  private async runSequentially(
    analyzers: readonly Analyzer[],
    submissionId: number,
    content: string,
    filename: string
  ): Promise<AnalyzerOutcome[]> {
    const outcomes: AnalyzerOutcome[] = [];
    for (const analyzer of analyzers) {
      const outcome = await this.settle(analyzer, submissionId, content, filename);
      outcomes.push(outcome);
      if (outcome.status === "rejected" && this.policy === "all-or-nothing") {
        break;
      }
    }
    return outcomes;
  }

  /**
   * Run one analyzer (analyze, then persist to its own store) and turn the
   * result into an outcome.
   */
  private async settle(
    analyzer: Analyzer,
    submissionId: number,
    content: string,
    filename: string
  ): Promise<AnalyzerOutcome> {
    const { category } = analyzer;
    const startedAt = Date.now();
    this.emit({ type: "analyzer:start", submissionId, category, store: analyzer.store.label });

    try {
      const findings = analyzer.analyze(content, filename);
      await analyzer.persist(findings, submissionId);
      this.emit({
        type: "analyzer:finish",
        submissionId,
        category,
        findings: findings.length,
        durationMs: Date.now() - startedAt,
      });
      return { category, status: "fulfilled", findings };
    } catch (error) {
      this.emit({ type: "analyzer:error", submissionId, category, error, durationMs: Date.now() - startedAt });
      return { category, status: "rejected", error };
    }
  }

  private async merge(submissionId: number, findings: Partial<Record<Category, Finding[]>>): Promise<void> {
    const rows: FindingRow[] = [];
    for (const category of CATEGORY_ORDER) {
      for (const finding of findings[category] ?? []) {
        rows.push({ ...toFindingRow(finding, submissionId), agent_type: category });
      }
    }

    await this.primaryStore.ensureSchema(MERGED_FINDINGS_TABLE, MERGED_FINDING_COLUMNS);
    if (rows.length > 0) {
      await this.primaryStore.insert(MERGED_FINDINGS_TABLE, rows);
    }
  }

  private emit(event: AnalysisEvent): void {
    try {
      this.observer(event);
    } catch (err) {
      logger.warn("[Coordinator] Observer threw, continuing", { event: event.type, error: describeError(err) });
    }
  }
}
