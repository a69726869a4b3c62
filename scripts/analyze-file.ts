#!/usr/bin/env npx ts-node
/**
 * Analyze one local file and print the report.
 *
 * Usage:
 *   npx ts-node scripts/analyze-file.ts <path>
 *
 * Uses DATABASE_URL and the fork URLs when set, otherwise an in-memory store.
 */

import * as fs from "fs";
import * as path from "path";
import { config } from "../src/env";
import { Coordinator } from "../src/analysis/orchestration";
import { loadConfig } from "../src/config/loader";
import { resolveCoordinatorConfig } from "../src/config/coordinator";
import { CATEGORY_ORDER } from "../src/analysis/rules";
import { openStore } from "../src/store";
import { describeError } from "../src/errors";
import { setLogLevel } from "../src/logger";

async function main(): Promise<number> {
  const target = process.argv[2];
  if (!target) {
    console.error("Usage: analyze-file <path>");
    return 2;
  }

  // Keep store connection logs out of the printed report
  if (!process.env.LOG_LEVEL) {
    setLogLevel("warn");
  }

  const content = fs.readFileSync(target, "utf-8");
  const filename = path.relative(process.cwd(), target);

  const coordinatorConfig = resolveCoordinatorConfig(process.env, "memory://cli");
  const primaryStore = openStore(coordinatorConfig.primaryStoreUrl);
  const coordinator = new Coordinator(coordinatorConfig, primaryStore, {
    ruleConfig: loadConfig(config.CODESWEEP_CONFIG_DIR),
    observer: () => undefined,
  });

  try {
    const report = await coordinator.submit(content, filename);
    console.log(`\nSubmission #${report.submissionId}: ${report.filename} (${report.mode} mode)\n`);

    for (const category of CATEGORY_ORDER) {
      const { count, issues } = report.categories[category];
      console.log(`${category} (${count})`);
      for (const issue of issues) {
        console.log(`  L${issue.line} [${issue.severity}] ${issue.issue}: ${issue.snippet}`);
        console.log(`      fix: ${issue.remediation}`);
      }
    }

    for (const failure of report.failures) {
      console.log(`\n${failure.category} failed: ${failure.message}`);
    }
    console.log(`\nTotal issues: ${report.totalIssues}`);
    return report.complete ? 0 : 1;
  } finally {
    await coordinator.close();
    await primaryStore.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err) => {
    console.error(describeError(err));
    process.exit(1);
  }
);
