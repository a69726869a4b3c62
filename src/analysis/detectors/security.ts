/**
 * Security rule table: hardcoded secrets, injection-shaped query
 * construction and dynamic evaluation.
 */

import {
  CLOUD_CREDENTIALS_PATTERN,
  DYNAMIC_EVAL_PRIMITIVES,
  HARDCODED_API_KEY_PATTERN,
  HARDCODED_PASSWORD_PATTERN,
  HARDCODED_SECRET_PATTERN,
  HARDCODED_TOKEN_PATTERN,
  SQL_CONCAT_PATTERN,
  SQL_CURSOR_PATTERN,
  SQL_FORMAT_PATTERN,
  SQL_FSTRING_PATTERN,
  SQL_TEMPLATE_PATTERN,
} from "../patterns";
import { truncateSnippet } from "../helpers";
import { Rule, RuleHit, SourceFile, lineRule } from "./types";

/**
 * One hit per primitive called on a line, in primitive order.
 */
function detectDynamicEval(file: SourceFile): RuleHit[] {
  const hits: RuleHit[] = [];
  file.lines.forEach((line, index) => {
    for (const { name, pattern } of DYNAMIC_EVAL_PRIMITIVES) {
      if (pattern.test(line)) {
        hits.push({
          line: index + 1,
          snippet: truncateSnippet(line.trim()),
          issue: `Dangerous function: ${name}()`,
          remediation: `Avoid using ${name}() - find safer alternatives`,
        });
      }
    }
  });
  return hits;
}

const SECRET_FIX = "Use environment variables or secret management system";
const INJECTION_FIX = "Use parameterized queries with placeholders";

export const SECURITY_RULES: readonly Rule[] = [
  // Hardcoded secrets
  lineRule({
    id: "HARDCODED_PASSWORD",
    issue: "Hardcoded password",
    severity: "HIGH",
    remediation: SECRET_FIX,
    test: HARDCODED_PASSWORD_PATTERN,
  }),
  lineRule({
    id: "HARDCODED_API_KEY",
    issue: "Hardcoded API key",
    severity: "HIGH",
    remediation: SECRET_FIX,
    test: HARDCODED_API_KEY_PATTERN,
  }),
  lineRule({
    id: "HARDCODED_SECRET",
    issue: "Hardcoded secret",
    severity: "HIGH",
    remediation: SECRET_FIX,
    test: HARDCODED_SECRET_PATTERN,
  }),
  lineRule({
    id: "HARDCODED_TOKEN",
    issue: "Hardcoded token",
    severity: "HIGH",
    remediation: SECRET_FIX,
    test: HARDCODED_TOKEN_PATTERN,
  }),
  lineRule({
    id: "CLOUD_CREDENTIALS",
    issue: "AWS credentials",
    severity: "HIGH",
    remediation: SECRET_FIX,
    test: CLOUD_CREDENTIALS_PATTERN,
  }),

  // Injection-shaped calls
  lineRule({
    id: "SQL_INJECTION_FSTRING",
    issue: "SQL injection via f-string",
    severity: "CRITICAL",
    remediation: INJECTION_FIX,
    test: SQL_FSTRING_PATTERN,
  }),
  lineRule({
    id: "SQL_INJECTION_TEMPLATE",
    issue: "SQL injection via template literal",
    severity: "CRITICAL",
    remediation: INJECTION_FIX,
    test: SQL_TEMPLATE_PATTERN,
  }),
  lineRule({
    id: "SQL_INJECTION_FORMAT",
    issue: "SQL injection via string formatting",
    severity: "CRITICAL",
    remediation: INJECTION_FIX,
    test: SQL_FORMAT_PATTERN,
  }),
  lineRule({
    id: "SQL_INJECTION_CONCAT",
    issue: "SQL injection via concatenation",
    severity: "CRITICAL",
    remediation: INJECTION_FIX,
    test: SQL_CONCAT_PATTERN,
  }),
  lineRule({
    id: "SQL_INJECTION_CURSOR",
    issue: "SQL injection in cursor.execute",
    severity: "CRITICAL",
    remediation: INJECTION_FIX,
    test: SQL_CURSOR_PATTERN,
  }),

  // Dynamic evaluation
  {
    id: "DYNAMIC_EVAL",
    issue: "Dangerous function",
    severity: "HIGH",
    remediation: "Avoid dynamic evaluation - find safer alternatives",
    detect: detectDynamicEval,
  },
];
