/**
 * Issue Report
 *
 * Console rendering of the issues a load or a drift check produced
 */

import { type ConfigIssue, ErrorSeverity } from "../core/types.js";
import type { DriftReport } from "../migration/DriftAnalyzer.js";

const RULE = "═".repeat(60);

export function formatIssueReport(title: string, issues: ConfigIssue[]): string[] {
  if (issues.length === 0) {
    return [`✅ ${title}`, "", RULE, "", "✅ No issues found!"];
  }

  const lines = ["", `⚠️  ${title}`, "", RULE];

  const errors = issues.filter((e) => e.severity === ErrorSeverity.ERROR);
  const warnings = issues.filter((e) => e.severity === ErrorSeverity.WARNING);
  const infos = issues.filter((e) => e.severity === ErrorSeverity.INFO);

  const sections: Array<[string, ConfigIssue[]]> = [
    ["❌ Errors:", errors],
    ["⚠️  Warnings:", warnings],
    ["ℹ️  Information:", infos],
  ];
  for (const [heading, group] of sections) {
    if (group.length === 0) continue;
    lines.push("", heading);
    for (const issue of group) {
      lines.push(...formatIssue(issue));
    }
  }

  lines.push(
    "",
    RULE,
    "",
    `📊 Summary: ${errors.length} errors, ${warnings.length} warnings, ${infos.length} info`,
  );
  return lines;
}

export function formatIssue(issue: ConfigIssue): string[] {
  const icon =
    issue.severity === ErrorSeverity.ERROR
      ? "❌"
      : issue.severity === ErrorSeverity.WARNING
        ? "⚠️"
        : "ℹ️";
  const lines = ["", `  ${icon} [${issue.code}] ${issue.message}`];

  if (issue.field) {
    lines.push(`     Field: ${issue.field}`);
  }
  if (issue.file) {
    lines.push(`     File: ${issue.file}`);
  }
  if (issue.suggestion) {
    lines.push(`     💡 ${issue.suggestion}`);
  }
  return lines;
}

export function printIssueReport(
  title: string,
  issues: ConfigIssue[],
  write: (line: string) => void = console.log,
): void {
  for (const line of formatIssueReport(title, issues)) {
    write(line);
  }
}

/**
 * Express a drift report as info issues, one per key
 */
export function driftToIssues(drift: DriftReport, file?: string): ConfigIssue[] {
  const issue = (code: string, message: string): ConfigIssue =>
    file === undefined
      ? { severity: ErrorSeverity.INFO, code, message }
      : { severity: ErrorSeverity.INFO, code, message, file };

  return [
    ...drift.addedKeys.map((key) => issue("KEY_ADDED", `Default adds '${key}'`)),
    ...drift.overriddenKeys.map((key) => issue("KEY_OVERRIDDEN", `'${key}' differs from the default`)),
    ...drift.userKeys.map((key) => issue("KEY_USER_ONLY", `'${key}' is not in the default`)),
  ];
}
