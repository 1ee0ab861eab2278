import type { BatchSummary, DomainResult } from "./analysis/types";

const RULE = "=".repeat(80);

const LABELS = {
  errors: "  ✗ error:",
  recommendations: "  ! recommendation:",
  notifications: "  i notification:",
} as const;

export const renderSummaryLine = (summary: Pick<BatchSummary, "passed" | "total">) =>
  `${summary.passed}/${summary.total} domains passed`;

const describeExpiry = (result: DomainResult) => {
  if (!result.expiresAt) return "Expires: not set";
  return `Expires: ${result.expiresAt}${result.expiryOk ? "" : " (too soon)"}`;
};

export function renderDomain(result: DomainResult): string {
  const lines = [
    RULE,
    `Domain: ${result.domain}`,
    `Valid: ${result.isValid ? "Yes ✓" : "No ✗"}`,
    `Location: ${result.url ?? "not found"}`,
    describeExpiry(result),
    RULE,
  ];

  (Object.keys(LABELS) as Array<keyof typeof LABELS>).forEach((severity) => {
    result[severity].forEach((entry) => lines.push(`${LABELS[severity]} ${entry}`));
  });

  if (!result.errors.length && !result.recommendations.length && !result.notifications.length) {
    lines.push("  No findings.");
  }

  return lines.join("\n");
}

/**
 * Renders the detailed per-domain findings followed by the run summary.
 */
export function renderReport(summary: BatchSummary): string {
  const summaryLines = [
    RULE,
    "SUMMARY",
    RULE,
    `Total domains checked: ${summary.total}`,
    `Valid: ${summary.passed}`,
    `Invalid: ${summary.failed}`,
  ];

  const failing = summary.results.filter((result) => !result.isValid);
  if (failing.length) {
    summaryLines.push("Domains with issues:");
    failing.forEach((result) => summaryLines.push(`  - ${result.domain} (${result.errors.length} error(s))`));
  }

  summaryLines.push(renderSummaryLine(summary));

  return ["DETAILED RESULTS", ...summary.results.map(renderDomain), summaryLines.join("\n")].join("\n\n");
}
