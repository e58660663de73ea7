import type { DeltaResult } from "@refdelta/core";
import type { DeltaReport } from "@refdelta/delta-engine";

export type DeltaOutputMode = "summary" | "json";

const RANKING_LIMIT = 10;
const AUTHOR_LIMIT = 20;

const describeRepository = (result: DeltaResult): string =>
  result.repository.displayName.length > 0 && result.repository.displayName !== result.repository.path
    ? `${result.repository.displayName} (${result.repository.path})`
    : result.repository.path;

const describeAttention = (result: DeltaResult): string | null => {
  switch (result.outcome) {
    case "error":
      return `${describeRepository(result)}: ${result.error ?? "unknown error"}`;
    case "ref_missing": {
      const missing = [
        ...(result.baseExists ? [] : [`base ${result.baseRef}`]),
        ...(result.targetExists ? [] : [`target ${result.targetRef}`]),
      ];
      return `${describeRepository(result)}: missing ${missing.join(", ")}`;
    }
    default:
      return result.truncated
        ? `${describeRepository(result)}: history truncated, delta is approximate ` +
            "(may include commits shared with base or miss older target commits)"
        : null;
  }
};

const formatSummaryText = (report: DeltaReport): string => {
  const { summary } = report;
  const lines = [
    `delta ${summary.baseRef}..${summary.targetRef} across ${summary.totalRepositories} repositories`,
    `outcomes: ${summary.outcomes.changesFound} with changes, ${summary.outcomes.noChanges} unchanged, ` +
      `${summary.outcomes.refMissing} missing refs, ${summary.outcomes.errored} errors`,
    `commits: ${summary.totalCommits} (read ${summary.totalBaseCommits} base, ${summary.totalTargetCommits} target)`,
    `truncated repositories: ${summary.truncatedRepositories}`,
  ];

  const authors = summary.uniqueAuthors.slice(0, AUTHOR_LIMIT);
  const moreAuthors = summary.uniqueAuthorCount - authors.length;
  lines.push(
    `authors (${summary.uniqueAuthorCount}): ${authors.length === 0 ? "-" : authors.join(", ")}${
      moreAuthors > 0 ? ` and ${moreAuthors} more` : ""
    }`,
  );

  if (summary.ranking.length > 0) {
    lines.push("repositories with changes:");
    for (const entry of summary.ranking.slice(0, RANKING_LIMIT)) {
      lines.push(`  ${entry.commitCount.toString().padStart(5)}  ${entry.repositoryPath}`);
    }
  }

  const attention = report.results
    .map(describeAttention)
    .filter((line): line is string => line !== null);
  if (attention.length > 0) {
    lines.push("needs attention:");
    lines.push(...attention.map((line) => `  ${line}`));
  }

  return lines.join("\n");
};

export const formatDeltaOutput = (report: DeltaReport, mode: DeltaOutputMode): string =>
  mode === "json"
    ? JSON.stringify({ summary: report.summary, results: report.results }, null, 2)
    : formatSummaryText(report);
