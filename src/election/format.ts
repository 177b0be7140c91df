import type { ElectionSummary } from "../types.js";

const TITLE = "Election Results";
const SEPARATOR = "-".repeat(25);

export function formatElectionReport(summary: ElectionSummary): string[] {
  return [
    TITLE,
    SEPARATOR,
    `Total Votes: ${summary.totalVotes}`,
    SEPARATOR,
    ...summary.candidates.map(
      (candidate) => `${candidate.name}: ${candidate.percentage.toFixed(3)}% (${candidate.votes})`,
    ),
    SEPARATOR,
    `Winner: ${summary.winner ?? "n/a"}`,
    SEPARATOR,
  ];
}
