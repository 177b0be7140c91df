import { PipelineError } from "../common/errors.js";
import { percentOf } from "../common/math.js";
import { err, ok, type Result } from "../common/result.js";
import { silentLogger } from "../logger.js";
import { normalizeWhitespace } from "../normalize.js";
import type { CandidateTally, ElectionRow, ElectionSummary, LogSink } from "../types.js";

export function analyzeElection(
  rows: readonly ElectionRow[],
  logger: LogSink = silentLogger,
): Result<ElectionSummary, PipelineError> {
  const votesByCandidate = new Map<string, number>();

  for (const [ballotId, , candidate] of rows) {
    if (!normalizeWhitespace(candidate)) {
      return err(new PipelineError("parse", `Ballot "${ballotId}" has no candidate name`));
    }
    votesByCandidate.set(candidate, (votesByCandidate.get(candidate) ?? 0) + 1);
  }

  const totalVotes = rows.length;
  const candidates: CandidateTally[] = [];
  let winner: CandidateTally | undefined;
  // Map iteration follows first appearance, so the earliest candidate keeps a tie.
  for (const [name, votes] of votesByCandidate) {
    const tally = { name, votes, percentage: percentOf(votes, totalVotes) };
    candidates.push(tally);
    if (!winner || votes > winner.votes) {
      winner = tally;
    }
  }
  logger.debug(`Election analysed: votes=${totalVotes} candidates=${candidates.length}`);

  return ok({
    kind: "election",
    totalVotes,
    candidates,
    winner: winner?.name ?? null,
  });
}
