import type { ElectionRow, ElectionSummary, PipelineDefinition } from "../types.js";
import { analyzeElection } from "./analyze.js";
import { formatElectionReport } from "./format.js";

export const electionPipeline: PipelineDefinition<ElectionRow, ElectionSummary> = {
  dataset: "election",
  arity: 3,
  toRow: (fields) => [fields[0], fields[1], fields[2]],
  analyze: analyzeElection,
  format: formatElectionReport,
};
