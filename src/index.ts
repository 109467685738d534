export * from "./types";
export { load, loadIfExists } from "./load";
export { discoverGroups, locateCompanions, parseTargetUsers } from "./locator";
export {
  AGGREGATE_ROW_NAME,
  extractMetrics,
  loadGroupTables,
  selectAggregateRow,
} from "./metrics";
export { DEFAULT_WEIGHTS, scoreRecords } from "./scoring";
export {
  applyWeightOverride,
  applyWeightOverrideFile,
  MalformedWeightsError,
  parseWeightOverride,
} from "./weights";
export type { AppliedWeights } from "./weights";
export {
  buildReport,
  findDivergence,
  findLeaders,
  loadResultGroups,
  maxBy,
  minBy,
  rank,
  runComparison,
  scoreGap,
} from "./compare";
export {
  markdownTable,
  recommendations,
  renderMarkdown,
  renderSummary,
  toCsv,
} from "./render";
