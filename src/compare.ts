import { discoverGroups, parseTargetUsers } from "./locator";
import { extractMetrics, loadGroupTables, ratio } from "./metrics";
import { DEFAULT_WEIGHTS, scoreRecords } from "./scoring";
import {
  ComparisonOutcome,
  ComparisonReport,
  Divergence,
  Leaders,
  MetricsRecord,
  ResultGroup,
  ScoredRecord,
  Weights,
} from "./types";

export type ComparisonOptions = {
  weights?: Weights;
  // called once per group, in discovery order, after its tables are loaded
  onGroup?: (group: ResultGroup) => void;
};

/**
 * First record holding the maximum, so ties go to the earliest discovered
 * group.
 */
export const maxBy = <T>(items: T[], pick: (item: T) => number): T => {
  if (items.length === 0) {
    throw new Error("maxBy needs at least one item");
  }

  return items.reduce((best, item) => (pick(item) > pick(best) ? item : best));
};

export const minBy = <T>(items: T[], pick: (item: T) => number): T =>
  maxBy(items, (item) => -pick(item));

export const rank = (records: ScoredRecord[]): ScoredRecord[] =>
  [...records].sort((a, b) => b.overallScore - a.overallScore);

export const findLeaders = (records: ScoredRecord[]): Leaders => ({
  scalability: maxBy(records, (m) => m.userAchievementRate),
  throughput: maxBy(records, (m) => m.requestsPerSec),
  totalRequests: maxBy(records, (m) => m.totalRequests),
  efficiency: maxBy(records, (m) => m.throughputPerUser),
  latency: minBy(records, (m) => m.avgResponseTime),
});

export const scoreGap = (ranked: ScoredRecord[]): number => {
  if (ranked.length < 2) {
    return 0;
  }

  const [first, second] = ranked;
  return ratio(first.overallScore - second.overallScore, second.overallScore) * 100;
};

export const findDivergence = (
  winner: ScoredRecord,
  scalabilityLeader: ScoredRecord
): Divergence | null => {
  if (winner.name === scalabilityLeader.name) {
    return null;
  }

  return {
    winner,
    scalabilityLeader,
    additionalUsersPercent:
      winner.maxUsersReached > 0
        ? (ratio(scalabilityLeader.maxUsersReached, winner.maxUsersReached) - 1) * 100
        : 0,
  };
};

export const buildReport = (
  resultsDir: string,
  metrics: MetricsRecord[],
  weights: Weights = DEFAULT_WEIGHTS
): ComparisonReport => {
  const scored = scoreRecords(metrics, weights);
  const ranked = rank(scored);
  const [winner] = ranked;
  const leaders = findLeaders(scored);

  return {
    resultsDir,
    weights,
    ranked,
    winner,
    leaders,
    scoreGapPercent: scoreGap(ranked),
    divergence: findDivergence(winner, leaders.scalability),
  };
};

export const loadResultGroups = (resultsDir: string): ResultGroup[] => {
  const targetUserCount = parseTargetUsers(resultsDir);

  return discoverGroups(resultsDir).map((name) => ({
    name,
    targetUserCount,
    tables: loadGroupTables(resultsDir, name),
  }));
};

/**
 * Discovers every result group in `resultsDir`, extracts its metrics, scores
 * the whole batch and ranks it. An empty directory is reported as
 * "no-results" rather than thrown.
 */
export const runComparison = (
  resultsDir: string,
  options: ComparisonOptions = {}
): ComparisonOutcome => {
  const groups = loadResultGroups(resultsDir);
  if (groups.length === 0) {
    return { status: "no-results", resultsDir };
  }

  const metrics = groups.map((group) => {
    options.onGroup?.(group);
    return extractMetrics(group.name, group.targetUserCount, group.tables);
  });

  return {
    status: "ok",
    report: buildReport(resultsDir, metrics, options.weights),
  };
};
