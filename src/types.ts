export type CsvRow = Record<string, string>;

export type CsvTable = CsvRow[];

/**
 * The four record sets a load-test run leaves behind. Any of them may be
 * missing, which only means there is no data for the fields derived from it.
 */
export type RawRecordTables = {
  stats?: CsvTable;
  failures?: CsvTable;
  exceptions?: CsvTable;
  history?: CsvTable;
};

export type CompanionFiles = {
  stats?: string;
  failures?: string;
  exceptions?: string;
  history?: string;
};

export type ResultGroup = {
  name: string;
  targetUserCount: number;
  tables: RawRecordTables;
};

export type MetricsRecord = {
  name: string;
  targetUsers: number;
  maxUsersReached: number;
  userAchievementRate: number;
  totalRequests: number;
  requestsPerSec: number;
  avgResponseTime: number;
  medianResponseTime: number;
  minResponseTime: number;
  maxResponseTime: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
  totalFailures: number;
  failureRate: number;
  throughputPerUser: number;
  throughputStdDev: number;
  throughputCV: number;
  latencyStdDev: number;
};

export const DIMENSIONS = [
  "scalability",
  "throughput",
  "latency",
  "reliability",
  "consistency",
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export type Weights = Record<Dimension, number>;

export type Scores = {
  scalabilityScore: number;
  throughputScore: number;
  latencyScore: number;
  reliabilityScore: number;
  consistencyScore: number;
  overallScore: number;
};

export type ScoredRecord = MetricsRecord & Scores;

export type Leaders = {
  scalability: ScoredRecord;
  throughput: ScoredRecord;
  totalRequests: ScoredRecord;
  efficiency: ScoredRecord;
  latency: ScoredRecord;
};

// Set when the best-scaling group is not the one that won on score.
export type Divergence = {
  winner: ScoredRecord;
  scalabilityLeader: ScoredRecord;
  additionalUsersPercent: number;
};

export type ComparisonReport = {
  resultsDir: string;
  weights: Weights;
  ranked: ScoredRecord[];
  winner: ScoredRecord;
  leaders: Leaders;
  // how far the winner leads the runner-up, in percent of the runner-up's score
  scoreGapPercent: number;
  divergence: Divergence | null;
};

export type ComparisonOutcome =
  | { status: "ok"; report: ComparisonReport }
  | { status: "no-results"; resultsDir: string };
