import { loadIfExists } from "./load";
import { locateCompanions } from "./locator";
import { CsvRow, CsvTable, MetricsRecord, RawRecordTables } from "./types";

export const AGGREGATE_ROW_NAME = "Aggregated";

// Locust writes "N/A" for values it could not compute.
export const toNumber = (cell: string | undefined): number => {
  if (cell === undefined || cell.trim() === "") {
    return 0;
  }

  const value = Number(cell);
  return Number.isFinite(value) ? value : 0;
};

export const ratio = (numerator: number, denominator: number): number =>
  denominator === 0 ? 0 : numerator / denominator;

export const mean = (values: number[]): number =>
  ratio(
    values.reduce((sum, value) => sum + value, 0),
    values.length
  );

/**
 * Sample standard deviation (n - 1 denominator). Fewer than two samples have
 * no spread to measure and yield 0.
 */
export const sampleStdDev = (values: number[]): number => {
  if (values.length < 2) {
    return 0;
  }

  const avg = mean(values);
  const squares = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);

  return Math.sqrt(squares / (values.length - 1));
};

export const loadGroupTables = (
  resultsDir: string,
  group: string
): RawRecordTables => {
  const files = locateCompanions(resultsDir, group);

  return {
    stats: loadIfExists(files.stats),
    failures: loadIfExists(files.failures),
    exceptions: loadIfExists(files.exceptions),
    history: loadIfExists(files.history),
  };
};

/**
 * The last row named "Aggregated" if there is one, otherwise the last row.
 */
export const selectAggregateRow = (stats: CsvTable): CsvRow | undefined => {
  const aggregated = stats.filter((row) => row.Name === AGGREGATE_ROW_NAME);

  return aggregated.length > 0
    ? aggregated[aggregated.length - 1]
    : stats[stats.length - 1];
};

const maxUsers = (history: CsvTable | undefined): number => {
  if (history === undefined || history.length === 0) {
    return 0;
  }
  if (!("User Count" in history[0])) {
    return 0;
  }

  return history.reduce(
    (max, row) => Math.max(max, toNumber(row["User Count"])),
    0
  );
};

type ConsistencyMetrics = Pick<
  MetricsRecord,
  "throughputStdDev" | "throughputCV" | "latencyStdDev"
>;

// Ramp-up and idle samples report zero throughput and are left out.
const consistency = (history: CsvTable | undefined): ConsistencyMetrics => {
  const samples = (history ?? []).filter(
    (row) => toNumber(row["Requests/s"]) > 0
  );
  if (samples.length === 0) {
    return { throughputStdDev: 0, throughputCV: 0, latencyStdDev: 0 };
  }

  const throughput = samples.map((row) => toNumber(row["Requests/s"]));
  const latency = samples.map((row) =>
    toNumber(row["Total Average Response Time"])
  );
  const throughputStdDev = sampleStdDev(throughput);

  return {
    throughputStdDev,
    throughputCV: ratio(throughputStdDev, mean(throughput)),
    latencyStdDev: sampleStdDev(latency),
  };
};

export const extractMetrics = (
  name: string,
  targetUsers: number,
  tables: RawRecordTables
): MetricsRecord => {
  const maxUsersReached = maxUsers(tables.history);
  const row = tables.stats ? selectAggregateRow(tables.stats) : undefined;
  const field = (column: string) => toNumber(row?.[column]);

  const totalRequests = field("Request Count");
  const requestsPerSec = field("Requests/s");
  const totalFailures = field("Failure Count");

  return {
    name,
    targetUsers,
    maxUsersReached,
    userAchievementRate: ratio(maxUsersReached, targetUsers) * 100,
    totalRequests,
    requestsPerSec,
    avgResponseTime: field("Average Response Time"),
    medianResponseTime: field("Median Response Time"),
    minResponseTime: field("Min Response Time"),
    maxResponseTime: field("Max Response Time"),
    p50: field("50%"),
    p90: field("90%"),
    p95: field("95%"),
    p99: field("99%"),
    totalFailures,
    failureRate: ratio(totalFailures, totalRequests) * 100,
    throughputPerUser: ratio(requestsPerSec, maxUsersReached),
    ...consistency(tables.history),
  };
};
