import { MetricsRecord } from "./types";

/**
 * Builds a metrics record for tests; ratio fields are derived from the
 * overrides the same way extraction derives them.
 */
export const metricsRecord = (
  name: string,
  overrides: Partial<MetricsRecord> = {}
): MetricsRecord => {
  const base: MetricsRecord = {
    name,
    targetUsers: 1000,
    maxUsersReached: 0,
    userAchievementRate: 0,
    totalRequests: 0,
    requestsPerSec: 0,
    avgResponseTime: 0,
    medianResponseTime: 0,
    minResponseTime: 0,
    maxResponseTime: 0,
    p50: 0,
    p90: 0,
    p95: 0,
    p99: 0,
    totalFailures: 0,
    failureRate: 0,
    throughputPerUser: 0,
    throughputStdDev: 0,
    throughputCV: 0,
    latencyStdDev: 0,
    ...overrides,
  };

  return {
    ...base,
    userAchievementRate:
      overrides.userAchievementRate ??
      (base.targetUsers > 0 ? (base.maxUsersReached / base.targetUsers) * 100 : 0),
    throughputPerUser:
      overrides.throughputPerUser ??
      (base.maxUsersReached > 0 ? base.requestsPerSec / base.maxUsersReached : 0),
  };
};
