import { ratio } from "./metrics";
import {
  Dimension,
  DIMENSIONS,
  MetricsRecord,
  ScoredRecord,
  Scores,
  Weights,
} from "./types";

export const DEFAULT_WEIGHTS: Weights = {
  scalability: 0.35,
  throughput: 0.25,
  latency: 0.2,
  reliability: 0.15,
  consistency: 0.05,
};

// Higher is better: the group with the maximum value scores 100.
export const normalizeAgainstMax = (value: number, max: number): number =>
  ratio(value, max) * 100;

// Lower is better: nobody scoring above 0 means everybody gets 100.
export const invertAgainstMax = (value: number, max: number): number =>
  max > 0 ? (1 - value / max) * 100 : 100;

export const invertAgainstRange = (
  value: number,
  min: number,
  max: number
): number => (max > min ? (1 - (value - min) / (max - min)) * 100 : 100);

/**
 * Scores every group relative to its peers in the same comparison. The result
 * depends on the whole batch, so scores from different comparisons are not
 * comparable.
 */
export const scoreRecords = (
  records: MetricsRecord[],
  weights: Weights = DEFAULT_WEIGHTS
): ScoredRecord[] => {
  if (records.length === 0) {
    return [];
  }

  const maxOf = (pick: (m: MetricsRecord) => number) =>
    Math.max(...records.map(pick));
  const minOf = (pick: (m: MetricsRecord) => number) =>
    Math.min(...records.map(pick));

  const maxScalability = maxOf((m) => m.userAchievementRate);
  const maxThroughput = maxOf((m) => m.requestsPerSec);
  const minLatency = minOf((m) => m.avgResponseTime);
  const maxLatency = maxOf((m) => m.avgResponseTime);
  const maxFailureRate = maxOf((m) => m.failureRate);
  const maxCV = maxOf((m) => m.throughputCV);

  return records.map((metrics) => {
    const dimensionScores: Record<Dimension, number> = {
      scalability: normalizeAgainstMax(metrics.userAchievementRate, maxScalability),
      throughput: normalizeAgainstMax(metrics.requestsPerSec, maxThroughput),
      latency: invertAgainstRange(metrics.avgResponseTime, minLatency, maxLatency),
      reliability: invertAgainstMax(metrics.failureRate, maxFailureRate),
      consistency: invertAgainstMax(metrics.throughputCV, maxCV),
    };

    const scores: Scores = {
      scalabilityScore: dimensionScores.scalability,
      throughputScore: dimensionScores.throughput,
      latencyScore: dimensionScores.latency,
      reliabilityScore: dimensionScores.reliability,
      consistencyScore: dimensionScores.consistency,
      overallScore: DIMENSIONS.reduce(
        (sum, dimension) => sum + dimensionScores[dimension] * weights[dimension],
        0
      ),
    };

    return { ...metrics, ...scores };
  });
};
