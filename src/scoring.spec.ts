import { DEFAULT_WEIGHTS, scoreRecords } from "./scoring";
import { metricsRecord } from "./testRecords";
import { MetricsRecord, ScoredRecord } from "./types";

const pg = metricsRecord("pg", {
  maxUsersReached: 1000,
  requestsPerSec: 500,
  avgResponseTime: 50,
  failureRate: 0,
  throughputCV: 0.1,
});

const scylla = metricsRecord("scylla", {
  maxUsersReached: 950,
  requestsPerSec: 800,
  avgResponseTime: 80,
  failureRate: 1,
  throughputCV: 0.2,
});

const byName = (records: ScoredRecord[], name: string): ScoredRecord => {
  const record = records.find((r) => r.name === name);
  if (!record) {
    throw new Error(`no record named ${name}`);
  }
  return record;
};

const SUB_SCORES = [
  "scalabilityScore",
  "throughputScore",
  "latencyScore",
  "reliabilityScore",
  "consistencyScore",
] as const;

describe("two-store comparison", () => {
  const scored = scoreRecords([pg, scylla]);
  const pgScores = byName(scored, "pg");
  const scyllaScores = byName(scored, "scylla");

  it("scores scalability relative to the best achievement rate", () => {
    expect(pgScores.scalabilityScore).toEqual(100);
    expect(scyllaScores.scalabilityScore).toBeCloseTo(95);
  });

  it("scores throughput relative to the fastest store", () => {
    expect(scyllaScores.throughputScore).toEqual(100);
    expect(pgScores.throughputScore).toEqual(62.5);
  });

  it("inverts latency over the observed range", () => {
    expect(pgScores.latencyScore).toEqual(100);
    expect(scyllaScores.latencyScore).toEqual(0);
  });

  it("inverts failure rate against the worst store", () => {
    expect(pgScores.reliabilityScore).toEqual(100);
    expect(scyllaScores.reliabilityScore).toEqual(0);
  });

  it("inverts throughput volatility against the most volatile store", () => {
    expect(pgScores.consistencyScore).toBeCloseTo(50);
    expect(scyllaScores.consistencyScore).toEqual(0);
  });

  it("weights the sub-scores into an overall score", () => {
    // 100*0.35 + 62.5*0.25 + 100*0.2 + 100*0.15 + 50*0.05
    expect(pgScores.overallScore).toBeCloseTo(88.125);
    // 95*0.35 + 100*0.25
    expect(scyllaScores.overallScore).toBeCloseTo(58.25);
  });

  it("reaches the full score when the leader has no volatility either", () => {
    const steady = { ...pg, throughputCV: 0 };
    const [steadyScores] = scoreRecords([steady, scylla]);

    expect(steadyScores.consistencyScore).toEqual(100);
    expect(steadyScores.overallScore).toBeCloseTo(90.625);
  });
});

describe("score properties", () => {
  const records: MetricsRecord[] = [
    pg,
    scylla,
    metricsRecord("mongo", {
      maxUsersReached: 400,
      requestsPerSec: 1200,
      avgResponseTime: 20,
      failureRate: 12,
      throughputCV: 0.7,
    }),
    metricsRecord("broken"),
  ];

  it("keeps every sub-score within 0 and 100", () => {
    for (const record of scoreRecords(records)) {
      for (const key of SUB_SCORES) {
        expect(record[key]).toBeGreaterThanOrEqual(0);
        expect(record[key]).toBeLessThanOrEqual(100);
      }
    }
  });

  it("is a pure function of its input", () => {
    const copy = records.map((r) => ({ ...r }));

    expect(scoreRecords(records)).toEqual(scoreRecords(records));
    expect(records).toEqual(copy);
  });

  it("does not depend on input order", () => {
    const forward = scoreRecords(records);
    const backward = scoreRecords([...records].reverse());

    for (const record of forward) {
      expect(byName(backward, record.name)).toEqual(record);
    }
  });

  it("never lowers a store's scores when its throughput rises", () => {
    const before = byName(scoreRecords(records), "pg");
    const faster = records.map((r) =>
      r.name === "pg" ? { ...r, requestsPerSec: r.requestsPerSec * 3 } : r
    );
    const after = byName(scoreRecords(faster), "pg");

    expect(after.throughputScore).toBeGreaterThanOrEqual(before.throughputScore);
    expect(after.overallScore).toBeGreaterThanOrEqual(before.overallScore);
  });

  it("scores a group without data and keeps it", () => {
    const scored = scoreRecords(records);
    const broken = byName(scored, "broken");

    expect(scored).toHaveLength(4);
    expect(broken.scalabilityScore).toEqual(0);
    expect(broken.throughputScore).toEqual(0);
    expect(Math.min(...scored.map((r) => r.overallScore))).toEqual(
      broken.overallScore
    );
  });

  it("returns nothing for an empty batch", () => {
    expect(scoreRecords([])).toEqual([]);
  });
});

describe("single group", () => {
  it("scores 100 wherever it is its own best peer", () => {
    const [only] = scoreRecords([pg]);

    expect(only.scalabilityScore).toEqual(100);
    expect(only.throughputScore).toEqual(100);
    expect(only.latencyScore).toEqual(100);
    expect(only.reliabilityScore).toEqual(100);
    expect(only.overallScore).toBeCloseTo(95);
  });

  it("still scores reliability 100 when nobody failed", () => {
    const [only] = scoreRecords([metricsRecord("idle")]);

    expect(only.reliabilityScore).toEqual(100);
    expect(only.consistencyScore).toEqual(100);
    expect(only.latencyScore).toEqual(100);
    expect(only.scalabilityScore).toEqual(0);
    expect(only.throughputScore).toEqual(0);
  });
});

describe("weights", () => {
  it("uses whatever weights are configured, without normalizing them", () => {
    const [pgScores] = scoreRecords([pg, scylla], {
      scalability: 1,
      throughput: 1,
      latency: 0,
      reliability: 0,
      consistency: 0,
    });

    expect(pgScores.overallScore).toEqual(162.5);
  });

  it("defaults to the standard weights", () => {
    expect(scoreRecords([pg, scylla])).toEqual(
      scoreRecords([pg, scylla], DEFAULT_WEIGHTS)
    );
  });
});
