import { stringify } from "csv-stringify/sync";
import { bannerSection, createBanner } from "./bannerUtils";
import { ComparisonReport, DIMENSIONS, ScoredRecord } from "./types";

const count = (value: number) => value.toLocaleString("en-US");
const fixed = (value: number, digits: number) => value.toFixed(digits);

/**
 * Links a group name to the CI run that produced the results, when known.
 */
export const groupLabel = (name: string): string => {
  if (process.env.RUN_URL) {
    return `[${name}](${process.env.RUN_URL})`;
  }

  return name;
};

/**
 * Renders rows as a markdown table, padding every column to its widest cell
 * so the source stays readable. The first row is the header.
 */
export const markdownTable = (table: string[][]): string => {
  const [header, ...rows] = table;
  const widths = header.map((_, column) =>
    table.reduce((width, row) => Math.max(width, (row[column] ?? "").length), 3)
  );
  const line = (cells: string[]) =>
    `| ${cells.map((cell, column) => cell.padEnd(widths[column])).join(" | ")} |`;

  return [line(header), line(widths.map((w) => "-".repeat(w))), ...rows.map(line)].join("\n");
};

const rankingLines = (record: ScoredRecord, position: number): string[] => [
  `${position}. ${record.name.toUpperCase()}: ${fixed(record.overallScore, 1)}/100`,
  `   Scalability: ${fixed(record.userAchievementRate, 1)}% (${count(record.maxUsersReached)} of ${count(record.targetUsers)} users)`,
  `   Throughput: ${fixed(record.requestsPerSec, 1)} req/s`,
  `   Avg Latency: ${fixed(record.avgResponseTime, 2)}ms`,
  `   Failure Rate: ${fixed(record.failureRate, 2)}%`,
  "",
];

/**
 * Plain-text summary for the terminal: the ranking, the leaders on each raw
 * metric, and whether the score winner also scaled best.
 */
export const renderSummary = (report: ComparisonReport): string[] => {
  const { ranked, winner, leaders, divergence, scoreGapPercent } = report;
  const lines: string[] = [createBanner("PERFORMANCE COMPARISON RESULTS")];

  ranked.forEach((record, i) => lines.push(...rankingLines(record, i + 1)));
  lines.push(
    `SCORE WINNER: ${winner.name.toUpperCase()} with ${fixed(winner.overallScore, 1)}/100`
  );
  if (ranked.length > 1) {
    lines.push(
      `Score gap: ${winner.name.toUpperCase()} leads by ${fixed(scoreGapPercent, 1)}% in weighted score`
    );
  }
  lines.push("");

  lines.push(
    ...bannerSection("SCALABILITY ANALYSIS", [
      `Most Users Handled: ${leaders.scalability.name.toUpperCase()} (${count(leaders.scalability.maxUsersReached)} users - ${fixed(leaders.scalability.userAchievementRate, 1)}%)`,
      `Highest Throughput: ${leaders.throughput.name.toUpperCase()} (${fixed(leaders.throughput.requestsPerSec, 1)} req/s)`,
      `Most Total Work: ${leaders.totalRequests.name.toUpperCase()} (${count(leaders.totalRequests.totalRequests)} requests)`,
      `Best Efficiency: ${leaders.efficiency.name.toUpperCase()} (${fixed(leaders.efficiency.throughputPerUser, 2)} req/s per user)`,
      `Lowest Latency: ${leaders.latency.name.toUpperCase()} (${fixed(leaders.latency.avgResponseTime, 2)}ms average)`,
    ])
  );

  if (divergence) {
    const leader = divergence.scalabilityLeader.name.toUpperCase();
    lines.push(
      "",
      "IMPORTANT CONTEXT:",
      `   ${divergence.winner.name.toUpperCase()} won by SCORE but only handled ${fixed(divergence.winner.userAchievementRate, 1)}% of target users`,
      `   ${leader} handled ${fixed(divergence.additionalUsersPercent, 0)}% MORE USERS in practice`,
      `   ${leader} shows better REAL-WORLD SCALABILITY`
    );
  } else {
    lines.push("", `${winner.name.toUpperCase()} dominated both in score AND scalability`);
  }

  return lines;
};

export const scoreTable = (ranked: ScoredRecord[]): string[][] => [
  ["#", "Group", "Overall", "Scalability", "Throughput", "Latency", "Reliability", "Consistency"],
  ...ranked.map((r, i) => [
    String(i + 1),
    groupLabel(r.name),
    fixed(r.overallScore, 1),
    fixed(r.scalabilityScore, 1),
    fixed(r.throughputScore, 1),
    fixed(r.latencyScore, 1),
    fixed(r.reliabilityScore, 1),
    fixed(r.consistencyScore, 1),
  ]),
];

export const metricsTable = (ranked: ScoredRecord[]): string[][] => [
  ["Group", "Users", "Achievement", "Req/s", "Avg (ms)", "p50", "p90", "p95", "p99", "Failure rate"],
  ...ranked.map((r) => [
    groupLabel(r.name),
    `${count(r.maxUsersReached)} / ${count(r.targetUsers)}`,
    `${fixed(r.userAchievementRate, 1)}%`,
    fixed(r.requestsPerSec, 1),
    fixed(r.avgResponseTime, 2),
    count(r.p50),
    count(r.p90),
    count(r.p95),
    count(r.p99),
    `${fixed(r.failureRate, 2)}%`,
  ]),
];

// What to pick for which workload; the advice splits when the score winner
// did not also scale best.
export const recommendations = (report: ComparisonReport): string[] => {
  const { winner, leaders, divergence } = report;
  const lowLatency = `- Low-latency applications: **${leaders.latency.name}** (${fixed(leaders.latency.avgResponseTime, 2)}ms average latency)`;

  if (divergence === null) {
    return [
      `- Clear winner: **${winner.name}** led on both weighted score and scalability`,
      lowLatency,
    ];
  }

  const { scalabilityLeader } = divergence;
  return [
    `- High-scale production: **${scalabilityLeader.name}** reached ${fixed(scalabilityLeader.userAchievementRate, 1)}% of target users vs ${fixed(winner.userAchievementRate, 1)}% for ${winner.name}`,
    lowLatency,
  ];
};

export const renderMarkdown = (report: ComparisonReport): string => {
  const { leaders, weights, winner } = report;
  const weightList = DIMENSIONS.map(
    (dimension) => `- ${dimension}: ${fixed(weights[dimension] * 100, 1)}%`
  );
  const scoreGap =
    report.ranked.length > 1
      ? [`- Score gap: ${winner.name} leads by ${fixed(report.scoreGapPercent, 1)}% in weighted score`]
      : [];

  return [
    `# Performance comparison: ${report.resultsDir}`,
    "",
    `Score winner: **${winner.name}** (${fixed(winner.overallScore, 1)}/100)`,
    "",
    "## Scores",
    markdownTable(scoreTable(report.ranked)),
    "",
    "## Metrics",
    markdownTable(metricsTable(report.ranked)),
    "",
    "## Leaders",
    `- Most users handled: ${leaders.scalability.name}`,
    `- Highest throughput: ${leaders.throughput.name}`,
    `- Most total work: ${leaders.totalRequests.name}`,
    `- Best efficiency: ${leaders.efficiency.name}`,
    `- Lowest latency: ${leaders.latency.name}`,
    ...scoreGap,
    "",
    "## Recommendations",
    ...recommendations(report),
    "",
    "## Weights",
    ...weightList,
    "",
  ].join("\n");
};

export const CSV_COLUMNS = [
  "name",
  "overallScore",
  "scalabilityScore",
  "throughputScore",
  "latencyScore",
  "reliabilityScore",
  "consistencyScore",
  "targetUsers",
  "maxUsersReached",
  "userAchievementRate",
  "totalRequests",
  "requestsPerSec",
  "avgResponseTime",
  "medianResponseTime",
  "minResponseTime",
  "maxResponseTime",
  "p50",
  "p90",
  "p95",
  "p99",
  "totalFailures",
  "failureRate",
  "throughputPerUser",
  "throughputStdDev",
  "throughputCV",
  "latencyStdDev",
] as const satisfies ReadonlyArray<keyof ScoredRecord>;

export const toCsv = (report: ComparisonReport): string =>
  stringify([
    ["rank", ...CSV_COLUMNS],
    ...report.ranked.map((record, i) => [
      i + 1,
      ...CSV_COLUMNS.map((column) => record[column]),
    ]),
  ]);
