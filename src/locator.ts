import fs from "fs";
import path from "path";
import { CompanionFiles } from "./types";

const STATS_SUFFIX = "_stats.csv";

// `{group}_{users}_{duration}_stats.csv`
const STATS_FILE_MATCHER = /^([^_]+)_.+_stats\.csv$/;

const listFiles = (resultsDir: string): string[] => {
  if (!fs.existsSync(resultsDir) || !fs.statSync(resultsDir).isDirectory()) {
    return [];
  }

  return fs
    .readdirSync(resultsDir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
};

/**
 * Lists the distinct result groups in a directory. A group only exists if it
 * has at least one stats file; the other companions are optional.
 */
export const discoverGroups = (resultsDir: string): string[] => {
  const uniq = new Set<string>();

  for (const file of listFiles(resultsDir)) {
    const match = file.match(STATS_FILE_MATCHER);
    if (match) {
      uniq.add(match[1]);
    }
  }

  return Array.from(uniq).sort();
};

export const locateCompanions = (
  resultsDir: string,
  group: string
): CompanionFiles => {
  const statsFile = listFiles(resultsDir).find(
    (file) => file.startsWith(`${group}_`) && STATS_FILE_MATCHER.test(file)
  );
  if (statsFile === undefined) {
    return {};
  }

  const base = path.join(
    resultsDir,
    statsFile.slice(0, -STATS_SUFFIX.length)
  );
  const existing = (file: string) => (fs.existsSync(file) ? file : undefined);

  return {
    stats: existing(`${base}_stats.csv`),
    failures: existing(`${base}_failures.csv`),
    exceptions: existing(`${base}_exceptions.csv`),
    history: existing(`${base}_stats_history.csv`),
  };
};

/**
 * Target concurrency is encoded as the leading token of the results
 * directory's name, e.g. `100000_1m` targets 100000 users.
 */
export const parseTargetUsers = (resultsDir: string): number => {
  const [prefix] = path.basename(path.resolve(resultsDir)).split("_");
  if (!/^\d+$/.test(prefix)) {
    return 0;
  }

  return parseInt(prefix, 10);
};
