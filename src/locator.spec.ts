import fs from "fs";
import os from "os";
import path from "path";
import { discoverGroups, locateCompanions, parseTargetUsers } from "./locator";

const FIXTURES = path.join(__dirname, "fixtures");

describe("group discovery", () => {
  it("finds every group with a stats file, sorted", () => {
    expect(discoverGroups(path.join(FIXTURES, "1000_1m"))).toEqual([
      "pg",
      "scylla",
    ]);
  });

  it("ignores files that are not stats files or have too few segments", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "locator-"));
    fs.writeFileSync(path.join(dir, "pg_stats.csv"), "");
    fs.writeFileSync(path.join(dir, "redis_10_1m_stats_history.csv"), "");
    fs.writeFileSync(path.join(dir, "notes.txt"), "");
    fs.writeFileSync(path.join(dir, "mongo_10_1m_stats.csv"), "");
    fs.writeFileSync(path.join(dir, "cassandra_10_1m_stats.csv"), "");
    fs.writeFileSync(path.join(dir, "mongo_20_1m_stats.csv"), "");

    expect(discoverGroups(dir)).toEqual(["cassandra", "mongo"]);
  });

  it("returns nothing for an empty or missing directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "locator-"));

    expect(discoverGroups(dir)).toEqual([]);
    expect(discoverGroups(path.join(dir, "does-not-exist"))).toEqual([]);
  });
});

describe("companion files", () => {
  it("locates the optional companions next to the stats file", () => {
    const dir = path.join(FIXTURES, "1000_1m");

    expect(locateCompanions(dir, "pg")).toEqual({
      stats: path.join(dir, "pg_1000_1m_stats.csv"),
      failures: path.join(dir, "pg_1000_1m_failures.csv"),
      exceptions: undefined,
      history: path.join(dir, "pg_1000_1m_stats_history.csv"),
    });
  });

  it("reports only the stats file when it is alone", () => {
    const dir = path.join(FIXTURES, "500_30s");

    expect(locateCompanions(dir, "mongo")).toEqual({
      stats: path.join(dir, "mongo_500_30s_stats.csv"),
      failures: undefined,
      exceptions: undefined,
      history: undefined,
    });
  });

  it("returns no files for an unknown group", () => {
    expect(locateCompanions(path.join(FIXTURES, "1000_1m"), "redis")).toEqual(
      {}
    );
  });
});

describe("target users", () => {
  it.each([
    ["/results/100000_1m", 100000],
    ["1000_1m", 1000],
    ["/results/250_30s/", 250],
    ["/results/latest", 0],
    ["/results/1m_100", 0],
    ["/results/10k_1m", 0],
  ])("parses %s as %d", (dir, expected) => {
    expect(parseTargetUsers(dir)).toEqual(expected);
  });
});
