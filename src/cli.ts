#!/usr/bin/env node
import fs from "fs";
import process from "process";
import yargs from "yargs/yargs";
import { runComparison } from "./compare";
import { save } from "./load";
import { renderMarkdown, renderSummary, toCsv } from "./render";
import { DEFAULT_WEIGHTS } from "./scoring";
import { Weights } from "./types";
import { applyWeightOverride, applyWeightOverrideFile, AppliedWeights } from "./weights";

const main = async (): Promise<number> => {
  const argv = await yargs(process.argv.slice(2))
    .usage("Rank load-test result groups by weighted score\n\nUsage: $0 <results-dir> [options]")
    .options({
      weights: {
        description: 'Weight override as JSON or YAML, e.g. \'{"throughput":0.5,"latency":0.3}\'',
        type: "string",
      },
      "weights-file": {
        description: "Read the weight override from a JSON or YAML file",
        type: "string",
      },
      markdown: {
        description: "Write a markdown report to this path",
        type: "string",
      },
      csv: {
        description: "Write the ranked scores as CSV to this path",
        type: "string",
      },
      json: {
        description: "Write the full report as JSON to this path",
        type: "string",
      },
      verbose: {
        alias: "v",
        description: "Log each result group as it is analyzed",
        default: false,
        type: "boolean",
      },
    })
    .demandCommand(1, "A results directory is required (e.g. 100000_1m)")
    .help()
    .version(false)
    .alias("help", "h").argv;

  const resultsDir = String(argv._[0]);
  if (!fs.existsSync(resultsDir)) {
    console.error(`Error: directory '${resultsDir}' not found`);
    return 1;
  }

  let weights: Weights = DEFAULT_WEIGHTS;
  const overrides: Array<() => AppliedWeights> = [];
  if (argv.weightsFile !== undefined) {
    const file = argv.weightsFile;
    overrides.push(() => applyWeightOverrideFile(weights, file));
  }
  if (argv.weights !== undefined) {
    const raw = argv.weights;
    overrides.push(() => applyWeightOverride(weights, raw));
  }
  for (const override of overrides) {
    const applied = override();
    if (applied.warning) {
      console.error(applied.warning);
    } else {
      console.error(`Using custom weights: ${JSON.stringify(applied.weights)}`);
    }
    weights = applied.weights;
  }

  if (argv.verbose) {
    console.error(`Discovering result groups in ${resultsDir}...`);
  }

  const outcome = runComparison(resultsDir, {
    weights,
    onGroup: (group) => {
      if (argv.verbose) {
        const loaded = Object.entries(group.tables)
          .filter(([, table]) => table !== undefined)
          .map(([kind]) => kind);
        console.error(`Analyzing ${group.name} (${loaded.join(", ")})...`);
      }
    },
  });

  if (outcome.status === "no-results") {
    console.error(`No load-test results found in ${outcome.resultsDir}`);
    return 1;
  }

  const { report } = outcome;
  console.log(renderSummary(report).join("\n"));

  if (argv.markdown) {
    save(argv.markdown, renderMarkdown(report));
    console.log(`\nMarkdown report written to ${argv.markdown}`);
  }
  if (argv.csv) {
    save(argv.csv, toCsv(report));
    console.log(`CSV scores written to ${argv.csv}`);
  }
  if (argv.json) {
    save(argv.json, JSON.stringify(report, null, 2));
    console.log(`JSON report written to ${argv.json}`);
  }

  return 0;
};

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
