import * as core from "@actions/core";
import process from "process";
import { runComparison } from "./compare";
import { save } from "./load";
import { renderMarkdown, renderSummary } from "./render";
import { DEFAULT_WEIGHTS } from "./scoring";
import { applyWeightOverride } from "./weights";

const main = async () => {
  const resultsDir = core.getInput("results_dir", { required: true });
  const rawWeights = core.getInput("weights");
  const markdownOutputPath = core.getInput("output_markdown");

  let weights = DEFAULT_WEIGHTS;
  if (rawWeights !== "") {
    const applied = applyWeightOverride(weights, rawWeights);
    if (applied.warning) {
      core.warning(applied.warning);
    }
    weights = applied.weights;
  }

  core.debug(`Comparing results in ${resultsDir}`);

  const outcome = runComparison(resultsDir, {
    weights,
    onGroup: (group) => core.debug(`Analyzing ${group.name}`),
  });
  if (outcome.status === "no-results") {
    core.setFailed(`No load-test results found in ${resultsDir}`);
    return;
  }

  core.info(renderSummary(outcome.report).join("\n"));
  core.setOutput("winner", outcome.report.winner.name);

  if (markdownOutputPath !== "") {
    core.debug(`Writing markdown report to ${markdownOutputPath}`);
    save(markdownOutputPath, renderMarkdown(outcome.report));
  }
};

if (require.main === module) {
  main()
    .then(() => process.exit())
    .catch((err) => {
      core.setFailed(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
}
