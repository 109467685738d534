import fs from "fs";
import { parse } from "yaml";
import { Dimension, DIMENSIONS, Weights } from "./types";

export class MalformedWeightsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedWeightsError";
  }
}

const isDimension = (key: string): key is Dimension =>
  DIMENSIONS.some((dimension) => dimension === key);

/**
 * Parses a weight override such as `{"throughput": 0.5, "latency": 0.3}`.
 * YAML mappings (`throughput: 0.5`) are accepted too. Dimensions left out keep
 * their current weight when the override is applied.
 */
export const parseWeightOverride = (raw: string): Partial<Weights> => {
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedWeightsError(`Weights are not valid JSON or YAML: ${reason}`);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new MalformedWeightsError(
      `Weights must be a mapping of dimension to number, got ${JSON.stringify(raw)}`
    );
  }

  const override: Partial<Weights> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isDimension(key)) {
      throw new MalformedWeightsError(
        `Unknown dimension "${key}", expected one of ${DIMENSIONS.join(", ")}`
      );
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new MalformedWeightsError(
        `Weight for "${key}" must be a finite number, got ${JSON.stringify(value)}`
      );
    }
    override[key] = value;
  }

  return override;
};

export type AppliedWeights = {
  weights: Weights;
  warning?: string;
};

/**
 * Merges an override into the current weights. A malformed override is
 * rejected as a whole: the current weights stay and a warning is returned.
 * Totals are not checked, a caller overriding weights owns their sum.
 */
export const applyWeightOverride = (
  current: Weights,
  raw: string
): AppliedWeights => {
  try {
    return { weights: { ...current, ...parseWeightOverride(raw) } };
  } catch (err) {
    if (err instanceof MalformedWeightsError) {
      return {
        weights: current,
        warning: `Ignoring weights override: ${err.message}`,
      };
    }
    throw err;
  }
};

/**
 * Like `applyWeightOverride`, reading the override from a file. A file that
 * cannot be read leaves the current weights in place with a warning.
 */
export const applyWeightOverrideFile = (
  current: Weights,
  path: string
): AppliedWeights => {
  let raw: string;
  try {
    raw = fs.readFileSync(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return {
      weights: current,
      warning: `Ignoring weights file: cannot read ${path}: ${reason}`,
    };
  }

  return applyWeightOverride(current, raw);
};
