import { InvalidArgumentError } from "commander";
import { DEFAULT_CONFIG_FILE } from "../config/defaults";
import type { RunSummary } from "../orchestrator/orchestrator.types";

interface ConfigOption {
  config: string;
}

const CONFIG_FLAGS = "-c, --config <path>";
const CONFIG_DESCRIPTION = "Path to the checkloop config file.";

const parsePositiveInt = (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
};

const formatSummary = (summary: RunSummary) =>
  [
    "Run complete.",
    `Iterations: ${summary.iterations}`,
    `Checklist items marked done: ${summary.completedItems}`,
    `Commits created: ${summary.commits}`,
  ].join("\n");

export {
  CONFIG_DESCRIPTION,
  CONFIG_FLAGS,
  DEFAULT_CONFIG_FILE,
  formatSummary,
  parsePositiveInt,
};
export type { ConfigOption };
