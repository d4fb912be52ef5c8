import type { Command } from "commander";
import { loadConfig, resolveChecklistPath } from "../config/config";
import { createNodeExecutor } from "../core/exec";
import { logger } from "../core/logger";
import {
  createLoopDependencies,
  runLoop,
} from "../orchestrator/state-machine";
import {
  CONFIG_DESCRIPTION,
  CONFIG_FLAGS,
  DEFAULT_CONFIG_FILE,
  formatSummary,
  parsePositiveInt,
} from "./shared";
import type { ConfigOption } from "./shared";

interface RunCommandOptions extends ConfigOption {
  maxIterations?: number;
  dryRun?: boolean;
}

export const registerRunCommand = (program: Command) => {
  program
    .command("run")
    .description("Drive the checklist with the planner and implementor agents.")
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, DEFAULT_CONFIG_FILE)
    .option(
      "-n, --max-iterations <count>",
      "Override workflow.max_iterations for this run.",
      parsePositiveInt
    )
    .option(
      "--dry-run",
      "Preview prompts without running agents, tests, git or checklist edits."
    )
    .action(async (options: RunCommandOptions) => {
      const loaded = await loadConfig(options.config);
      const checklistPath = resolveChecklistPath(loaded);
      const cwd = process.cwd();
      logger.info(`Loaded ${loaded.path}; checklist ${checklistPath}`);

      const summary = await runLoop({
        config: loaded.config,
        checklistPath,
        options: {
          maxIterationsOverride: options.maxIterations,
          dryRun: options.dryRun ?? false,
        },
        dependencies: createLoopDependencies(createNodeExecutor(), cwd),
      });

      console.log(`\n${formatSummary(summary)}`);
    });
};
