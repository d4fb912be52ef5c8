import { createAgentInvoker } from "../agents/agent.invoker";
import {
  buildImplementorPrompt,
  createImplementorAgent,
  defaultWorkerTask,
} from "../agents/implementor/implementor.agent";
import {
  buildPlannerPrompt,
  createPlannerAgent,
  dryRunDecision,
} from "../agents/planner/planner.agent";
import type { Decision } from "../agents/planner/planner.types";
import { createTestExecutor } from "../agents/tester/tester.runner";
import type { TestRunResult } from "../agents/tester/tester.types";
import {
  loadChecklist,
  markItemDone,
  uncheckedItems,
} from "../checklist/checklist";
import { validateConfig } from "../config/config";
import type { RunConfiguration } from "../config/config.types";
import { ConfigurationError } from "../core/errors";
import type { CommandExecutor } from "../core/exec";
import { logger } from "../core/logger";
import { truncate } from "../core/text";
import { createGitGateway } from "./git";
import type {
  LoopDependencies,
  LoopRunParams,
  LoopStopReason,
  RunOptions,
  RunSummary,
} from "./orchestrator.types";

const PREVIEW_CHARS = 240;
const SCOPE = "loop";

const createLoopDependencies = (
  executor: CommandExecutor,
  cwd: string
): LoopDependencies => {
  const invoker = createAgentInvoker(executor, cwd);
  return {
    planner: createPlannerAgent(invoker),
    implementor: createImplementorAgent(invoker),
    tests: createTestExecutor(executor, cwd),
    git: createGitGateway(executor, cwd),
  };
};

const resolveMaxIterations = (
  config: RunConfiguration,
  options: RunOptions
) => {
  const override = options.maxIterationsOverride;
  if (override === undefined) {
    return config.workflow.maxIterations;
  }
  if (!Number.isInteger(override) || override <= 0) {
    throw new ConfigurationError("max iterations override must be > 0");
  }
  return override;
};

const failureContext = (targetItem: string, output: string) =>
  `Previous attempt failed for item \`${targetItem}\`.\nTest output:\n${output}`;

const completionContext = (targetItem: string, commit: string | null) =>
  `Completed item \`${targetItem}\`. Commit: ${commit ?? "none"}`;

const stopMessages: Record<LoopStopReason, string> = {
  checklist_complete: "Checklist is complete. Stopping.",
  planner_done: "Stopped on planner request.",
  iterations_exhausted: "Iteration budget exhausted.",
};

/**
 * Drives the checklist to completion: each step re-reads the checklist, asks
 * the planner for a decision, hands the work to the implementor, runs the
 * test suite with bounded fix attempts, then commits and checks the item off.
 * Failing tests never abort the run; the failure is fed back to the planner
 * on the next step. Any other error propagates to the caller.
 */
const runLoop = async (params: LoopRunParams): Promise<RunSummary> => {
  const { config, checklistPath, options, dependencies } = params;
  const { planner, implementor, tests, git } = dependencies;
  const { workflow } = config;
  const dryRun = options.dryRun;

  validateConfig(config);
  const maxIterations = resolveMaxIterations(config, options);

  const summary: RunSummary = { iterations: 0, completedItems: 0, commits: 0 };
  let loopContext = "";
  let stopReason: LoopStopReason = "iterations_exhausted";

  for (let step = 1; step <= maxIterations; step += 1) {
    const checklist = await loadChecklist(checklistPath);
    const unchecked = uncheckedItems(checklist);
    const firstUnchecked = unchecked[0];
    if (!firstUnchecked) {
      stopReason = "checklist_complete";
      break;
    }

    logger.info(`=== Iteration ${step}/${maxIterations} ===`, { scope: SCOPE });

    const plannerInput = {
      profile: config.planner,
      workflow,
      checklistPath,
      checklist,
      loopContext,
    };
    let decision: Decision;
    if (dryRun) {
      logger.info(
        `[dry-run] planner prompt preview: ${truncate(
          buildPlannerPrompt(plannerInput),
          PREVIEW_CHARS
        )}`,
        { scope: SCOPE }
      );
      decision = dryRunDecision(firstUnchecked.text);
    } else {
      const parsed = await planner.decide(plannerInput);
      if (parsed.source === "fallback") {
        logger.warn(
          "Planner output was not a JSON decision; delegating it verbatim.",
          { scope: SCOPE }
        );
      }
      decision = parsed.decision;
    }

    if (decision.action === "done") {
      logger.info(
        `Planner decided to stop: ${decision.reason ?? "no reason"}`,
        { scope: SCOPE }
      );
      summary.iterations = step;
      stopReason = "planner_done";
      break;
    }

    const targetItem = decision.targetItem ?? firstUnchecked.text;
    const workerTask =
      decision.workerPrompt && decision.workerPrompt.trim().length > 0
        ? decision.workerPrompt
        : defaultWorkerTask(targetItem);
    const implementorInput = {
      profile: config.implementor,
      workflow,
      targetItem,
      task: workerTask,
    };

    if (dryRun) {
      logger.info(`[dry-run] implementor prompt for item: ${targetItem}`, {
        scope: SCOPE,
        data: truncate(buildImplementorPrompt(implementorInput), PREVIEW_CHARS),
      });
    } else {
      const response = await implementor.implement(implementorInput);
      logger.info(
        `Implementor response (truncated): ${truncate(response, PREVIEW_CHARS)}`,
        { scope: SCOPE }
      );
    }

    let testRun: TestRunResult = await tests.run(
      workflow.executionTests,
      dryRun
    );
    if (!testRun.success && !dryRun) {
      for (let attempt = 1; attempt <= workflow.maxFixAttempts; attempt += 1) {
        logger.warn(`Tests failed. Running fix attempt ${attempt}.`, {
          scope: SCOPE,
        });
        await implementor.implement({
          ...implementorInput,
          failureOutput: testRun.output,
        });
        testRun = await tests.run(workflow.executionTests, dryRun);
        if (testRun.success) {
          break;
        }
      }
    }

    if (!testRun.success) {
      logger.warn(
        "Tests are still failing. Handing context back to the planner.",
        { scope: SCOPE, data: truncate(testRun.output, PREVIEW_CHARS) }
      );
      loopContext = failureContext(targetItem, testRun.output);
      summary.iterations = step;
      continue;
    }

    let commitId: string | null = null;
    if (workflow.autoCommit && !dryRun && (await git.hasUncommittedChanges())) {
      const message =
        decision.commitMessage ??
        `feat: complete checklist item: ${targetItem}`;
      commitId = await git.commitAll(message);
      summary.commits += 1;
      logger.success(`Committed ${commitId}: ${message}`, { scope: SCOPE });
    }

    if (config.checklist.autoMarkCompleted && !dryRun) {
      if (await markItemDone(checklistPath, targetItem)) {
        summary.completedItems += 1;
        logger.success(`Marked checklist item done: ${targetItem}`, {
          scope: SCOPE,
        });
      } else {
        logger.warn(
          `Could not match checklist item to auto-mark done: ${targetItem}`,
          { scope: SCOPE }
        );
      }
    }

    loopContext = completionContext(targetItem, commitId);
    summary.iterations = step;
  }

  logger.info(stopMessages[stopReason], { scope: SCOPE });
  return summary;
};

export { createLoopDependencies, resolveMaxIterations, runLoop };
