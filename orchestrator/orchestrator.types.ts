import type { ImplementorAgent } from "../agents/implementor/implementor.types";
import type { PlannerAgent } from "../agents/planner/planner.types";
import type { TestExecutor } from "../agents/tester/tester.types";
import type { RunConfiguration } from "../config/config.types";
import type { GitGateway } from "./git";

interface RunOptions {
  maxIterationsOverride?: number;
  dryRun: boolean;
}

interface RunSummary {
  iterations: number;
  completedItems: number;
  commits: number;
}

type LoopStopReason =
  | "checklist_complete"
  | "planner_done"
  | "iterations_exhausted";

interface LoopDependencies {
  planner: PlannerAgent;
  implementor: ImplementorAgent;
  tests: TestExecutor;
  git: GitGateway;
}

interface LoopRunParams {
  config: RunConfiguration;
  checklistPath: string;
  options: RunOptions;
  dependencies: LoopDependencies;
}

export type {
  LoopDependencies,
  LoopRunParams,
  LoopStopReason,
  RunOptions,
  RunSummary,
};
