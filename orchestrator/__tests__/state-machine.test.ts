import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type {
  ImplementorAgent,
  ImplementorInput,
} from "../../agents/implementor/implementor.types";
import type {
  Decision,
  PlannerAgent,
  PlannerInput,
} from "../../agents/planner/planner.types";
import type {
  TestExecutor,
  TestRunResult,
} from "../../agents/tester/tester.types";
import { createAgentProfile, defaultConfig } from "../../config/defaults";
import type { RunConfiguration } from "../../config/config.types";
import { AgentInvocationError, ConfigurationError } from "../../core/errors";
import {
  createFakeExecutor,
  failed,
  ok,
} from "../../core/__tests__/helpers/fake-executor";
import type { GitGateway } from "../git";
import type { LoopDependencies, RunOptions } from "../orchestrator.types";
import { createLoopDependencies, runLoop } from "../state-machine";

const CHECKLIST = [
  "# Plan",
  "- [ ] First item",
  "- [ ] Second item",
  "- [ ] Third item",
  "- [ ] Fourth item",
  "",
].join("\n");

interface Recorder {
  plannerInputs: PlannerInput[];
  implementorInputs: ImplementorInput[];
  testRuns: number;
  commitMessages: string[];
}

interface FakeSetup {
  decide?: (input: PlannerInput, call: number) => Decision | Promise<Decision>;
  testResult?: (run: number) => TestRunResult;
  dirty?: boolean;
}

const createFakes = (setup: FakeSetup = {}) => {
  const recorder: Recorder = {
    plannerInputs: [],
    implementorInputs: [],
    testRuns: 0,
    commitMessages: [],
  };

  const planner: PlannerAgent = {
    decide: async (input) => {
      recorder.plannerInputs.push(input);
      const decide = setup.decide ?? (() => ({ action: "delegate" as const }));
      return {
        decision: await decide(input, recorder.plannerInputs.length),
        source: "strict",
      };
    },
  };
  const implementor: ImplementorAgent = {
    implement: async (input) => {
      recorder.implementorInputs.push(input);
      return "changed files";
    },
  };
  const tests: TestExecutor = {
    run: async () => {
      recorder.testRuns += 1;
      const result = setup.testResult ?? (() => ({ success: true, output: "ok" }));
      return result(recorder.testRuns);
    },
  };
  const git: GitGateway = {
    hasUncommittedChanges: async () => setup.dirty ?? true,
    commitAll: async (message) => {
      recorder.commitMessages.push(message);
      return `hash${recorder.commitMessages.length}`;
    },
  };

  const dependencies: LoopDependencies = { planner, implementor, tests, git };
  return { dependencies, recorder };
};

const buildConfig = (
  workflow: Partial<RunConfiguration["workflow"]> = {}
): RunConfiguration => {
  const base = defaultConfig();
  return {
    ...base,
    workflow: { ...base.workflow, executionTests: ["npm test"], ...workflow },
  };
};

describe("runLoop", () => {
  let dir = "";
  let checklistPath = "";

  const run = (
    config: RunConfiguration,
    dependencies: LoopDependencies,
    options: RunOptions = { dryRun: false }
  ) => runLoop({ config, checklistPath, options, dependencies });

  const readChecklist = () => readFile(checklistPath, "utf-8");

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), "checkloop-loop-"));
    checklistPath = join(dir, "PRD.md");
    await writeFile(checklistPath, CHECKLIST, "utf-8");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("stops at zero iterations when nothing is left to do", async () => {
    await writeFile(checklistPath, "- [x] Done already\n", "utf-8");
    const { dependencies, recorder } = createFakes();

    const summary = await run(buildConfig({ maxIterations: 5 }), dependencies);

    expect(summary).toEqual({ iterations: 0, completedItems: 0, commits: 0 });
    expect(recorder.plannerInputs).toHaveLength(0);
  });

  it("runs exactly the iteration bound when the planner keeps delegating", async () => {
    const { dependencies, recorder } = createFakes();

    const summary = await run(buildConfig({ maxIterations: 3 }), dependencies);

    expect(summary).toEqual({ iterations: 3, completedItems: 3, commits: 3 });
    expect(recorder.implementorInputs.map((input) => input.targetItem)).toEqual([
      "First item",
      "Second item",
      "Third item",
    ]);
    expect(await readChecklist()).toBe(
      "# Plan\n- [x] First item\n- [x] Second item\n- [x] Third item\n- [ ] Fourth item\n"
    );
  });

  it("stops once the checklist is exhausted", async () => {
    const { dependencies } = createFakes();

    const summary = await run(buildConfig({ maxIterations: 10 }), dependencies);

    expect(summary).toEqual({ iterations: 4, completedItems: 4, commits: 4 });
  });

  it("stops when the planner says done and records the step", async () => {
    const { dependencies, recorder } = createFakes({
      decide: (_input, call) =>
        call === 2 ? { action: "done", reason: "good enough" } : { action: "delegate" },
    });

    const summary = await run(buildConfig({ maxIterations: 5 }), dependencies);

    expect(summary).toEqual({ iterations: 2, completedItems: 1, commits: 1 });
    expect(recorder.implementorInputs).toHaveLength(1);
  });

  it("uses the planner's target, prompt and commit message", async () => {
    const { dependencies, recorder } = createFakes({
      decide: () => ({
        action: "delegate",
        targetItem: "third",
        workerPrompt: "Do the third thing",
        commitMessage: "feat: third",
      }),
    });

    const summary = await run(buildConfig({ maxIterations: 1 }), dependencies);

    expect(summary).toEqual({ iterations: 1, completedItems: 1, commits: 1 });
    expect(recorder.implementorInputs[0]).toMatchObject({
      targetItem: "third",
      task: "Do the third thing",
    });
    expect(recorder.commitMessages).toEqual(["feat: third"]);
    expect(await readChecklist()).toContain("- [x] Third item\n");
  });

  it("synthesizes a task and commit message when the planner omits them", async () => {
    const { dependencies, recorder } = createFakes();

    await run(buildConfig({ maxIterations: 1 }), dependencies);

    expect(recorder.implementorInputs[0]?.task).toBe(
      "Implement checklist item: First item. Keep changes scoped and verify with tests."
    );
    expect(recorder.commitMessages).toEqual([
      "feat: complete checklist item: First item",
    ]);
  });

  it("gives up on an item after the fix attempts run out", async () => {
    const { dependencies, recorder } = createFakes({
      testResult: (runNumber) => ({ success: false, output: `fail ${runNumber}` }),
    });

    const summary = await run(
      buildConfig({ maxIterations: 1, maxFixAttempts: 2 }),
      dependencies
    );

    expect(summary).toEqual({ iterations: 1, completedItems: 0, commits: 0 });
    expect(recorder.testRuns).toBe(3);
    expect(recorder.implementorInputs.map((input) => input.failureOutput)).toEqual([
      undefined,
      "fail 1",
      "fail 2",
    ]);
    expect(recorder.commitMessages).toEqual([]);
    expect(await readChecklist()).toBe(CHECKLIST);
  });

  it("runs the tests once when no fix attempts are allowed", async () => {
    const { dependencies, recorder } = createFakes({
      testResult: () => ({ success: false, output: "red" }),
    });

    await run(buildConfig({ maxIterations: 1, maxFixAttempts: 0 }), dependencies);

    expect(recorder.testRuns).toBe(1);
    expect(recorder.implementorInputs).toHaveLength(1);
  });

  it("stops retrying at the first passing run", async () => {
    const { dependencies, recorder } = createFakes({
      testResult: (runNumber) => ({ success: runNumber === 2, output: "out" }),
    });

    const summary = await run(
      buildConfig({ maxIterations: 1, maxFixAttempts: 3 }),
      dependencies
    );

    expect(summary).toEqual({ iterations: 1, completedItems: 1, commits: 1 });
    expect(recorder.testRuns).toBe(2);
  });

  it("hands the failure and the completion back to the planner", async () => {
    const { dependencies, recorder } = createFakes({
      testResult: (runNumber) => ({
        success: runNumber > 1,
        output: "AssertionError: expected 1",
      }),
    });

    await run(buildConfig({ maxIterations: 3, maxFixAttempts: 0 }), dependencies);

    expect(recorder.plannerInputs.map((input) => input.loopContext)).toEqual([
      "",
      "Previous attempt failed for item `First item`.\nTest output:\nAssertionError: expected 1",
      "Completed item `First item`. Commit: hash1",
    ]);
  });

  it("re-reads the checklist every iteration", async () => {
    const { dependencies, recorder } = createFakes({
      decide: async (input, call) => {
        if (call === 1) {
          await writeFile(checklistPath, "- [ ] Replacement item\n", "utf-8");
        }
        return { action: "delegate", targetItem: input.checklist.items[0]?.text };
      },
      testResult: () => ({ success: false, output: "red" }),
    });

    await run(buildConfig({ maxIterations: 2, maxFixAttempts: 0 }), dependencies);

    expect(recorder.plannerInputs[1]?.checklist.items).toEqual([
      { text: "Replacement item", checked: false },
    ]);
  });

  it("skips the commit when the working tree is clean", async () => {
    const { dependencies, recorder } = createFakes({ dirty: false });

    const summary = await run(buildConfig({ maxIterations: 1 }), dependencies);

    expect(summary).toEqual({ iterations: 1, completedItems: 1, commits: 0 });
    expect(recorder.commitMessages).toEqual([]);
    expect(recorder.plannerInputs).toHaveLength(1);
  });

  it("honours disabled auto-commit and auto-mark", async () => {
    const { dependencies, recorder } = createFakes();
    const config = buildConfig({ maxIterations: 2, autoCommit: false });
    config.checklist.autoMarkCompleted = false;

    const summary = await run(config, dependencies);

    expect(summary).toEqual({ iterations: 2, completedItems: 0, commits: 0 });
    expect(recorder.commitMessages).toEqual([]);
    expect(await readChecklist()).toBe(CHECKLIST);
  });

  it("keeps going when the target matches no checklist item", async () => {
    const { dependencies } = createFakes({
      decide: () => ({ action: "delegate", targetItem: "Unknown work" }),
    });

    const summary = await run(buildConfig({ maxIterations: 2 }), dependencies);

    expect(summary).toEqual({ iterations: 2, completedItems: 0, commits: 2 });
    expect(await readChecklist()).toBe(CHECKLIST);
  });

  it("lets the override replace the configured bound", async () => {
    const { dependencies } = createFakes();

    const summary = await run(buildConfig({ maxIterations: 1 }), dependencies, {
      dryRun: false,
      maxIterationsOverride: 2,
    });

    expect(summary.iterations).toBe(2);
  });

  it("rejects an invalid override before any iteration", async () => {
    const { dependencies, recorder } = createFakes();

    await expect(
      run(buildConfig(), dependencies, { dryRun: false, maxIterationsOverride: 0 })
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(recorder.plannerInputs).toHaveLength(0);
  });

  it("rejects an invalid configuration before any iteration", async () => {
    const { dependencies, recorder } = createFakes();

    await expect(
      run(buildConfig({ maxIterations: 0 }), dependencies)
    ).rejects.toThrow("workflow.max_iterations must be > 0");
    expect(recorder.plannerInputs).toHaveLength(0);
  });

  it("propagates agent failures", async () => {
    const { dependencies, recorder } = createFakes();
    dependencies.implementor = {
      implement: async () => {
        throw new AgentInvocationError("agent command failed (status 1)", {
          command: "worker",
          model: "big",
          exitCode: 1,
          stdout: "",
          stderr: "crash",
        });
      },
    };

    await expect(
      run(buildConfig({ maxIterations: 3 }), dependencies)
    ).rejects.toBeInstanceOf(AgentInvocationError);
    expect(recorder.testRuns).toBe(0);
    expect(await readChecklist()).toBe(CHECKLIST);
  });

  describe("with the process-backed dependencies", () => {
    const agentConfig = (): RunConfiguration => ({
      ...buildConfig({ maxIterations: 2, maxFixAttempts: 1 }),
      planner: createAgentProfile("custom", {
        command: "planner-cli",
        args: ["{prompt}"],
        model: "fast",
      }),
      implementor: createAgentProfile("custom", {
        command: "worker-cli",
        args: ["{prompt}"],
        model: "strong",
      }),
    });

    it("performs no process calls or file changes in dry-run mode", async () => {
      const executor = createFakeExecutor(() => failed(1));

      const summary = await run(
        agentConfig(),
        createLoopDependencies(executor, dir),
        { dryRun: true }
      );

      expect(summary).toEqual({ iterations: 2, completedItems: 0, commits: 0 });
      expect(executor.calls).toHaveLength(0);
      expect(await readChecklist()).toBe(CHECKLIST);
    });

    it("drives planner, implementor, tests and git in order", async () => {
      const executor = createFakeExecutor((call) => {
        if (call.command === "planner-cli") {
          return ok(
            'Next: {"action":"delegate","target_item":"Second item","commit_message":"feat: second"}'
          );
        }
        if (call.command === "worker-cli") {
          return ok("Implemented.");
        }
        if (call.command === "git status --porcelain") {
          return ok(" M app.ts\n");
        }
        if (call.command === "git rev-parse --short HEAD") {
          return ok("abc1234\n");
        }
        return ok();
      });

      const summary = await run(
        agentConfig(),
        createLoopDependencies(executor, dir),
        { dryRun: false, maxIterationsOverride: 1 }
      );

      expect(summary).toEqual({ iterations: 1, completedItems: 1, commits: 1 });
      expect(executor.calls.map((call) => call.command)).toEqual([
        "planner-cli",
        "worker-cli",
        "npm test",
        "git status --porcelain",
        "git add -A",
        "git commit -m 'feat: second'",
        "git rev-parse --short HEAD",
      ]);
      expect(executor.calls.every((call) => call.cwd === dir)).toBe(true);
      expect(await readChecklist()).toContain("- [x] Second item\n");
    });

    it("re-invokes the implementor with the failure output", async () => {
      let testRuns = 0;
      const executor = createFakeExecutor((call) => {
        if (call.command === "planner-cli") {
          return ok("Fix whatever is broken.");
        }
        if (call.command === "npm test") {
          testRuns += 1;
          return testRuns === 1 ? failed(1, "", "1 failing\n") : ok("all green\n");
        }
        if (call.command === "git status --porcelain") {
          return ok("");
        }
        return ok();
      });

      const summary = await run(
        agentConfig(),
        createLoopDependencies(executor, dir),
        { dryRun: false, maxIterationsOverride: 1 }
      );

      expect(summary).toEqual({ iterations: 1, completedItems: 1, commits: 0 });
      const workerPrompts = executor.calls
        .filter((call) => call.command === "worker-cli")
        .map((call) => call.args[0] ?? "");
      expect(workerPrompts).toHaveLength(2);
      expect(workerPrompts[0]).toContain("Task:\nFix whatever is broken.\n");
      expect(workerPrompts[0]).not.toContain("Previous test failures");
      expect(workerPrompts[1]).toContain(
        "Previous test failures to fix first:\n$ npm test\n1 failing\n"
      );
      expect(await readChecklist()).toContain("- [x] First item\n");
    });
  });
});
