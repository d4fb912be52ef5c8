import { TestExecutionError } from "../../core/errors";
import { combinedOutput, isSuccess } from "../../core/exec";
import type { CommandExecutor, ProcessResult } from "../../core/exec";
import type { TestExecutor, TestRunResult } from "./tester.types";

const NO_TESTS_OUTPUT = "No tests configured.";

/**
 * Runs the configured test commands in order through the shell and stops at
 * the first failing one. A command that exits non-zero is a failed run, not
 * an error; only a command that cannot be started throws.
 */
const createTestExecutor = (
  executor: CommandExecutor,
  cwd: string
): TestExecutor => {
  const runCommand = async (command: string): Promise<ProcessResult> => {
    try {
      return await executor.runShell(command, cwd);
    } catch (error) {
      throw new TestExecutionError(command, { cause: error });
    }
  };

  const run = async (
    commands: string[],
    dryRun: boolean
  ): Promise<TestRunResult> => {
    if (commands.length === 0) {
      return { success: true, output: NO_TESTS_OUTPUT };
    }

    let output = "";
    for (const command of commands) {
      if (dryRun) {
        output += `[dry-run] ${command}\n`;
        continue;
      }

      const result = await runCommand(command);
      output += `$ ${command}\n${combinedOutput(result)}\n`;
      if (!isSuccess(result)) {
        return { success: false, output };
      }
    }

    return { success: true, output };
  };

  return { run };
};

export { NO_TESTS_OUTPUT, createTestExecutor };
