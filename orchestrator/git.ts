import { VersionControlError } from "../core/errors";
import { combinedOutput, isSuccess } from "../core/exec";
import type { CommandExecutor, ProcessResult } from "../core/exec";

interface GitGateway {
  hasUncommittedChanges: () => Promise<boolean>;
  commitAll: (message: string) => Promise<string>;
}

/** Wraps a value in single quotes for `sh`, escaping embedded quotes. */
const quoteShellArg = (value: string) => `'${value.replace(/'/g, `'\\''`)}'`;

const createGitGateway = (
  executor: CommandExecutor,
  cwd: string
): GitGateway => {
  const runGitCommand = async (command: string): Promise<ProcessResult> => {
    let result: ProcessResult;
    try {
      result = await executor.runShell(command, cwd);
    } catch (error) {
      throw new VersionControlError(command, null, "", { cause: error });
    }
    if (!isSuccess(result)) {
      throw new VersionControlError(
        command,
        result.exitCode,
        combinedOutput(result)
      );
    }
    return result;
  };

  const hasUncommittedChanges = async () => {
    const status = await runGitCommand("git status --porcelain");
    return status.stdout.trim().length > 0;
  };

  const commitAll = async (message: string) => {
    await runGitCommand("git add -A");
    await runGitCommand(`git commit -m ${quoteShellArg(message)}`);
    const head = await runGitCommand("git rev-parse --short HEAD");
    return head.stdout.trim();
  };

  return { commitAll, hasUncommittedChanges };
};

export { createGitGateway, quoteShellArg };
export type { GitGateway };
