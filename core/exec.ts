import { spawn } from "node:child_process";

interface ProcessRequest {
  command: string;
  args: string[];
  cwd: string;
}

interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs external processes for agents, test commands and git.
 * Both methods reject only when the process cannot be started; a non-zero
 * exit resolves normally and is left to the caller to interpret.
 */
interface CommandExecutor {
  spawnProcess: (request: ProcessRequest) => Promise<ProcessResult>;
  runShell: (command: string, cwd: string) => Promise<ProcessResult>;
}

const SHELL = "sh";

const collect = (request: ProcessRequest): Promise<ProcessResult> =>
  new Promise((resolve, reject) => {
    const child = spawn(request.command, request.args, {
      cwd: request.cwd,
      env: process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    child.once("error", reject);
    child.once("close", (code) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
        stderr: Buffer.concat(stderrChunks).toString("utf-8"),
      });
    });
  });

const createNodeExecutor = (): CommandExecutor => ({
  spawnProcess: (request) => collect(request),
  runShell: (command, cwd) =>
    collect({ command: SHELL, args: ["-lc", command], cwd }),
});

const isSuccess = (result: ProcessResult) => result.exitCode === 0;

const combinedOutput = (result: ProcessResult) =>
  `${result.stdout}${result.stderr}`.trim();

export { combinedOutput, createNodeExecutor, isSuccess };
export type { CommandExecutor, ProcessRequest, ProcessResult };
