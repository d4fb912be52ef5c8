import { mkdtemp, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AgentProfile } from "../config/config.types";
import { AgentInvocationError, IOError, describeError } from "../core/errors";
import type { CommandExecutor, ProcessResult } from "../core/exec";
import type {
  AgentInvoker,
  AgentRunResult,
  TemplateValues,
} from "./agent.types";

const TEMP_PREFIX = "checkloop-prompt-";
const PROMPT_FILE_NAME = "prompt.md";

const TEMPLATE_TOKEN = /\{(model|prompt|prompt_file)\}/g;

// Single pass: substituted values are never rescanned for tokens.
const renderArgTemplate = (raw: string, values: TemplateValues) =>
  raw.replace(TEMPLATE_TOKEN, (_match, token: string) => {
    if (token === "model") {
      return values.model;
    }
    if (token === "prompt") {
      return values.prompt;
    }
    return values.promptFile;
  });

const renderArgs = (profile: AgentProfile, values: TemplateValues) =>
  profile.args.map((arg) => renderArgTemplate(arg, values));

const writePromptFile = async (prompt: string) => {
  let dir = "";
  try {
    dir = await mkdtemp(join(tmpdir(), TEMP_PREFIX));
    const path = join(dir, PROMPT_FILE_NAME);
    await writeFile(path, prompt, "utf-8");
    return { dir, path: await realpath(path) };
  } catch (error) {
    if (dir.length > 0) {
      await rm(dir, { recursive: true, force: true });
    }
    throw new IOError(
      `failed to write temporary prompt file: ${describeError(error)}`,
      dir,
      { cause: error }
    );
  }
};

const formatFailure = (result: ProcessResult) =>
  [
    `agent command failed (status ${String(result.exitCode)})`,
    "stdout:",
    result.stdout.trim(),
    "stderr:",
    result.stderr.trim(),
  ].join("\n");

/**
 * Launches agents as external processes. The prompt is always written to a
 * fresh temp file so `{prompt_file}` templates have something to point at;
 * the file is removed once the process exits.
 */
const createAgentInvoker = (
  executor: CommandExecutor,
  cwd: string
): AgentInvoker => {
  const invoke = async (
    profile: AgentProfile,
    prompt: string
  ): Promise<AgentRunResult> => {
    const promptFile = await writePromptFile(prompt);
    const details = { command: profile.command, model: profile.model };

    try {
      const args = renderArgs(profile, {
        model: profile.model,
        prompt,
        promptFile: promptFile.path,
      });

      let result: ProcessResult;
      try {
        result = await executor.spawnProcess({
          command: profile.command,
          args,
          cwd,
        });
      } catch (error) {
        throw new AgentInvocationError(
          `failed to run ${profile.command} for model ${profile.model}: ${describeError(error)}`,
          { ...details, exitCode: null, stdout: "", stderr: "" },
          { cause: error }
        );
      }

      if (result.exitCode !== 0) {
        throw new AgentInvocationError(formatFailure(result), {
          ...details,
          exitCode: result.exitCode,
          stdout: result.stdout,
          stderr: result.stderr,
        });
      }

      return { stdout: result.stdout.trim() };
    } finally {
      await rm(promptFile.dir, { recursive: true, force: true });
    }
  };

  return { invoke };
};

export { createAgentInvoker, renderArgTemplate, renderArgs };
