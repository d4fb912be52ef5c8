import { readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, describeError } from "../core/errors";
import type {
  AgentProfile,
  LoadedConfig,
  RunConfiguration,
} from "./config.types";

const agentSchema = z.object({
  provider: z.enum(["codex", "opencode", "custom"]).default("custom"),
  command: z.string(),
  args: z.array(z.string()).default([]),
  model: z.string().default(""),
  visible_files: z.array(z.string()).default([]),
  visible_tests: z.array(z.string()).default([]),
  system_prompt: z.string().default(""),
});

const configFileSchema = z.object({
  checklist: z.object({
    file: z.string().min(1),
    auto_mark_completed: z.boolean().default(true),
  }),
  workflow: z.object({
    max_iterations: z.number().int(),
    max_fix_attempts: z.number().int().nonnegative(),
    auto_commit: z.boolean().default(true),
    execution_tests: z.array(z.string()).default([]),
  }),
  planner_agent: agentSchema,
  implementor_agent: agentSchema,
});

type ConfigFile = z.infer<typeof configFileSchema>;
type AgentFileEntry = z.infer<typeof agentSchema>;

const toAgentProfile = (entry: AgentFileEntry): AgentProfile => ({
  provider: entry.provider,
  command: entry.command,
  args: entry.args,
  model: entry.model,
  visibleFiles: entry.visible_files,
  visibleTests: entry.visible_tests,
  systemPrompt: entry.system_prompt,
});

const toAgentEntry = (profile: AgentProfile): AgentFileEntry => ({
  provider: profile.provider,
  command: profile.command,
  args: profile.args,
  model: profile.model,
  visible_files: profile.visibleFiles,
  visible_tests: profile.visibleTests,
  system_prompt: profile.systemPrompt,
});

const fromConfigFile = (file: ConfigFile): RunConfiguration => ({
  checklist: {
    file: file.checklist.file,
    autoMarkCompleted: file.checklist.auto_mark_completed,
  },
  workflow: {
    maxIterations: file.workflow.max_iterations,
    maxFixAttempts: file.workflow.max_fix_attempts,
    autoCommit: file.workflow.auto_commit,
    executionTests: file.workflow.execution_tests,
  },
  planner: toAgentProfile(file.planner_agent),
  implementor: toAgentProfile(file.implementor_agent),
});

const toConfigFile = (config: RunConfiguration): ConfigFile => ({
  checklist: {
    file: config.checklist.file,
    auto_mark_completed: config.checklist.autoMarkCompleted,
  },
  workflow: {
    max_iterations: config.workflow.maxIterations,
    max_fix_attempts: config.workflow.maxFixAttempts,
    auto_commit: config.workflow.autoCommit,
    execution_tests: config.workflow.executionTests,
  },
  planner_agent: toAgentEntry(config.planner),
  implementor_agent: toAgentEntry(config.implementor),
});

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

/**
 * Checks the bounds the loop relies on. Throws on the first problem so the
 * run never starts with an unusable configuration.
 */
const validateConfig = (config: RunConfiguration) => {
  const { maxIterations, maxFixAttempts } = config.workflow;
  if (!Number.isInteger(maxIterations) || maxIterations <= 0) {
    throw new ConfigurationError("workflow.max_iterations must be > 0");
  }
  if (!Number.isInteger(maxFixAttempts) || maxFixAttempts < 0) {
    throw new ConfigurationError("workflow.max_fix_attempts must be >= 0");
  }
  if (config.planner.command.trim().length === 0) {
    throw new ConfigurationError("planner_agent.command cannot be empty");
  }
  if (config.implementor.command.trim().length === 0) {
    throw new ConfigurationError("implementor_agent.command cannot be empty");
  }
};

type Env = Record<string, string | undefined>;

const applyEnvOverrides = (
  config: RunConfiguration,
  env: Env
): RunConfiguration => {
  const shared = env.CHECKLOOP_MODEL;
  const plannerModel = env.CHECKLOOP_PLANNER_MODEL ?? shared;
  const implementorModel = env.CHECKLOOP_IMPLEMENTOR_MODEL ?? shared;
  return {
    ...config,
    planner: plannerModel
      ? { ...config.planner, model: plannerModel }
      : config.planner,
    implementor: implementorModel
      ? { ...config.implementor, model: implementorModel }
      : config.implementor,
  };
};

const parseConfigText = (raw: string, path: string): RunConfiguration => {
  let parsed: unknown;
  try {
    parsed = path.endsWith(".json") ? JSON.parse(raw) : parseYaml(raw);
  } catch (error) {
    throw new ConfigurationError(
      `failed to parse config ${path}: ${describeError(error)}`,
      { cause: error }
    );
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      `invalid config ${path}: ${formatIssues(result.error)}`
    );
  }
  return fromConfigFile(result.data);
};

const loadConfig = async (
  configPath: string,
  env: Env = process.env
): Promise<LoadedConfig> => {
  const path = resolve(configPath);
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `failed to read config at ${path}: ${describeError(error)}`,
      { cause: error }
    );
  }

  const config = applyEnvOverrides(parseConfigText(raw, path), env);
  validateConfig(config);
  return { config, path, projectRoot: dirname(path) };
};

const serializeConfig = (config: RunConfiguration) =>
  stringifyYaml(toConfigFile(config));

const writeConfig = async (path: string, config: RunConfiguration) => {
  try {
    await writeFile(path, serializeConfig(config), "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `failed to write config to ${path}: ${describeError(error)}`,
      { cause: error }
    );
  }
};

const resolveChecklistPath = (loaded: LoadedConfig) =>
  resolve(loaded.projectRoot, loaded.config.checklist.file);

export {
  applyEnvOverrides,
  loadConfig,
  parseConfigText,
  resolveChecklistPath,
  serializeConfig,
  validateConfig,
  writeConfig,
};
