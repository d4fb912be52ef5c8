type AgentProvider = "codex" | "opencode" | "custom";

type AgentRole = "planner" | "implementor";

/**
 * How one external agent is launched. `args` are templates: `{model}`,
 * `{prompt}` and `{prompt_file}` are substituted before the process starts.
 */
interface AgentProfile {
  provider: AgentProvider;
  command: string;
  args: string[];
  model: string;
  visibleFiles: string[];
  visibleTests: string[];
  systemPrompt: string;
}

interface ChecklistConfig {
  file: string;
  autoMarkCompleted: boolean;
}

interface WorkflowConfig {
  maxIterations: number;
  maxFixAttempts: number;
  autoCommit: boolean;
  executionTests: string[];
}

interface RunConfiguration {
  checklist: ChecklistConfig;
  workflow: WorkflowConfig;
  planner: AgentProfile;
  implementor: AgentProfile;
}

interface LoadedConfig {
  config: RunConfiguration;
  path: string;
  projectRoot: string;
}

export type {
  AgentProfile,
  AgentProvider,
  AgentRole,
  ChecklistConfig,
  LoadedConfig,
  RunConfiguration,
  WorkflowConfig,
};
