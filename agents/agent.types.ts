import type { AgentProfile } from "../config/config.types";

interface AgentRunResult {
  stdout: string;
}

interface TemplateValues {
  model: string;
  prompt: string;
  promptFile: string;
}

interface AgentInvoker {
  invoke: (profile: AgentProfile, prompt: string) => Promise<AgentRunResult>;
}

export type { AgentInvoker, AgentRunResult, TemplateValues };
