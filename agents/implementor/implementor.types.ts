import type { AgentProfile, WorkflowConfig } from "../../config/config.types";

interface ImplementorInput {
  profile: AgentProfile;
  workflow: WorkflowConfig;
  targetItem: string;
  task: string;
  /** Output of the last failing test run, when this is a fix attempt. */
  failureOutput?: string;
}

interface ImplementorAgent {
  implement: (input: ImplementorInput) => Promise<string>;
}

export type { ImplementorAgent, ImplementorInput };
