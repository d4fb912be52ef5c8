import type { ChecklistDocument } from "../../checklist/checklist.types";
import type { AgentProfile, WorkflowConfig } from "../../config/config.types";

interface DelegateDecision {
  action: "delegate";
  targetItem?: string;
  workerPrompt?: string;
  commitMessage?: string;
  reason?: string;
}

interface DoneDecision {
  action: "done";
  reason?: string;
}

type Decision = DelegateDecision | DoneDecision;

/** Which parsing tier produced the decision. */
type DecisionSource = "strict" | "embedded" | "fallback";

interface ParsedDecision {
  decision: Decision;
  source: DecisionSource;
}

interface PlannerInput {
  profile: AgentProfile;
  workflow: WorkflowConfig;
  checklistPath: string;
  checklist: ChecklistDocument;
  loopContext: string;
}

interface PlannerAgent {
  decide: (input: PlannerInput) => Promise<ParsedDecision>;
}

export type {
  Decision,
  DecisionSource,
  DelegateDecision,
  DoneDecision,
  ParsedDecision,
  PlannerAgent,
  PlannerInput,
};
