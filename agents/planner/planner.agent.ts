import {
  completedItems,
  uncheckedItems,
} from "../../checklist/checklist";
import { formatLines, orNone } from "../../core/text";
import type { AgentInvoker } from "../agent.types";
import type {
  DelegateDecision,
  ParsedDecision,
  PlannerAgent,
  PlannerInput,
} from "./planner.types";
import { parseDecision } from "./planner.validators";

const RESPONSE_CONTRACT = `Respond with JSON only:
{
  "action": "delegate" | "done",
  "target_item": "exact checklist item text to execute",
  "worker_prompt": "concrete implementation instructions",
  "commit_message": "optional commit message",
  "reason": "optional short rationale"
}`;

const buildPlannerPrompt = (input: PlannerInput) => {
  const completed = completedItems(input.checklist).map((item) => item.text);
  const remaining = uncheckedItems(input.checklist).map((item) => item.text);

  return `${input.profile.systemPrompt}

Role: Loop manager (fast model). Decide the next task for the implementation agent.
Checklist file: ${input.checklistPath}

Visible files for you:
${formatLines(input.profile.visibleFiles)}

Visible tests for you:
${formatLines(input.profile.visibleTests)}

Execution tests run by orchestrator:
${formatLines(input.workflow.executionTests)}

Completed checklist items:
${formatLines(completed)}

Remaining checklist items:
${formatLines(remaining)}

Prior orchestration context:
${orNone(input.loopContext)}

${RESPONSE_CONTRACT}
`;
};

/** Decision used in dry runs, where the planner is never launched. */
const dryRunDecision = (firstUnchecked: string): DelegateDecision => ({
  action: "delegate",
  targetItem: firstUnchecked,
  workerPrompt: `Implement checklist item: ${firstUnchecked}`,
  reason: "dry-run synthetic decision",
});

const createPlannerAgent = (invoker: AgentInvoker): PlannerAgent => {
  const decide = async (input: PlannerInput): Promise<ParsedDecision> => {
    const prompt = buildPlannerPrompt(input);
    const result = await invoker.invoke(input.profile, prompt);
    return parseDecision(result.stdout);
  };

  return { decide };
};

export { buildPlannerPrompt, createPlannerAgent, dryRunDecision };
