import { formatLines, truncate } from "../../core/text";
import type { AgentInvoker } from "../agent.types";
import type { ImplementorAgent, ImplementorInput } from "./implementor.types";

const MAX_FAILURE_CHARS = 3000;

const buildFailureBlock = (failureOutput?: string) => {
  if (failureOutput === undefined) {
    return "";
  }
  return `Previous test failures to fix first:\n${truncate(
    failureOutput,
    MAX_FAILURE_CHARS
  )}\n`;
};

const buildImplementorPrompt = (input: ImplementorInput) => `${input.profile.systemPrompt}

Role: Implementation agent (slower, stronger model).
Current checklist item:
${input.targetItem}

Task:
${input.task}

You may focus on these files:
${formatLines(input.profile.visibleFiles)}

You should internally validate against these tests:
${formatLines(input.profile.visibleTests)}

The orchestrator will run this test suite after your turn:
${formatLines(input.workflow.executionTests)}

${buildFailureBlock(input.failureOutput)}
Keep output concise. Include:
1) What changed
2) What remains risky
3) Suggested commit message
`;

const defaultWorkerTask = (targetItem: string) =>
  `Implement checklist item: ${targetItem}. Keep changes scoped and verify with tests.`;

const createImplementorAgent = (invoker: AgentInvoker): ImplementorAgent => {
  const implement = async (input: ImplementorInput) => {
    const result = await invoker.invoke(
      input.profile,
      buildImplementorPrompt(input)
    );
    return result.stdout;
  };

  return { implement };
};

export { buildImplementorPrompt, createImplementorAgent, defaultWorkerTask };
