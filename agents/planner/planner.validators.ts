import { z } from "zod";
import type { Decision, ParsedDecision } from "./planner.types";

const optionalText = z.string().nullish();

const decisionSchema = z.object({
  action: z.enum(["delegate", "done"]),
  target_item: optionalText,
  worker_prompt: optionalText,
  commit_message: optionalText,
  reason: optionalText,
});

type DecisionPayload = z.infer<typeof decisionSchema>;

const present = (value: string | null | undefined) => value ?? undefined;

const toDecision = (payload: DecisionPayload): Decision => {
  if (payload.action === "done") {
    return { action: "done", reason: present(payload.reason) };
  }
  return {
    action: "delegate",
    targetItem: present(payload.target_item),
    workerPrompt: present(payload.worker_prompt),
    commitMessage: present(payload.commit_message),
    reason: present(payload.reason),
  };
};

const tryParseDecision = (text: string): Decision | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  const result = decisionSchema.safeParse(parsed);
  return result.success ? toDecision(result.data) : null;
};

const extractJsonObject = (raw: string) => {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return null;
  }
  return raw.slice(start, end + 1);
};

/**
 * Turns planner output into a decision. Tries the whole text as JSON, then
 * the span from the first `{` to the last `}`. Anything else becomes a
 * delegate decision whose worker prompt is the raw text, so the loop always
 * has something to act on.
 */
const parseDecision = (raw: string): ParsedDecision => {
  const strict = tryParseDecision(raw);
  if (strict) {
    return { decision: strict, source: "strict" };
  }

  const embedded = extractJsonObject(raw);
  const lenient = embedded === null ? null : tryParseDecision(embedded);
  if (lenient) {
    return { decision: lenient, source: "embedded" };
  }

  return {
    decision: { action: "delegate", workerPrompt: raw.trim() },
    source: "fallback",
  };
};

export { extractJsonObject, parseDecision };
