import type {
  AgentProfile,
  AgentProvider,
  RunConfiguration,
} from "./config.types";

const DEFAULT_CONFIG_FILE = "checkloop.yaml";
const DEFAULT_CHECKLIST_FILE = "PRD.md";

const PROVIDER_ARGS: Record<AgentProvider, string[]> = {
  codex: ["exec", "--model", "{model}", "{prompt}"],
  opencode: ["run", "--model", "{model}", "{prompt}"],
  custom: ["{prompt_file}"],
};

const PROVIDER_COMMANDS: Record<AgentProvider, string> = {
  codex: "codex",
  opencode: "opencode",
  custom: "./agent.sh",
};

const createAgentProfile = (
  provider: AgentProvider,
  overrides: Partial<AgentProfile> = {}
): AgentProfile => ({
  provider,
  command: PROVIDER_COMMANDS[provider],
  args: [...PROVIDER_ARGS[provider]],
  model: "",
  visibleFiles: [],
  visibleTests: [],
  systemPrompt: "",
  ...overrides,
});

const defaultConfig = (): RunConfiguration => ({
  checklist: {
    file: DEFAULT_CHECKLIST_FILE,
    autoMarkCompleted: true,
  },
  workflow: {
    maxIterations: 12,
    maxFixAttempts: 2,
    autoCommit: true,
    executionTests: ["npm test"],
  },
  planner: createAgentProfile("codex", {
    model: "gpt-5-mini",
    visibleFiles: [DEFAULT_CHECKLIST_FILE, "docs/"],
    visibleTests: ["npm test -- --reporter=dot"],
    systemPrompt:
      "You are a fast loop manager. Keep tasks moving with small scoped worker instructions.",
  }),
  implementor: createAgentProfile("codex", {
    model: "gpt-5",
    visibleFiles: ["src/", "package.json"],
    visibleTests: ["npm test"],
    systemPrompt:
      "You are the implementation agent. Apply code changes, run commands, and report concise outcomes.",
  }),
});

const DEFAULT_CHECKLIST_CONTENTS = `# Product Requirements

## Checklist
- [ ] Define dual-agent responsibilities and handoff contract
- [ ] Implement the first CLI command surface
- [ ] Add orchestration loop for delegate -> test -> commit
- [ ] Add retry path for failing tests
`;

export {
  DEFAULT_CHECKLIST_CONTENTS,
  DEFAULT_CHECKLIST_FILE,
  DEFAULT_CONFIG_FILE,
  createAgentProfile,
  defaultConfig,
};
