interface TestRunResult {
  success: boolean;
  output: string;
}

interface TestExecutor {
  run: (commands: string[], dryRun: boolean) => Promise<TestRunResult>;
}

export type { TestExecutor, TestRunResult };
