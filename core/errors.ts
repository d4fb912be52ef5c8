type ErrorCode =
  | "configuration"
  | "io"
  | "agent_invocation"
  | "test_execution"
  | "version_control";

class CheckloopError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CheckloopError";
    this.code = code;
    this.exitCode = 1;
  }
}

class ConfigurationError extends CheckloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
    this.name = "ConfigurationError";
  }
}

class IOError extends CheckloopError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super("io", message, options);
    this.name = "IOError";
    this.path = path;
  }
}

interface AgentFailureDetails {
  command: string;
  model: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

class AgentInvocationError extends CheckloopError {
  readonly command: string;
  readonly model: string;
  readonly agentExitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    message: string,
    details: AgentFailureDetails,
    options?: { cause?: unknown }
  ) {
    super("agent_invocation", message, options);
    this.name = "AgentInvocationError";
    this.command = details.command;
    this.model = details.model;
    this.agentExitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

class TestExecutionError extends CheckloopError {
  readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    super("test_execution", `failed to run test command: ${command}`, options);
    this.name = "TestExecutionError";
    this.command = command;
  }
}

class VersionControlError extends CheckloopError {
  readonly command: string;
  readonly gitExitCode: number | null;
  readonly output: string;

  constructor(
    command: string,
    gitExitCode: number | null,
    output: string,
    options?: { cause?: unknown }
  ) {
    const detail = output.trim().length > 0 ? `: ${output.trim()}` : "";
    super(
      "version_control",
      `git command failed (\`${command}\`, status ${String(gitExitCode)})${detail}`,
      options
    );
    this.name = "VersionControlError";
    this.command = command;
    this.gitExitCode = gitExitCode;
    this.output = output;
  }
}

const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export {
  AgentInvocationError,
  CheckloopError,
  ConfigurationError,
  IOError,
  TestExecutionError,
  VersionControlError,
  describeError,
};
export type { AgentFailureDetails, ErrorCode };
