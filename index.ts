#!/usr/bin/env node
import { Command } from "commander";
import { registerInitCommand } from "./command/init";
import { registerRunCommand } from "./command/run";
import { registerStatusCommand } from "./command/status";
import { registerValidateCommand } from "./command/validate";
import { AgentInvocationError, CheckloopError, describeError } from "./core/errors";
import { logger } from "./core/logger";

const program = new Command();

program
  .name("checkloop")
  .description("Planner/implementor loop that works through a markdown checklist.")
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => cmd.name(),
  });

registerInitCommand(program);
registerRunCommand(program);
registerValidateCommand(program);
registerStatusCommand(program);

program.parseAsync().catch((error: unknown) => {
  if (error instanceof AgentInvocationError) {
    logger.error(error.message, {
      data: { command: error.command, model: error.model },
    });
  } else {
    logger.error(describeError(error));
  }
  process.exitCode = error instanceof CheckloopError ? error.exitCode : 1;
});
