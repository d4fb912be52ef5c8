import type { Command } from "commander";
import { loadConfig } from "../config/config";
import { logger } from "../core/logger";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, DEFAULT_CONFIG_FILE } from "./shared";
import type { ConfigOption } from "./shared";

export const registerValidateCommand = (program: Command) => {
  program
    .command("validate")
    .description("Load and validate the config file.")
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, DEFAULT_CONFIG_FILE)
    .action(async (options: ConfigOption) => {
      const loaded = await loadConfig(options.config);
      logger.success(`Config is valid: ${loaded.path}`);
    });
};
