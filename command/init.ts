import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve } from "node:path";
import type { Command } from "commander";
import { writeConfig } from "../config/config";
import {
  DEFAULT_CHECKLIST_CONTENTS,
  DEFAULT_CHECKLIST_FILE,
  DEFAULT_CONFIG_FILE,
  defaultConfig,
} from "../config/defaults";
import { ConfigurationError, IOError, describeError } from "../core/errors";
import { logger } from "../core/logger";

interface InitOptions {
  config: string;
  checklist: string;
  force?: boolean;
}

interface InitResult {
  configPath: string;
  checklistPath: string;
  checklistWritten: boolean;
}

const pathExists = async (path: string) => {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
};

/**
 * Path stored in the config for the checklist: relative to the config's
 * directory when the checklist lives under it, otherwise as given.
 */
const checklistPathForConfig = (configPath: string, checklistPath: string) => {
  const rel = relative(dirname(resolve(configPath)), resolve(checklistPath));
  if (rel.length > 0 && !rel.startsWith("..") && !isAbsolute(rel)) {
    return rel;
  }
  return checklistPath;
};

const initProject = async (options: InitOptions): Promise<InitResult> => {
  const force = options.force ?? false;
  if (!force && (await pathExists(options.config))) {
    throw new ConfigurationError(
      `${options.config} already exists. Re-run with --force to overwrite.`
    );
  }

  await mkdir(dirname(resolve(options.config)), { recursive: true });
  await mkdir(dirname(resolve(options.checklist)), { recursive: true });

  const checklistWritten = force || !(await pathExists(options.checklist));
  if (checklistWritten) {
    try {
      await writeFile(options.checklist, DEFAULT_CHECKLIST_CONTENTS, "utf-8");
    } catch (error) {
      throw new IOError(
        `failed to write ${options.checklist}: ${describeError(error)}`,
        options.checklist,
        { cause: error }
      );
    }
  }

  const config = defaultConfig();
  config.checklist.file = checklistPathForConfig(
    options.config,
    options.checklist
  );
  await writeConfig(options.config, config);

  return {
    configPath: options.config,
    checklistPath: options.checklist,
    checklistWritten,
  };
};

export const registerInitCommand = (program: Command) => {
  program
    .command("init")
    .description("Write a starter config and checklist.")
    .option("-c, --config <path>", "Config file to create.", DEFAULT_CONFIG_FILE)
    .option(
      "--checklist <path>",
      "Checklist file to create.",
      DEFAULT_CHECKLIST_FILE
    )
    .option("-f, --force", "Overwrite existing files.")
    .action(async (options: InitOptions) => {
      const result = await initProject(options);
      logger.success(`Wrote ${result.configPath}`);
      if (result.checklistWritten) {
        logger.success(`Wrote ${result.checklistPath}`);
      } else {
        logger.info(`Kept existing ${result.checklistPath}`);
      }
      logger.info(`Next: checkloop run --config ${result.configPath}`);
    });
};

export { checklistPathForConfig, initProject };
