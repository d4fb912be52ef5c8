import type { Command } from "commander";
import {
  completedItems,
  loadChecklist,
  uncheckedItems,
} from "../checklist/checklist";
import type { ChecklistDocument } from "../checklist/checklist.types";
import { loadConfig, resolveChecklistPath } from "../config/config";
import { formatLines } from "../core/text";
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, DEFAULT_CONFIG_FILE } from "./shared";
import type { ConfigOption } from "./shared";

const formatStatus = (path: string, document: ChecklistDocument) => {
  const remaining = uncheckedItems(document).map((item) => item.text);
  return [
    `Checklist: ${path}`,
    `Completed: ${completedItems(document).length}`,
    `Remaining: ${remaining.length}`,
    formatLines(remaining),
  ].join("\n");
};

export const registerStatusCommand = (program: Command) => {
  program
    .command("status")
    .description("Show completed and remaining checklist items.")
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION, DEFAULT_CONFIG_FILE)
    .action(async (options: ConfigOption) => {
      const loaded = await loadConfig(options.config);
      const path = resolveChecklistPath(loaded);
      console.log(formatStatus(path, await loadChecklist(path)));
    });
};

export { formatStatus };
