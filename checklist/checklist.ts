import { readFile, writeFile } from "node:fs/promises";
import { IOError, describeError } from "../core/errors";
import type {
  ChecklistDocument,
  ChecklistItem,
  MarkDoneResult,
} from "./checklist.types";

const UNCHECKED_PREFIX = "- [ ] ";
const CHECKED_PREFIXES = ["- [x] ", "- [X] "];

const normalizeItemText = (value: string) => value.trim().toLowerCase();

const splitLineEnding = (line: string) =>
  line.endsWith("\r")
    ? { body: line.slice(0, -1), ending: "\r" }
    : { body: line, ending: "" };

const parseLine = (line: string): ChecklistItem | null => {
  const trimmed = splitLineEnding(line).body.trimStart();
  if (trimmed.startsWith(UNCHECKED_PREFIX)) {
    return {
      text: trimmed.slice(UNCHECKED_PREFIX.length).trim(),
      checked: false,
    };
  }
  const checkedPrefix = CHECKED_PREFIXES.find((prefix) =>
    trimmed.startsWith(prefix)
  );
  if (checkedPrefix) {
    return { text: trimmed.slice(checkedPrefix.length).trim(), checked: true };
  }
  return null;
};

const parseChecklist = (input: string): ChecklistDocument => {
  const items: ChecklistItem[] = [];
  for (const line of input.split("\n")) {
    const item = parseLine(line);
    if (item) {
      items.push(item);
    }
  }
  return { items };
};

const uncheckedItems = (document: ChecklistDocument) =>
  document.items.filter((item) => !item.checked);

const completedItems = (document: ChecklistDocument) =>
  document.items.filter((item) => item.checked);

/**
 * Checks off the first unchecked line whose text equals or contains the
 * target (trimmed, case-insensitive). Later lines are never touched, even
 * when they match too. Returns the input unchanged when nothing matches.
 */
const markLineDone = (content: string, targetItem: string): MarkDoneResult => {
  const target = normalizeItemText(targetItem);
  const lines = content.split("\n");

  for (let index = 0; index < lines.length; index += 1) {
    const { body, ending } = splitLineEnding(lines[index] ?? "");
    const trimmed = body.trimStart();
    if (!trimmed.startsWith(UNCHECKED_PREFIX)) {
      continue;
    }

    const text = trimmed.slice(UNCHECKED_PREFIX.length);
    if (!normalizeItemText(text).includes(target)) {
      continue;
    }

    const indent = body.slice(0, body.length - trimmed.length);
    lines[index] = `${indent}- [x] ${text.trim()}${ending}`;
    return { content: lines.join("\n"), changed: true, matchedText: text.trim() };
  }

  return { content, changed: false };
};

const readChecklistFile = async (path: string) => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new IOError(
      `failed to read checklist file ${path}: ${describeError(error)}`,
      path,
      { cause: error }
    );
  }
};

const loadChecklist = async (path: string): Promise<ChecklistDocument> =>
  parseChecklist(await readChecklistFile(path));

const markItemDone = async (path: string, targetItem: string) => {
  const contents = await readChecklistFile(path);
  const result = markLineDone(contents, targetItem);
  if (!result.changed) {
    return false;
  }

  try {
    await writeFile(path, result.content, "utf-8");
  } catch (error) {
    throw new IOError(
      `failed to write checklist file ${path}: ${describeError(error)}`,
      path,
      { cause: error }
    );
  }
  return true;
};

export {
  completedItems,
  loadChecklist,
  markItemDone,
  markLineDone,
  normalizeItemText,
  parseChecklist,
  uncheckedItems,
};
