interface ChecklistItem {
  text: string;
  checked: boolean;
}

interface ChecklistDocument {
  items: ChecklistItem[];
}

interface MarkDoneResult {
  content: string;
  changed: boolean;
  matchedText?: string;
}

export type { ChecklistDocument, ChecklistItem, MarkDoneResult };
