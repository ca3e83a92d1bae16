export const GROUP_LABELS = {
  0: "Infographic",
  1: "Solo",
  2: "Small group",
  3: "Crowd"
} as const;

export const CONTEXT_LABELS = {
  1: "Newscast",
  2: "Congress"
} as const;

export type GroupLabel = keyof typeof GROUP_LABELS;
export type ContextLabel = keyof typeof CONTEXT_LABELS;

export const GROUP_LABEL_CODES: readonly GroupLabel[] = [0, 1, 2, 3];
export const CONTEXT_LABEL_CODES: readonly ContextLabel[] = [1, 2];

export function isGroupLabel(value: unknown): value is GroupLabel {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

export function isContextLabel(value: unknown): value is ContextLabel {
  return value === 1 || value === 2;
}

export function groupLabelName(code: GroupLabel): string {
  return GROUP_LABELS[code];
}

export function contextLabelName(code: ContextLabel): string {
  return CONTEXT_LABELS[code];
}

/** One row of the metadata table. `fields` keeps every original column. */
export interface CodingItem {
  index: number;
  filename: string;
  fields: Record<string, string>;
}

export interface ItemCatalog {
  columns: string[];
  items: CodingItem[];
}

/** Decoded progress entry; legacy bare values arrive here with a null context. */
export interface ProgressEntry {
  groupLabel: GroupLabel | null;
  context: ContextLabel | null;
}

/** Keyed by the stringified item index, exactly as stored. */
export type ProgressDocument = ReadonlyMap<string, ProgressEntry>;

/** Record form written for an item; fields the writer does not know are carried over. */
export interface StoredProgressRecord {
  group_label: GroupLabel | null;
  context: ContextLabel | null;
  [field: string]: unknown;
}

/** The progress file as read from disk. Values are decoded per entry, never rewritten wholesale. */
export type StoredProgressDocument = Record<string, unknown>;

export interface SessionState {
  codedLabels: Array<GroupLabel | null>;
  contextLabels: Array<ContextLabel | null>;
  currentIndex: number;
  hasAutoJumped: boolean;
}

export interface LabelSummary {
  total: number;
  codedCount: number;
  contextCount: number;
  groupCounts: Partial<Record<GroupLabel, number>>;
  contextCounts: Partial<Record<ContextLabel, number>>;
  exportReady: boolean;
}

export interface ExportRow {
  fields: Record<string, string>;
  groupLabel: GroupLabel | null;
  contextLabel: ContextLabel | null;
  codingTimestamp: string;
}
