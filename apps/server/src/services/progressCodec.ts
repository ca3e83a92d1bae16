import { z } from "zod";
import { CodingError } from "./codingError.js";
import type { ProgressEntry, StoredProgressDocument, StoredProgressRecord } from "../types/coding.js";

const groupLabelSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);
const contextLabelSchema = z.union([z.literal(1), z.literal(2)]);
const storedObjectSchema = z.record(z.string(), z.unknown());

export interface DecodedProgress {
  /** The document exactly as stored, including entries that did not decode. */
  stored: StoredProgressDocument;
  document: Map<string, ProgressEntry>;
  droppedKeys: string[];
  /** Record entries where one label field was unreadable and read as null. */
  partialKeys: string[];
}

type DecodedValue = { entry: ProgressEntry; partial: boolean } | null;

function decodeValue(value: unknown): DecodedValue {
  // Older progress files stored the group label alone.
  const legacy = groupLabelSchema.nullable().safeParse(value);
  if (legacy.success) return { entry: { groupLabel: legacy.data, context: null }, partial: false };

  const record = storedObjectSchema.safeParse(value);
  if (!record.success) return null;

  const groupLabel = groupLabelSchema.nullish().safeParse(record.data.group_label);
  const context = contextLabelSchema.nullish().safeParse(record.data.context);
  return {
    entry: {
      groupLabel: groupLabel.success ? groupLabel.data ?? null : null,
      context: context.success ? context.data ?? null : null
    },
    partial: !groupLabel.success || !context.success
  };
}

export function decodeProgressDocument(raw: unknown): DecodedProgress {
  const parsed = storedObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CodingError("progress_unreadable", "Progress file must contain a JSON object");
  }

  const document = new Map<string, ProgressEntry>();
  const droppedKeys: string[] = [];
  const partialKeys: string[] = [];
  for (const [key, value] of Object.entries(parsed.data)) {
    const decoded = decodeValue(value);
    if (decoded === null) {
      droppedKeys.push(key);
      continue;
    }
    if (decoded.partial) partialKeys.push(key);
    document.set(key, decoded.entry);
  }
  return { stored: parsed.data, document, droppedKeys, partialKeys };
}

/** Record form of `entry`, keeping any extra fields of the value it replaces. */
export function encodeProgressEntry(entry: ProgressEntry, previous?: unknown): StoredProgressRecord {
  const existing = storedObjectSchema.safeParse(previous);
  return { ...(existing.success ? existing.data : {}), group_label: entry.groupLabel, context: entry.context };
}

/** Index for a stored key, or null when the key is not a decimal integer below `itemCount`. */
export function parseProgressIndex(key: string, itemCount: number): number | null {
  if (!/^\d+$/.test(key)) return null;
  const index = Number(key);
  return index < itemCount ? index : null;
}
