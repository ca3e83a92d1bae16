import type pino from "pino";
import { CodingError } from "./codingError.js";
import { decodeProgressDocument, encodeProgressEntry, parseProgressIndex } from "./progressCodec.js";
import type { ProgressStore } from "./progressStore.js";
import {
  isContextLabel,
  isGroupLabel,
  type ContextLabel,
  type GroupLabel,
  type LabelSummary,
  type ProgressDocument,
  type ProgressEntry,
  type SessionState,
  type StoredProgressDocument
} from "../types/coding.js";

interface ReconciledLabels {
  codedLabels: Array<GroupLabel | null>;
  contextLabels: Array<ContextLabel | null>;
  skippedKeys: string[];
}

export function reconcileProgress(itemCount: number, document: ProgressDocument): ReconciledLabels {
  const codedLabels: Array<GroupLabel | null> = new Array<GroupLabel | null>(itemCount).fill(null);
  const contextLabels: Array<ContextLabel | null> = new Array<ContextLabel | null>(itemCount).fill(null);
  const skippedKeys: string[] = [];

  for (const [key, entry] of document) {
    const index = parseProgressIndex(key, itemCount);
    if (index === null) {
      skippedKeys.push(key);
      continue;
    }
    codedLabels[index] = entry.groupLabel;
    contextLabels[index] = entry.context;
  }

  return { codedLabels, contextLabels, skippedKeys };
}

export function findNextUncoded(codedLabels: ReadonlyArray<GroupLabel | null>, afterIndex: number): number | null {
  for (let i = Math.max(0, afterIndex + 1); i < codedLabels.length; i += 1) {
    if (codedLabels[i] === null) return i;
  }
  return null;
}

export function computeSummary(
  codedLabels: ReadonlyArray<GroupLabel | null>,
  contextLabels: ReadonlyArray<ContextLabel | null>
): LabelSummary {
  const groupCounts: LabelSummary["groupCounts"] = {};
  const contextCounts: LabelSummary["contextCounts"] = {};
  let codedCount = 0;
  let contextCount = 0;

  for (const label of codedLabels) {
    if (label === null) continue;
    groupCounts[label] = (groupCounts[label] ?? 0) + 1;
    codedCount += 1;
  }
  for (const context of contextLabels) {
    if (context === null) continue;
    contextCounts[context] = (contextCounts[context] ?? 0) + 1;
    contextCount += 1;
  }

  return {
    total: codedLabels.length,
    codedCount,
    contextCount,
    groupCounts,
    contextCounts,
    exportReady: codedLabels.length > 0 && codedCount === codedLabels.length
  };
}

interface OpenSessionInput {
  itemCount: number;
  store: ProgressStore;
  logger: pino.Logger;
}

/**
 * Owns the per-item labels of one coding session. Every mutation rewrites the
 * progress store first and is committed in memory only once the write lands.
 * Only the mutated item's entry changes; every other stored value is written
 * back as it was read.
 */
export class AnnotationSession {
  private readonly state: SessionState;
  private document: Map<string, ProgressEntry>;
  private stored: StoredProgressDocument;
  private mutationChain: Promise<unknown> = Promise.resolve();

  private constructor(
    private readonly store: ProgressStore,
    private readonly logger: pino.Logger,
    stored: StoredProgressDocument,
    document: Map<string, ProgressEntry>,
    labels: ReconciledLabels
  ) {
    this.stored = stored;
    this.document = document;
    this.state = {
      codedLabels: labels.codedLabels,
      contextLabels: labels.contextLabels,
      currentIndex: 0,
      hasAutoJumped: false
    };
  }

  static async open(input: OpenSessionInput): Promise<AnnotationSession> {
    const logger = input.logger.child({ component: "annotation_session" });
    const raw = await input.store.load();
    const { stored, document, droppedKeys, partialKeys } = decodeProgressDocument(raw);
    if (droppedKeys.length > 0) {
      logger.warn({ droppedKeys }, "Ignored progress entries with unrecognised values");
    }
    if (partialKeys.length > 0) {
      logger.warn({ partialKeys }, "Read unrecognised label fields as unset");
    }

    const labels = reconcileProgress(input.itemCount, document);
    if (labels.skippedKeys.length > 0) {
      logger.warn({ skippedKeys: labels.skippedKeys, itemCount: input.itemCount }, "Ignored progress entries outside the item range");
    }

    const session = new AnnotationSession(input.store, logger, stored, document, labels);
    session.placeInitialCursor();
    logger.info(
      { itemCount: input.itemCount, storedEntries: document.size, currentIndex: session.state.currentIndex },
      "Coding session opened"
    );
    return session;
  }

  get itemCount() {
    return this.state.codedLabels.length;
  }

  get currentIndex() {
    return this.state.currentIndex;
  }

  snapshot(): SessionState {
    return {
      codedLabels: [...this.state.codedLabels],
      contextLabels: [...this.state.contextLabels],
      currentIndex: this.state.currentIndex,
      hasAutoJumped: this.state.hasAutoJumped
    };
  }

  progressDocument(): ProgressDocument {
    return new Map(this.document);
  }

  /** The persisted document as last written, undecoded entries included. */
  storedDocument(): StoredProgressDocument {
    return structuredClone(this.stored);
  }

  labelsAt(index: number): ProgressEntry {
    this.assertIndex(index);
    return { groupLabel: this.state.codedLabels[index], context: this.state.contextLabels[index] };
  }

  async setGroupLabel(index: number, code: GroupLabel): Promise<ProgressEntry> {
    this.assertIndex(index);
    if (!isGroupLabel(code)) {
      throw new CodingError("invalid_group_label", `Unknown group label: ${String(code)}`);
    }
    return this.enqueue(() =>
      this.writeThrough(index, { groupLabel: code, context: this.state.contextLabels[index] })
    );
  }

  async toggleContextLabel(index: number, code: ContextLabel): Promise<ProgressEntry> {
    this.assertIndex(index);
    if (!isContextLabel(code)) {
      throw new CodingError("invalid_context_label", `Unknown context label: ${String(code)}`);
    }
    return this.enqueue(() => {
      const context = this.state.contextLabels[index] === code ? null : code;
      return this.writeThrough(index, { groupLabel: this.state.codedLabels[index], context });
    });
  }

  async clear(index: number): Promise<ProgressEntry> {
    this.assertIndex(index);
    return this.enqueue(() => this.writeThrough(index, { groupLabel: null, context: null }));
  }

  findNextUncoded(afterIndex: number): number | null {
    return findNextUncoded(this.state.codedLabels, afterIndex);
  }

  computeSummary(): LabelSummary {
    return computeSummary(this.state.codedLabels, this.state.contextLabels);
  }

  goTo(index: number): number {
    if (this.itemCount === 0) return 0;
    const last = this.itemCount - 1;
    const target = Number.isFinite(index) ? Math.trunc(index) : this.state.currentIndex;
    this.state.currentIndex = Math.min(last, Math.max(0, target));
    return this.state.currentIndex;
  }

  previous(): number {
    return this.goTo(this.state.currentIndex - 1);
  }

  next(): number {
    return this.goTo(this.state.currentIndex + 1);
  }

  /** Moves to the next uncoded item after the cursor; the cursor stays put when there is none. */
  jumpToNextUncoded(): number | null {
    const target = this.findNextUncoded(this.state.currentIndex);
    if (target !== null) this.state.currentIndex = target;
    return target;
  }

  private placeInitialCursor() {
    if (this.state.hasAutoJumped) return;
    this.state.hasAutoJumped = true;
    const firstUncoded = this.state.codedLabels.indexOf(null);
    this.state.currentIndex = firstUncoded >= 0 ? firstUncoded : 0;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.mutationChain.then(task, task);
    // The caller sees failures through `run`; the chain only orders writes.
    this.mutationChain = run.catch(() => undefined);
    return run;
  }

  private async writeThrough(index: number, entry: ProgressEntry): Promise<ProgressEntry> {
    const key = String(index);
    const nextStored: StoredProgressDocument = { ...this.stored };
    const next = new Map(this.document);
    for (const existingKey of Object.keys(this.stored)) {
      if (existingKey !== key && parseProgressIndex(existingKey, this.itemCount) === index) {
        delete nextStored[existingKey];
        next.delete(existingKey);
      }
    }
    if (entry.groupLabel === null && entry.context === null) {
      delete nextStored[key];
      next.delete(key);
    } else {
      nextStored[key] = encodeProgressEntry(entry, this.stored[key]);
      next.set(key, entry);
    }

    try {
      await this.store.save(nextStored);
    } catch (error) {
      this.logger.error({ err: error, index }, "Progress write failed; session left unchanged");
      throw new CodingError("progress_write_failed", "Unable to persist coding progress", { cause: error });
    }

    this.stored = nextStored;
    this.document = next;
    this.state.codedLabels[index] = entry.groupLabel;
    this.state.contextLabels[index] = entry.context;
    this.logger.debug({ index, groupLabel: entry.groupLabel, context: entry.context }, "Progress saved");
    return { ...entry };
  }

  private assertIndex(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.itemCount) {
      throw new CodingError("index_out_of_range", `Item index ${index} is outside 0..${this.itemCount - 1}`);
    }
  }
}
