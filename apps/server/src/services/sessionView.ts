import type { AnnotationSession } from "./annotationSession.js";
import { imageBasename } from "./itemCatalog.js";
import {
  CONTEXT_LABELS,
  CONTEXT_LABEL_CODES,
  GROUP_LABELS,
  GROUP_LABEL_CODES,
  contextLabelName,
  groupLabelName,
  type ContextLabel,
  type GroupLabel,
  type ItemCatalog,
  type LabelSummary
} from "../types/coding.js";

export interface NamedCount<T> {
  code: T;
  name: string;
  count: number;
}

export interface SessionView {
  currentIndex: number;
  total: number;
  codedCount: number;
  progress: number;
  item: {
    index: number;
    filename: string;
    basename: string;
    fields: Record<string, string>;
  };
  labels: {
    groupLabel: GroupLabel | null;
    groupLabelName: string | null;
    context: ContextLabel | null;
    contextName: string | null;
  };
  summary: {
    groups: Array<NamedCount<GroupLabel>>;
    contexts: Array<NamedCount<ContextLabel>>;
    exportReady: boolean;
  };
  categories: {
    groups: typeof GROUP_LABELS;
    contexts: typeof CONTEXT_LABELS;
  };
}

export function namedCounts(summary: LabelSummary): SessionView["summary"] {
  const groups: Array<NamedCount<GroupLabel>> = [];
  for (const code of GROUP_LABEL_CODES) {
    const count = summary.groupCounts[code];
    if (count) groups.push({ code, name: groupLabelName(code), count });
  }
  const contexts: Array<NamedCount<ContextLabel>> = [];
  for (const code of CONTEXT_LABEL_CODES) {
    const count = summary.contextCounts[code];
    if (count) contexts.push({ code, name: contextLabelName(code), count });
  }
  return { groups, contexts, exportReady: summary.exportReady };
}

export function describeSession(catalog: ItemCatalog, session: AnnotationSession): SessionView {
  const index = session.currentIndex;
  const item = catalog.items[index];
  const labels = session.labelsAt(index);
  const summary = session.computeSummary();

  return {
    currentIndex: index,
    total: summary.total,
    codedCount: summary.codedCount,
    progress: summary.total > 0 ? summary.codedCount / summary.total : 0,
    item: {
      index,
      filename: item.filename,
      basename: imageBasename(item.filename),
      fields: item.fields
    },
    labels: {
      groupLabel: labels.groupLabel,
      groupLabelName: labels.groupLabel === null ? null : groupLabelName(labels.groupLabel),
      context: labels.context,
      contextName: labels.context === null ? null : contextLabelName(labels.context)
    },
    summary: namedCounts(summary),
    categories: { groups: GROUP_LABELS, contexts: CONTEXT_LABELS }
  };
}
