import { mkdir, writeFile } from "node:fs/promises";
import { basename, dirname } from "node:path";
import type pino from "pino";
import type { AnnotationSession } from "./annotationSession.js";
import { CodingError } from "./codingError.js";
import { formatCsv, type CsvCell } from "./csv.js";
import { parseProgressIndex } from "./progressCodec.js";
import type { CodingItem, ExportRow, ItemCatalog, LabelSummary, ProgressDocument, ProgressEntry } from "../types/coding.js";

const LABEL_COLUMNS = ["group_labels", "context_labels", "coding_timestamp"] as const;
const COMPLETION_COLUMN = "completion_status";
const GENERATED_COLUMNS = new Set<string>([...LABEL_COLUMNS, COMPLETION_COLUMN]);

/** One row per item; labels come from the stored document, absent entries are null/null. */
export function buildExportRows(items: CodingItem[], document: ProgressDocument, codingTimestamp: string): ExportRow[] {
  const byIndex = new Map<number, ProgressEntry>();
  for (const [key, entry] of document) {
    const index = parseProgressIndex(key, items.length);
    if (index !== null && (key === String(index) || !byIndex.has(index))) byIndex.set(index, entry);
  }

  return items.map((item) => {
    const entry = byIndex.get(item.index);
    return {
      fields: item.fields,
      groupLabel: entry?.groupLabel ?? null,
      contextLabel: entry?.context ?? null,
      codingTimestamp
    };
  });
}

export function renderExportCsv(columns: string[], rows: ExportRow[], status?: string): string {
  const itemColumns = columns.filter((column) => !GENERATED_COLUMNS.has(column));
  const header: string[] = [...itemColumns, ...LABEL_COLUMNS];
  if (status !== undefined) header.push(COMPLETION_COLUMN);

  const cells = rows.map((row) => {
    const out: CsvCell[] = itemColumns.map((column) => row.fields[column] ?? "");
    out.push(row.groupLabel, row.contextLabel, row.codingTimestamp);
    if (status !== undefined) out.push(status);
    return out;
  });

  return formatCsv(header, cells);
}

export function completionStatus(summary: Pick<LabelSummary, "codedCount" | "total">): string {
  return `${summary.codedCount}/${summary.total} images coded`;
}

export function exportNotReadyError(summary: Pick<LabelSummary, "total">): CodingError {
  return new CodingError("export_not_ready", `Complete coding all ${summary.total} images to export final results.`);
}

export function formatCodingTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function fileStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export type FinalExportOutcome =
  | { status: "not_ready"; summary: LabelSummary }
  | { status: "written"; path: string; filename: string; csv: string; rowCount: number };

export interface DownloadableExport {
  filename: string;
  contentType: string;
  body: string;
}

interface ExportServiceOptions {
  catalog: ItemCatalog;
  session: AnnotationSession;
  outputFile: string;
  logger: pino.Logger;
  now?: () => Date;
}

export class ExportService {
  private readonly catalog: ItemCatalog;
  private readonly session: AnnotationSession;
  private readonly outputFile: string;
  private readonly logger: pino.Logger;
  private readonly now: () => Date;

  constructor(options: ExportServiceOptions) {
    this.catalog = options.catalog;
    this.session = options.session;
    this.outputFile = options.outputFile;
    this.logger = options.logger.child({ component: "export" });
    this.now = options.now ?? (() => new Date());
  }

  async finalExport(): Promise<FinalExportOutcome> {
    const summary = this.session.computeSummary();
    if (!summary.exportReady) {
      this.logger.info({ codedCount: summary.codedCount, total: summary.total }, "Final export refused until every item is coded");
      return { status: "not_ready", summary };
    }

    const rows = buildExportRows(this.catalog.items, this.session.progressDocument(), formatCodingTimestamp(this.now()));
    const csv = renderExportCsv(this.catalog.columns, rows);
    await mkdir(dirname(this.outputFile), { recursive: true });
    await writeFile(this.outputFile, csv, "utf-8");
    this.logger.info({ path: this.outputFile, rowCount: rows.length }, "Final results saved");

    return { status: "written", path: this.outputFile, filename: basename(this.outputFile), csv, rowCount: rows.length };
  }

  partialExport(): DownloadableExport {
    const now = this.now();
    const summary = this.session.computeSummary();
    const rows = buildExportRows(this.catalog.items, this.session.progressDocument(), formatCodingTimestamp(now));
    return {
      filename: `coding_partial_${fileStamp(now)}.csv`,
      contentType: "text/csv",
      body: renderExportCsv(this.catalog.columns, rows, completionStatus(summary))
    };
  }

  /** Raw dump of the persisted progress document, entries as stored. */
  backupExport(): DownloadableExport {
    return {
      filename: `coding_progress_backup_${fileStamp(this.now())}.json`,
      contentType: "application/json",
      body: JSON.stringify(this.session.storedDocument(), null, 2)
    };
  }
}
