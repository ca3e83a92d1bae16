import { readFile } from "node:fs/promises";
import { CodingError } from "./codingError.js";
import { parseCsvRecords } from "./csv.js";
import type { CodingItem, ItemCatalog } from "../types/coding.js";

const FILENAME_COLUMN = "filename";

export async function loadItemCatalog(metadataPath: string): Promise<ItemCatalog> {
  let text: string;
  try {
    text = await readFile(metadataPath, "utf-8");
  } catch (error) {
    throw new CodingError("metadata_unavailable", `Metadata file not found: ${metadataPath}`, { cause: error });
  }
  return parseItemCatalog(text);
}

export function parseItemCatalog(csv: string): ItemCatalog {
  const [headerRow, ...rows] = parseCsvRecords(csv);
  if (!headerRow) {
    throw new CodingError("metadata_empty", "Metadata file has no header row");
  }

  const columns = headerRow.map((header) => header.trim());
  const filenameIx = columns.findIndex((column) => column.toLowerCase() === FILENAME_COLUMN);
  if (filenameIx < 0) {
    throw new CodingError("metadata_missing_filename_column", `Metadata is missing a '${FILENAME_COLUMN}' column`);
  }
  if (rows.length === 0) {
    throw new CodingError("metadata_empty", "Metadata file has no item rows");
  }

  const items: CodingItem[] = rows.map((cols, index) => {
    const fields: Record<string, string> = {};
    columns.forEach((column, colIx) => {
      fields[column] = cols[colIx] ?? "";
    });
    return {
      index,
      filename: (cols[filenameIx] ?? "").trim(),
      fields
    };
  });

  return { columns, items };
}

/** Last path segment of a metadata filename, with either separator. */
export function imageBasename(filename: string): string {
  const segments = filename.trim().split(/[\\/]/).filter(Boolean);
  return segments[segments.length - 1] ?? "";
}
