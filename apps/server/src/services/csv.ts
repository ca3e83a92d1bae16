export type CsvCell = string | number | null | undefined;

/** Parses RFC 4180 style text; quoted cells may hold commas, doubled quotes and line breaks. */
export function parseCsvRecords(text: string): string[][] {
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i];
    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
          current += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      continue;
    }
    if (ch === ",") {
      record.push(current);
      current = "";
      continue;
    }
    if (ch === "\r" || ch === "\n") {
      if (ch === "\r" && source[i + 1] === "\n") i += 1;
      record.push(current);
      records.push(record);
      record = [];
      current = "";
      continue;
    }
    current += ch;
  }

  if (current.length > 0 || record.length > 0) {
    record.push(current);
    records.push(record);
  }

  return records.filter((cells) => cells.some((cell) => cell.trim().length > 0));
}

export function formatCsv(columns: string[], rows: CsvCell[][]): string {
  const lines = [columns.map(escapeCsvCell).join(",")];
  for (const row of rows) {
    lines.push(row.map(escapeCsvCell).join(","));
  }
  return `${lines.join("\n")}\n`;
}

function escapeCsvCell(value: CsvCell): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}
