/**
 * Minimal RFC 4180 CSV helpers for the artifact exports and the edge loader.
 */
export type CsvCell = string | number | null | undefined;

export function formatCsv(header: string[], rows: CsvCell[][]): string {
  const lines = [header, ...rows].map(row => row.map(formatCell).join(","));
  return lines.join("\n") + "\n";
}

function formatCell(value: CsvCell): string {
  if (value == null) return "";
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "";
  }
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Parses CSV text into rows of raw string cells. Blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        cell += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(cell);
      cell = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      row.push(cell);
      pushRow(rows, row);
      row = [];
      cell = "";
    } else {
      cell += ch;
    }
  }
  if (quoted) throw new Error("Unterminated quoted CSV field");
  row.push(cell);
  pushRow(rows, row);
  return rows;
}

function pushRow(rows: string[][], row: string[]): void {
  if (row.length === 1 && row[0].trim() === "") return;
  rows.push(row);
}
