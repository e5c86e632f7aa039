/**
 * Splits one CSV record as written by `ConvertTo-Csv`: fields are usually
 * double-quoted, and a literal quote inside a quoted field is doubled.
 * Unquoted fields are taken as-is, minus any stray surrounding quotes.
 */
export function splitCsvLine(line: string, delimiter = ","): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;
  let i = 0;

  while (i < line.length) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === delimiter) {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
    i++;
  }
  fields.push(current);

  return fields.map((f) => f.trim());
}

export type CsvRow = Readonly<Record<string, string>>;

/**
 * Maps header-plus-rows text to records keyed by `columns`, positionally.
 * The header line is skipped, blank lines are ignored and short rows dropped.
 */
export function parseCsv(text: string, columns: readonly string[]): CsvRow[] {
  const lines = text.split(/\r?\n/);
  const rows: CsvRow[] = [];

  for (const line of lines.slice(1)) {
    if (line.trim().length === 0) continue;
    const fields = splitCsvLine(line);
    if (fields.length < columns.length) continue;
    const row: Record<string, string> = {};
    columns.forEach((column, i) => {
      row[column] = fields[i] ?? "";
    });
    rows.push(row);
  }

  return rows;
}
