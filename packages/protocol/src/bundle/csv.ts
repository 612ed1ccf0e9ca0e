// CSV helpers
// Used for the tabular files exchanged between the extract, expand and apply phases.
// Follows RFC 4180: comma separated, double-quote escaping, CRLF or LF line endings.

import { ValidationError } from '../errors.js';

/**
 * A parsed data row, keyed by header column.
 */
export type CsvRow = {
  /** 1-based line on which the row starts (the header is line 1) */
  line: number;
  values: Record<string, string>;
};

export type CsvTable = {
  columns: string[];
  rows: CsvRow[];
};

/**
 * Split CSV content into records of fields.
 * Each record carries the line number it started on.
 */
export function parseCsvRecords(content: string): Array<{ line: number; fields: string[] }> {
  const records: Array<{ line: number; fields: string[] }> = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let recordHasContent = false;

  const endRecord = () => {
    fields.push(field);
    if (recordHasContent || fields.length > 1 || field !== '') {
      records.push({ line: recordLine, fields });
    }
    fields = [];
    field = '';
    recordHasContent = false;
  };

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];

    if (inQuotes) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        inQuotes = true;
        recordHasContent = true;
        break;
      case ',':
        fields.push(field);
        field = '';
        recordHasContent = true;
        break;
      case '\r':
        // Part of a CRLF pair; a lone CR is ignored
        break;
      case '\n':
        endRecord();
        line++;
        recordLine = line;
        break;
      default:
        field += ch;
        recordHasContent = true;
    }
  }

  if (inQuotes) {
    throw new ValidationError(`Failed to parse CSV: unterminated quoted field starting on line ${recordLine}`);
  }

  if (field !== '' || fields.length > 0 || recordHasContent) {
    endRecord();
  }

  return records;
}

/**
 * Parse CSV content with a header row into keyed rows.
 * Missing trailing fields read as empty strings; surplus fields are dropped.
 */
export function parseCsv(content: string): CsvTable {
  const records = parseCsvRecords(content.startsWith('\uFEFF') ? content.slice(1) : content);
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }

  const [header, ...data] = records;
  const columns = header.fields.map((c) => c.trim());

  const rows = data.map(({ line, fields }) => {
    const values: Record<string, string> = {};
    columns.forEach((column, index) => {
      values[column] = fields[index] ?? '';
    });
    return { line, values };
  });

  return { columns, rows };
}

/**
 * Quote a field when it contains a separator, quote or line break.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Stringify rows to CSV with a header row. Absent values are written as empty fields.
 */
export function stringifyCsv(
  columns: readonly string[],
  rows: ReadonlyArray<Readonly<Record<string, string | undefined>>>
): string {
  const lines = [columns.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(row[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}
