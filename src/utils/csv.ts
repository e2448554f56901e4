/**
 * Minimal RFC 4180 reader and writer.
 *
 * Handles quoted cells with embedded commas, doubled quotes and line breaks,
 * CRLF or LF endings, and a leading byte-order mark. A quote inside an
 * unquoted cell is kept as a literal character.
 */

export type CsvRow = Record<string, string>;

export interface CsvTable {
  header: string[];
  rows: CsvRow[];
}

const BOM = '\uFEFF';

/**
 * Split CSV text into raw cell arrays, one per line
 */
export function parseCsvCells(text: string): string[][] {
  const input = text.startsWith(BOM) ? text.slice(1) : text;
  const lines: string[][] = [];
  let cells: string[] = [];
  let current = '';
  let inQuotes = false;
  let lineHasContent = false;

  const endCell = () => {
    cells.push(current);
    current = '';
  };

  const endLine = () => {
    endCell();
    if (lineHasContent) {
      lines.push(cells);
    }
    cells = [];
    lineHasContent = false;
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        // Only a quote that opens a cell starts quoted mode; elsewhere it is text
        if (current === '') {
          inQuotes = true;
        } else {
          current += char;
        }
        lineHasContent = true;
        break;
      case ',':
        endCell();
        lineHasContent = true;
        break;
      case '\r':
        if (input[i + 1] === '\n') {
          i++;
        }
        endLine();
        break;
      case '\n':
        endLine();
        break;
      default:
        current += char;
        if (char.trim() !== '') {
          lineHasContent = true;
        }
    }
  }

  if (current !== '' || cells.length > 0 || lineHasContent) {
    endLine();
  }

  return lines;
}

/**
 * Parse CSV text with a header row into keyed rows.
 *
 * Header names and cell values are whitespace-trimmed. Short rows pad with
 * empty strings; cells beyond the header are dropped.
 */
export function parseCsv(text: string): CsvTable {
  const [headerCells, ...body] = parseCsvCells(text);
  if (!headerCells) {
    return { header: [], rows: [] };
  }

  const header = headerCells.map((h) => h.trim());
  const rows = body.map((cells) => {
    const row: CsvRow = {};
    header.forEach((name, index) => {
      if (name === '') {
        return;
      }
      row[name] = (cells[index] ?? '').trim();
    });
    return row;
  });

  return { header: header.filter((name) => name !== ''), rows };
}

/**
 * Escape a value for CSV output
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format keyed rows as CSV under the given header. Missing keys become empty cells.
 */
export function formatCsv(header: readonly string[], rows: readonly CsvRow[]): string {
  if (header.length === 0) {
    return '';
  }
  const lines = [header.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(header.map((name) => escapeCsv(row[name] ?? '')).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}
