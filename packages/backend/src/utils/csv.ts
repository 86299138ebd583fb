/**
 * Parse CSV content into rows, handling quoted values.
 * Quoted values may span lines. Blank lines are skipped; no header handling.
 */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  const endRow = () => {
    row.push(current);
    current = '';
    if (row.length > 1 || row[0].trim() !== '') {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const nextChar = content[i + 1];

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        // Escaped quote inside quoted value
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(current);
      current = '';
    } else if (char === '\r' || char === '\n') {
      if (char === '\r' && nextChar === '\n') {
        i++;
      }
      endRow();
    } else {
      current += char;
    }
  }

  if (current !== '' || row.length > 0) {
    endRow();
  }
  return rows;
}

/**
 * Escape a value for CSV (wrap in quotes if it contains comma, quote, or line break)
 */
export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize rows to CSV text, one line per row, trailing newline included
 */
export function toCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(escapeCsvValue).join(',')).join('\n') + '\n';
}
