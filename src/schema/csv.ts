/**
 * Parses CSV text into records keyed by the header row. Values stay strings;
 * a quoted value may span several lines.
 */
export function parseCSVRecords(csv: string): Array<Record<string, string>> {
  if (!csv || csv.trim().length === 0) {
    return [];
  }

  const lines = splitCSVRows(csv.replace(/^\uFEFF/, '').trim());

  // Parse header row
  const headers = parseCSVLine(lines[0]).map((header) => header.trim());
  if (headers.length === 0) {
    return [];
  }

  const records: Array<Record<string, string>> = [];
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim().length === 0) {
      continue; // Skip empty lines
    }

    const values = parseCSVLine(lines[i]);
    const record: Record<string, string> = {};
    for (let j = 0; j < headers.length; j++) {
      record[headers[j]] = j < values.length ? values[j] : '';
    }
    records.push(record);
  }

  return records;
}

/**
 * Parses a single CSV line into an array of values.
 */
export function parseCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    const nextChar = i + 1 < line.length ? line[i + 1] : '';

    if (char === '"') {
      if (inQuotes && nextChar === '"') {
        // Escaped quote
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      values.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  values.push(current);

  return values;
}

/**
 * Splits CSV text into rows, keeping line breaks that sit inside quotes.
 */
export function splitCSVRows(csv: string): string[] {
  const rows: string[] = [];
  let start = 0;
  let inQuotes = false;

  for (let i = 0; i < csv.length; i++) {
    const char = csv[i];
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === '\n' && !inQuotes) {
      const end = i > start && csv[i - 1] === '\r' ? i - 1 : i;
      rows.push(csv.slice(start, end));
      start = i + 1;
    }
  }

  rows.push(csv.slice(start));
  return rows;
}
