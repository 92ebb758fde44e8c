/**
 * CSV Parsing Utilities
 *
 * Minimal RFC 4180 style reader for the import feeds: comma separated,
 * double-quoted fields with "" as an escaped quote, blank lines skipped.
 * Quoted fields may not span lines.
 */

/**
 * Parse a single CSV line handling quoted values
 */
export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    const nextChar = line[i + 1];

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
      values.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  values.push(current.trim());
  return values;
}

/**
 * Split content into parsed, non-blank lines
 *
 * A leading byte order mark and any mix of line endings are accepted.
 */
export function parseCsv(content: string): string[][] {
  return content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map(parseCsvLine);
}
