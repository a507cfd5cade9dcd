// NDJSON (Newline Delimited JSON) helpers
// Used for change logs and append-only bundle files

/**
 * A parsed NDJSON line with its 1-based line number
 */
export type NdjsonLine = {
  line: number;
  value: unknown;
};

/**
 * Parse an NDJSON string, keeping line numbers for error reporting.
 * Blank lines are skipped.
 */
export function parseNdjsonLines(content: string): NdjsonLine[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const results: NdjsonLine[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue; // Skip empty lines

    try {
      results.push({ line: i + 1, value: JSON.parse(line) });
    } catch (error) {
      throw new Error(
        `Failed to parse NDJSON at line ${i + 1}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  return results;
}

/**
 * Parse an NDJSON string into an array of values
 */
export function parseNdjson(content: string): unknown[] {
  return parseNdjsonLines(content).map((l) => l.value);
}

/**
 * Stringify an array of objects to NDJSON format
 */
export function stringifyNdjson<T>(items: T[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}

/**
 * Stringify a single item as an NDJSON line (for appending)
 */
export function stringifyNdjsonLine<T>(item: T): string {
  return JSON.stringify(item) + '\n';
}
