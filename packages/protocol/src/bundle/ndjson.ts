// Newline-delimited JSON, the format of a bundle's player and change-record logs

/**
 * Decode every non-blank line as one JSON value. Values come back as
 * `unknown` for the caller to validate.
 */
export function parseNdjson(content: string): unknown[] {
  return content.split('\n').flatMap((raw, index) => {
    const line = raw.trim();
    if (line === '') return [];
    try {
      const value: unknown = JSON.parse(line);
      return [value];
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse NDJSON at line ${index + 1}: ${reason}`);
    }
  });
}

/**
 * Encode values one per line, each line newline-terminated.
 */
export function stringifyNdjson(items: readonly unknown[]): string {
  return items.map((item) => `${JSON.stringify(item)}\n`).join('');
}
