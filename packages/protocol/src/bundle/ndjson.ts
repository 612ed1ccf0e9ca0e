// NDJSON (Newline Delimited JSON) helpers
// Used for the diagnostics report written next to the effective permissions

/**
 * Stringify an array of objects to NDJSON format
 */
export function stringifyNdjson<T>(items: readonly T[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}
