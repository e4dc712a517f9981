/**
 * Bulk text ingestion
 *
 * Pasted or typed multi-item text is split on any newline or comma,
 * each token is trimmed and empty tokens are discarded.
 */
const BULK_DELIMITER = /[\r\n,]/;

export function parseBulkText(text: string): string[] {
  return text
    .split(BULK_DELIMITER)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * True when typed text should switch from single add to the bulk path
 */
export function containsBulkDelimiter(text: string): boolean {
  return BULK_DELIMITER.test(text);
}

// Key used for duplicate detection
export function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}
