/**
 * Text normalization helpers
 */

/**
 * Collapse horizontal whitespace, keep at most one blank line between
 * paragraphs and trim.
 */
export function cleanText(text: string): string {
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * True for null, undefined and whitespace-only strings
 */
export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}
