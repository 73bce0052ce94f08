/**
 * Inline markup substitutions, applied in this order.
 * Strong and underline run before emphasis so that `**x**` is never
 * read as two empty emphasis markers.
 */
const INLINE_RULES: ReadonlyArray<[RegExp, string]> = [
  [/`([^`]+)`/g, '<code>$1</code>'],
  [/\*\*([^*]+)\*\*/g, '<strong>$1</strong>'],
  [/__([^_]+)__/g, '<u>$1</u>'],
  [/\*([^*]+)\*/g, '<em>$1</em>'],
  [/_([^_]+)_/g, '<em>$1</em>'],
];

/**
 * Escape text for use as HTML element content
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Escape text for use inside a double- or single-quoted attribute
 */
export function escapeAttribute(text: string): string {
  return escapeHtml(text)
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

/**
 * Replace inline markers in an already-escaped line with their HTML tags.
 * Markers without a closing partner on the same line stay literal.
 */
export function renderInline(text: string): string {
  let result = text;
  for (const [pattern, replacement] of INLINE_RULES) {
    result = result.replace(pattern, replacement);
  }
  return result;
}
