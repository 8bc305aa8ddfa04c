/**
 * String cutting on UTF-16 code unit limits
 *
 * @module utils/text
 */

/**
 * Largest index <= `index` that does not fall between the two halves of a
 * surrogate pair
 */
export function safeCutIndex(text: string, index: number): number {
  if (index <= 0) return 0;
  if (index >= text.length) return text.length;
  const last = text.charCodeAt(index - 1);
  return last >= 0xd800 && last <= 0xdbff ? index - 1 : index;
}

/**
 * First `limit` code units of `text`, one fewer when the limit would split a
 * surrogate pair
 */
export function truncateText(text: string, limit: number): string {
  return text.slice(0, safeCutIndex(text, limit));
}
