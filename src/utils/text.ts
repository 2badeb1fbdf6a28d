/**
 * Cut `text` to at most `limit` code points, appending "..." when cut.
 * Counting code points keeps surrogate pairs (emoji) whole.
 */
export function truncateChars(text: string, limit: number): string {
  const chars = Array.from(text);
  return chars.length > limit ? `${chars.slice(0, limit).join('')}...` : text;
}
