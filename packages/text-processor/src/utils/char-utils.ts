/**
 * Length of a string in Unicode code points rather than UTF-16 units
 */
export function codePointLength(text: string): number {
  let length = 0;
  for (const _char of text) {
    length++;
  }
  return length;
}

/**
 * Removes every leading and trailing character found in `chars`.
 * Interior occurrences are kept.
 *
 * @example
 * ```typescript
 * stripChars('"(인용)"', '"()'); // '인용'
 * ```
 */
export function stripChars(text: string, chars: string): string {
  const set = new Set(chars);
  const points = Array.from(text);

  let start = 0;
  let end = points.length;
  while (start < end && set.has(points[start])) start++;
  while (end > start && set.has(points[end - 1])) end--;

  return points.slice(start, end).join('');
}

/**
 * Replaces every whitespace run with a single ASCII space
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ');
}
