/**
 * Splits a sentence around quoted spans.
 *
 * A quoted span runs from a straight `"` or `'` to the next occurrence of the
 * same character. Text before, the span itself (quotes included) and text
 * after are emitted in reading order, each trimmed; empty pieces are dropped.
 * An unmatched quote stays part of the surrounding text.
 *
 * A sentence without any quoted span is returned unchanged as the only element.
 *
 * @example
 * ```typescript
 * splitOnQuotes('그는 "안녕" 하고 웃었다');
 * // ['그는', '"안녕"', '하고 웃었다']
 * ```
 */
export function splitOnQuotes(sentence: string): string[] {
  const pattern = /(["'])[\s\S]*?\1/g;
  const segments: string[] = [];
  let cursor = 0;

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(sentence)) !== null) {
    pushTrimmed(segments, sentence.slice(cursor, match.index));
    pushTrimmed(segments, match[0]);
    cursor = match.index + match[0].length;
  }

  if (cursor === 0) {
    return [sentence];
  }

  pushTrimmed(segments, sentence.slice(cursor));
  return segments;
}

function pushTrimmed(segments: string[], piece: string): void {
  const trimmed = piece.trim();
  if (trimmed) {
    segments.push(trimmed);
  }
}
