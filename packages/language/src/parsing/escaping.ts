/**
 * XML unescaping with an offset map back to the source.
 *
 * Literal values are validated after unescaping and trimming; diagnostics about them
 * must still point at the escaped source text, so the trimmed start offset and the
 * escaped length of the trimmed value are returned alongside the value.
 */

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  lt: "<",
  gt: ">",
  amp: "&",
  quot: "\"",
  apos: "'",
};

const ENTITY = /&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z]+);/g;

export interface UnescapedValue {
  value: string;
  /** Document offset of the first non-whitespace character. */
  trimmedOffset: number;
  /** Length of the trimmed value in the escaped source. */
  escapedLength: number;
}

export function unescapeXml(raw: string): string {
  return raw.replace(ENTITY, (match, body: string) => {
    if (body.startsWith("#x")) return fromCodePoint(Number.parseInt(body.slice(2), 16), match);
    if (body.startsWith("#")) return fromCodePoint(Number.parseInt(body.slice(1), 10), match);
    return NAMED_ENTITIES[body] ?? match;
  });
}

function fromCodePoint(code: number, fallback: string): string {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : fallback;
}

/**
 * Unescape a raw value and trim surrounding whitespace.
 *
 * @param offset - document offset of `raw[0]`
 */
export function unescapeTrimmed(raw: string, offset: number): UnescapedValue {
  let start = 0;
  let end = raw.length;
  while (start < end && isWhitespace(raw.charCodeAt(start))) start++;
  while (end > start && isWhitespace(raw.charCodeAt(end - 1))) end--;
  return {
    value: unescapeXml(raw.slice(start, end)),
    trimmedOffset: offset + start,
    escapedLength: end - start,
  };
}

function isWhitespace(code: number): boolean {
  return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;
}
