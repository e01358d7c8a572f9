/**
 * Title cleanup pipeline. Each stage is a pure string -> string function and
 * `normalizeTitle` composes them in a fixed order: later stages assume the
 * shape produced by earlier ones.
 */

const TAG_REGEX = /<[^>]+>/g;

// Only code points a single-byte Western decoder can have produced.
const SINGLE_BYTE_REGEX = /^[\u0000-\u00ff]*$/;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Residual artifacts of UTF-8 punctuation read as Latin-1 or Windows-1252,
 * for text where the original bytes can no longer be recovered.
 */
const KNOWN_SEQUENCES: ReadonlyArray<readonly [string, string]> = [
  ['\u00e2\u0080\u0099', '\u2019'],
  ['\u00e2\u0080\u009c', '\u201c'],
  ['\u00e2\u0080\u009d', '\u201d'],
  ['\u00e2\u0080\u0093', '\u2013'],
  ['\u00e2\u0080\u0094', '\u2014'],
  ['\u00e2\u0080\u00a6', '\u2026'],
  // Windows-1252 renderings of the same byte triples
  ['\u00e2\u20ac\u2122', '\u2019'],
  ['\u00e2\u20ac\u0153', '\u201c'],
  ['\u00e2\u20ac\u009d', '\u201d'],
  ['\u00e2\u20ac\u201c', '\u2013'],
  ['\u00e2\u20ac\u201d', '\u2014'],
  ['\u00e2\u20ac\u00a6', '\u2026'],
];

/**
 * Word characters, whitespace, `&`, `”`, and everything from `'` (U+0027) up to
 * `“` (U+201C). The range keeps ordinary punctuation, dashes and BMP letters;
 * `!`, `"`, `#`, `$`, `%`, the ellipsis and astral symbols such as emoji fall
 * outside it.
 */
export const ALLOWED_CHAR_CLASS = "\\p{L}\\p{N}_\\s'-\\u201c\\u201d\\u2019&";

const UNWANTED_REGEX = new RegExp(`[^${ALLOWED_CHAR_CLASS}]`, 'gu');

export const ALLOWED_TEXT_REGEX = new RegExp(`^[${ALLOWED_CHAR_CLASS}]*$`, 'u');

export function stripMarkup(text: string): string {
  return text.replace(TAG_REGEX, '');
}

/**
 * Undo UTF-8 bytes that were decoded as Latin-1: reinterpret each code point
 * as a byte and decode the result as UTF-8. Returns the input unchanged when
 * it holds code points above U+00FF or the bytes are not valid UTF-8, so plain
 * ASCII and correctly decoded text pass through.
 */
export function repairEncoding(text: string): string {
  if (!SINGLE_BYTE_REGEX.test(text)) return text;
  try {
    return utf8Decoder.decode(Buffer.from(text, 'latin1'));
  } catch {
    return text;
  }
}

export function replaceKnownSequences(text: string): string {
  let result = text;
  for (const [sequence, replacement] of KNOWN_SEQUENCES) {
    result = result.split(sequence).join(replacement);
  }
  return result;
}

export function removeUnwantedCharacters(text: string): string {
  return text.replace(UNWANTED_REGEX, '');
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

const STAGES: ReadonlyArray<(text: string) => string> = [
  stripMarkup,
  repairEncoding,
  replaceKnownSequences,
  removeUnwantedCharacters,
  normalizeWhitespace,
];

function applyStages(text: string): string {
  return STAGES.reduce((current, stage) => stage(current), text);
}

/**
 * Turn a raw feed entry title into a display string. Never throws; input that
 * is only markup or noise yields ''.
 *
 * The stages are repeated until the text stops changing: removing a symbol in
 * one pass can leave Latin-1 mojibake that only the next pass decodes. After
 * the first pass every change shortens the text, so the loop ends.
 */
export function normalizeTitle(raw: string): string {
  let current = applyStages(raw);
  for (let next = applyStages(current); next !== current; next = applyStages(current)) {
    current = next;
  }
  return current;
}
