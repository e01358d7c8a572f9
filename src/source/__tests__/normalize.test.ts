import { describe, it, expect } from 'vitest';
import {
  normalizeTitle,
  stripMarkup,
  repairEncoding,
  replaceKnownSequences,
  removeUnwantedCharacters,
  normalizeWhitespace,
  ALLOWED_TEXT_REGEX,
} from '../normalize.js';

const SAMPLES = [
  '',
  '<b>Breaking News:</b> Market <i>rises</i> sharply',
  '   Multiple    spaces   here   ',
  'Markets rally \u00e2\u0080\u0094 again',
  'It\u00e2\u20ac\u2122s a \u201cdeal\u201d',
  'Caf\u00c3\u00a9 au lait',
  '💰 Economic Outlook 2025',
  '<img src="x"/>!!! 🎉',
  'Hello, world! #1 $5 50% "quoted"',
  'Fed holds rates steady as inflation cools',
  'Wait\u00e2\u20ac\u00a6 caf\u00c3\u00a9',
  'caf\u00c3\u00a9 💰',
];

describe('stripMarkup', () => {
  it('removes tags and keeps inner text', () => {
    expect(stripMarkup('<p>Hello <a href="/x">there</a></p>')).toBe('Hello there');
  });

  it('treats anything between angle brackets as a tag', () => {
    expect(stripMarkup('1 < 2 > 0')).toBe('1  0');
  });
});

describe('repairEncoding', () => {
  it('re-decodes UTF-8 read as Latin-1', () => {
    expect(repairEncoding('Caf\u00c3\u00a9')).toBe('Café');
    expect(repairEncoding('a \u00e2\u0080\u0094 b')).toBe('a — b');
  });

  it('leaves ASCII unchanged', () => {
    expect(repairEncoding('plain ascii text')).toBe('plain ascii text');
  });

  it('leaves Latin-1 text that is not valid UTF-8 unchanged', () => {
    expect(repairEncoding('Café')).toBe('Café');
  });

  it('leaves text with code points above U+00FF unchanged', () => {
    expect(repairEncoding('naïve “quotes”')).toBe('naïve “quotes”');
  });
});

describe('replaceKnownSequences', () => {
  it('replaces Latin-1 artifacts', () => {
    expect(replaceKnownSequences('Café \u00e2\u0080\u0099')).toBe('Café ’');
    expect(replaceKnownSequences('wait\u00e2\u0080\u00a6')).toBe('wait…');
  });

  it('replaces Windows-1252 artifacts', () => {
    expect(replaceKnownSequences('\u00e2\u20ac\u0153Hi\u00e2\u20ac\u009d \u00e2\u20ac\u201c ok')).toBe(
      '“Hi” – ok',
    );
  });
});

describe('removeUnwantedCharacters', () => {
  it('drops symbols outside the allow-list', () => {
    expect(removeUnwantedCharacters('Hello, world! #1 $5 50% "quoted"')).toBe(
      'Hello, world 1 5 50 quoted',
    );
  });

  it('keeps apostrophes, hyphens, ampersands and curly quotes', () => {
    expect(removeUnwantedCharacters("Rock & Roll's well-known “hit” ’")).toBe(
      "Rock & Roll's well-known “hit” ’",
    );
  });

  it('drops the ellipsis and emoji', () => {
    expect(removeUnwantedCharacters('Wait… 🚀')).toBe('Wait ');
  });
});

describe('normalizeWhitespace', () => {
  it('collapses runs and trims', () => {
    expect(normalizeWhitespace('\t a \n\n b   c ')).toBe('a b c');
  });
});

describe('normalizeTitle', () => {
  it('returns empty string for empty input', () => {
    expect(normalizeTitle('')).toBe('');
  });

  it('strips markup', () => {
    expect(normalizeTitle('<b>Breaking News:</b> Market <i>rises</i> sharply')).toBe(
      'Breaking News: Market rises sharply',
    );
  });

  it('collapses whitespace', () => {
    expect(normalizeTitle('   Multiple    spaces   here   ')).toBe('Multiple spaces here');
  });

  it('repairs a mis-decoded em-dash', () => {
    expect(normalizeTitle('Markets rally \u00e2\u0080\u0094 again')).toBe('Markets rally — again');
  });

  it('substitutes artifacts the decoder cannot repair', () => {
    expect(normalizeTitle('It\u00e2\u20ac\u2122s a \u201cdeal\u201d')).toBe('It’s a “deal”');
  });

  it('strips emoji', () => {
    expect(normalizeTitle('💰 Economic Outlook 2025')).toBe('Economic Outlook 2025');
  });

  it('returns empty string for markup and noise only', () => {
    expect(normalizeTitle('<img src="x"/>!!! 🎉')).toBe('');
  });

  it('passes a clean title through unchanged', () => {
    expect(normalizeTitle('Fed holds rates steady as inflation cools')).toBe(
      'Fed holds rates steady as inflation cools',
    );
  });

  it('decodes mojibake left behind once a symbol is removed', () => {
    expect(normalizeTitle('Wait\u00e2\u20ac\u00a6 caf\u00c3\u00a9')).toBe('Wait caf\u00e9');
    expect(normalizeTitle('caf\u00c3\u00a9 💰')).toBe('caf\u00e9');
  });

  it('is idempotent', () => {
    for (const sample of SAMPLES) {
      const once = normalizeTitle(sample);
      expect(normalizeTitle(once)).toBe(once);
    }
  });

  it('only emits allowed characters', () => {
    for (const sample of SAMPLES) {
      expect(normalizeTitle(sample)).toMatch(ALLOWED_TEXT_REGEX);
    }
  });
});
