import { describe, it, expect } from 'vitest';
import { auditResults, describeFinding } from '../audit.js';

const LONG_A = 'Parliament passes budget bill';
const LONG_B = 'Storm warning issued for coast';
const LONG_C = 'Local team wins championship';

describe('auditResults', () => {
  it('returns nothing for healthy feeds', () => {
    const mapping = new Map([['https://a.example/feed', [LONG_A, LONG_B, LONG_C]]]);
    expect(auditResults(mapping)).toEqual([]);
  });

  it('flags a feed with exactly 2 titles as sparse', () => {
    const mapping = new Map([['https://a.example/feed', [LONG_A, LONG_B]]]);
    expect(auditResults(mapping)).toEqual([
      { kind: 'sparse_feed', url: 'https://a.example/feed', titles: [LONG_A, LONG_B] },
    ]);
  });

  it('flags a 9 character title but not a 10 character one', () => {
    const mapping = new Map([['https://a.example/feed', ['Nine char', 'Exactly 10', LONG_C]]]);
    expect(auditResults(mapping)).toEqual([
      { kind: 'short_title', url: 'https://a.example/feed', title: 'Nine char' },
    ]);
  });

  it('measures title length in code points', () => {
    const mapping = new Map([
      ['https://a.example/feed', ['😀😀😀😀😀', '💰💰💰💰💰💰💰💰💰💰', LONG_C]],
    ]);
    expect(auditResults(mapping)).toEqual([
      { kind: 'short_title', url: 'https://a.example/feed', title: '😀😀😀😀😀' },
    ]);
  });

  it('reports an empty feed once and nothing else for it', () => {
    const mapping = new Map<string, string[]>([['https://a.example/feed', []]]);
    expect(auditResults(mapping)).toEqual([{ kind: 'empty_titles', url: 'https://a.example/feed' }]);
  });

  it('reports short titles before the sparse finding of the same feed', () => {
    const mapping = new Map([['https://a.example/feed', ['Tiny', LONG_A]]]);
    expect(auditResults(mapping).map((f) => f.kind)).toEqual(['short_title', 'sparse_feed']);
  });

  it('honours custom thresholds', () => {
    const mapping = new Map([['https://a.example/feed', ['Nine char', 'Exactly 10']]]);
    expect(auditResults(mapping, { minTitleLength: 5, minTitles: 2 })).toEqual([]);
  });

  it('does not modify the mapping', () => {
    const titles = ['Tiny', LONG_A];
    const mapping = new Map([['https://a.example/feed', titles]]);

    auditResults(mapping);

    expect(mapping.size).toBe(1);
    expect(titles).toEqual(['Tiny', LONG_A]);
  });
});

describe('describeFinding', () => {
  it('renders one line per finding kind', () => {
    expect(describeFinding({ kind: 'empty_titles', url: 'https://a.example' })).toBe(
      'No titles found for https://a.example',
    );
    expect(describeFinding({ kind: 'short_title', url: 'https://a.example', title: 'Tiny' })).toBe(
      'Short title for https://a.example: "Tiny"',
    );
    expect(describeFinding({ kind: 'sparse_feed', url: 'https://a.example', titles: ['x', 'y'] })).toBe(
      'Only 2 title(s) found for https://a.example',
    );
  });
});
