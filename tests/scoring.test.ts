import { describe, expect, it } from 'vitest';
import { pickBest, roundScore, scoreCrossrefItem, scoreEuropePmcResult } from '../src/services/scoring';
import { CrossrefItem } from '../src/services/sources/crossref.schema';

const TITLE = 'Editing CAR-T cells with CRISPR-Cas9 improves persistence';
const query = { title: 'Editing CAR-T cells with CRISPR Cas9 improves persistence', firstAuthorLastName: 'Miller' };

describe('scoreCrossrefItem', () => {
  it('adds 0.30 when the first author matches', () => {
    expect(scoreCrossrefItem({ title: [TITLE], author: [{ family: 'Miller' }] }, query)).toBeCloseTo(1.3);
  });

  it('adds 0.10 when a later author matches', () => {
    const item = { title: [TITLE], author: [{ family: 'Smith' }, { family: 'Miller' }] };
    expect(scoreCrossrefItem(item, query)).toBeCloseTo(1.1);
  });

  it('subtracts 0.05 when authors are listed but none match', () => {
    expect(scoreCrossrefItem({ title: [TITLE], author: [{ family: 'Smith' }] }, query)).toBeCloseTo(0.95);
  });

  it('keeps the title score when the record lists no authors', () => {
    expect(scoreCrossrefItem({ title: [TITLE] }, query)).toBe(1);
    expect(scoreCrossrefItem({ title: [TITLE], author: [] }, query)).toBe(1);
  });

  it('keeps the title score when the query surname normalises to nothing', () => {
    const item = { title: [TITLE], author: [{ family: 'Smith' }] };
    expect(scoreCrossrefItem(item, { ...query, firstAuthorLastName: '--' })).toBe(1);
  });
});

describe('scoreEuropePmcResult', () => {
  it('compares the leading token of firstAuthor', () => {
    expect(scoreEuropePmcResult({ title: TITLE, firstAuthor: 'Miller J' }, query)).toBeCloseTo(1.3);
  });

  it('applies no penalty on a mismatch', () => {
    expect(scoreEuropePmcResult({ title: TITLE, firstAuthor: 'Smith J' }, query)).toBe(1);
    expect(scoreEuropePmcResult({ title: TITLE }, query)).toBe(1);
  });
});

describe('pickBest', () => {
  it('uses title and author to select a Crossref item', () => {
    const items: CrossrefItem[] = [
      { title: ['A study that should not match'], author: [{ family: 'Wrong' }], DOI: '10.1000/nope' },
      { title: [TITLE], author: [{ family: 'Miller' }], DOI: '10.1000/match' }
    ];

    const { record, score } = pickBest(items, (item) => scoreCrossrefItem(item, query));

    expect(record?.DOI).toBe('10.1000/match');
    expect(score).toBeGreaterThan(0.8);
  });

  it('reports no match below the threshold', () => {
    expect(pickBest([0.2, 0.44], (s) => s)).toEqual({ record: null, score: 0 });
    expect(pickBest([], (s: number) => s)).toEqual({ record: null, score: 0 });
  });

  it('accepts a score equal to the threshold', () => {
    expect(pickBest([0.45], (s) => s)).toEqual({ record: 0.45, score: 0.45 });
  });

  it('keeps the first record on a tie', () => {
    const records = [
      { id: 'first', s: 0.7 },
      { id: 'second', s: 0.7 }
    ];
    expect(pickBest(records, (r) => r.s).record?.id).toBe('first');
  });
});

describe('roundScore', () => {
  it('rounds to the given number of decimals', () => {
    expect(roundScore(0.123456, 3)).toBe(0.123);
    expect(roundScore(1.2996, 3)).toBe(1.3);
  });
});
