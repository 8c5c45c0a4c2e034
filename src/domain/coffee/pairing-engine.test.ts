import { describe, expect, it } from 'vitest';

import { createSeededRandom } from '../../shared/utils/random';

import { collectPreviousMatches, generatePairs } from './pairing-engine';
import type { Pair } from './types';

const members = (count: number) => Array.from({ length: count }, (_, i) => `U${i + 1}`);

const appearances = (pairs: Pair[]) => {
  const counts = new Map<string, number>();
  for (const id of pairs.flat()) {
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return counts;
};

const key = ([a, b]: Pair) => [a, b].sort().join('|');

describe('collectPreviousMatches', () => {
  it('records partners in both directions across rounds', () => {
    const matches = collectPreviousMatches([
      [['U1', 'U2']],
      [
        ['U1', 'U3'],
        ['U2', 'U4'],
      ],
    ]);

    expect([...(matches.get('U1') ?? [])].sort()).toEqual(['U2', 'U3']);
    expect([...(matches.get('U4') ?? [])]).toEqual(['U2']);
  });
});

describe('generatePairs', () => {
  it('returns no pairs for an empty roster', () => {
    expect(generatePairs([])).toEqual([]);
  });

  it('returns no pairs for a single member', () => {
    expect(generatePairs(['U1'])).toEqual([]);
  });

  it('pairs two members with each other', () => {
    const [pair] = generatePairs(['U1', 'U2'], [], createSeededRandom(1));

    expect(pair.slice().sort()).toEqual(['U1', 'U2']);
  });

  it.each([2, 4, 6, 10])('uses every member exactly once for %i members', (count) => {
    for (let seed = 0; seed < 20; seed++) {
      const pairs = generatePairs(members(count), [], createSeededRandom(seed));
      const counts = appearances(pairs);

      expect(pairs).toHaveLength(count / 2);
      expect(counts.size).toBe(count);
      expect([...counts.values()].every((n) => n === 1)).toBe(true);
    }
  });

  it.each([3, 5, 9])('gives exactly one member two coffees for %i members', (count) => {
    for (let seed = 0; seed < 20; seed++) {
      const pairs = generatePairs(members(count), [], createSeededRandom(seed));
      const counts = [...appearances(pairs).values()];

      expect(pairs).toHaveLength((count + 1) / 2);
      expect(counts).toHaveLength(count);
      expect(counts.filter((n) => n === 2)).toHaveLength(1);
      expect(counts.filter((n) => n === 1)).toHaveLength(count - 1);
    }
  });

  it('gives the second coffee to the first member drawn', () => {
    for (let seed = 0; seed < 20; seed++) {
      const pairs = generatePairs(members(5), [], createSeededRandom(seed));
      const firstDrawn = pairs[0][0];

      expect(pairs[pairs.length - 1][0]).toBe(firstDrawn);
    }
  });

  it('never pairs a member with themselves', () => {
    for (let seed = 0; seed < 50; seed++) {
      const pairs = generatePairs(members(7), [], createSeededRandom(seed));

      expect(pairs.every(([a, b]) => a !== b)).toBe(true);
    }
  });

  it('ignores duplicate ids in the roster', () => {
    const pairs = generatePairs(['U1', 'U2', 'U1', 'U2'], [], createSeededRandom(3));

    expect(pairs).toHaveLength(1);
  });

  it('avoids previous pairs when a fresh match exists', () => {
    const history: Pair[][] = [
      [
        ['U1', 'U2'],
        ['U3', 'U4'],
      ],
    ];

    for (let seed = 0; seed < 50; seed++) {
      const pairs = generatePairs(members(4), history, createSeededRandom(seed)).map(key);

      expect(pairs).not.toContain('U1|U2');
      expect(pairs).not.toContain('U3|U4');
    }
  });

  it('falls back to a repeat when every partner was already met', () => {
    const history: Pair[][] = [[['U1', 'U2']]];

    const pairs = generatePairs(['U1', 'U2'], history, createSeededRandom(7));

    expect(pairs.map(key)).toEqual(['U1|U2']);
  });

  it('is deterministic for a given random source', () => {
    const first = generatePairs(members(8), [], createSeededRandom(42));
    const second = generatePairs(members(8), [], createSeededRandom(42));

    expect(first).toEqual(second);
  });

  it('does not mutate the roster it is given', () => {
    const roster = members(6);

    generatePairs(roster, [], createSeededRandom(9));

    expect(roster).toEqual(['U1', 'U2', 'U3', 'U4', 'U5', 'U6']);
  });
});
