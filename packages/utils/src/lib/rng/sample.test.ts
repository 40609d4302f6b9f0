import { randomDistinctPair, randomIndex, weightedIndex } from './sample';
import { sequenceRandom } from './sequence';
import { random } from './random';
import { rngStateFromSeed, seedFromString } from './seed';
import { prismRandom01 } from './index';
import { castListLength, prismIndex } from '../list';
import { castNonNegativeInteger } from '../number/integer';

const weights = (...ws: [number, ...number[]]) => {
  const [head, ...tail] = ws;
  return [castNonNegativeInteger(head), ...tail.map(castNonNegativeInteger)] as const;
};

describe('sample', () => {
  describe('randomIndex', () => {
    it('scales the random value to the list length', () => {
      const pick = randomIndex(castListLength(4))(sequenceRandom([0, 0.49, 0.5, 0.99]));
      const [a, s1] = pick(0);
      const [b, s2] = pick(s1);
      const [c, s3] = pick(s2);
      const [d] = pick(s3);
      expect([a, b, c, d].map(prismIndex.reverseGet)).toEqual([0, 1, 2, 3]);
    });

    it('refuses an empty list', () => {
      expect(() => randomIndex(castListLength(0))(sequenceRandom([0.5]))).toThrow('panic!');
    });
  });

  describe('randomDistinctPair', () => {
    it('skips over the first index when drawing the second', () => {
      // first: floor(0.5 * 4) = 2; second: floor(0.7 * 3) = 2 -> shifted to 3
      const [[i, j], state] = randomDistinctPair(castListLength(4))(sequenceRandom([0.5, 0.7]))(0);
      expect([prismIndex.reverseGet(i), prismIndex.reverseGet(j)]).toEqual([2, 3]);
      expect(state).toBe(2);
    });

    it('keeps the second index below the first as is', () => {
      // first: floor(0.9 * 4) = 3; second: floor(0.1 * 3) = 0
      const [[i, j]] = randomDistinctPair(castListLength(4))(sequenceRandom([0.9, 0.1]))(0);
      expect([prismIndex.reverseGet(i), prismIndex.reverseGet(j)]).toEqual([3, 0]);
    });

    it('never returns the same index twice', () => {
      const pair = randomDistinctPair(castListLength(2))(random);
      let state = rngStateFromSeed(seedFromString('pairs'));
      for (let k = 0; k < 200; k++) {
        const [[i, j], state1] = pair(state);
        state = state1;
        expect(prismIndex.reverseGet(i)).not.toBe(prismIndex.reverseGet(j));
      }
    });
  });

  describe('weightedIndex', () => {
    it('picks by cumulative weight', () => {
      // total 6, cumulative [1, 1, 4, 6]
      const pick = weightedIndex(weights(1, 0, 3, 2));
      const at = (r: number) => prismIndex.reverseGet(pick(sequenceRandom([r]))(0)[0]);
      expect(at(0)).toBe(0);
      expect(at(0.16)).toBe(0); // 0.96 < 1
      expect(at(0.17)).toBe(2); // 1.02, index 1 has no weight
      expect(at(0.66)).toBe(2); // 3.96 < 4
      expect(at(0.67)).toBe(3); // 4.02
      expect(at(0.99)).toBe(3);
    });

    it('refuses an all-zero weighting', () => {
      expect(() => weightedIndex(weights(0, 0))(sequenceRandom([0.5]))).toThrow('panic!');
    });
  });

  describe('random', () => {
    it('is deterministic for a seed and stays in [0, 1)', () => {
      const seed = rngStateFromSeed(seedFromString('seed1'));
      const [a, s1] = random(seed);
      const [b] = random(s1);
      const [a1] = random(seed);
      expect(prismRandom01.reverseGet(a)).toBe(prismRandom01.reverseGet(a1));
      expect(prismRandom01.reverseGet(a)).not.toBe(prismRandom01.reverseGet(b));
      for (const v of [a, b].map(prismRandom01.reverseGet)) {
        expect(v).toBeGreaterThanOrEqual(0);
        expect(v).toBeLessThan(1);
      }
    });
  });
});
