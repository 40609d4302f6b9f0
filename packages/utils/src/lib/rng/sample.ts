import { pipe } from 'fp-ts/function';
import * as ST from 'fp-ts/State';
import { State } from 'fp-ts/State';
import * as RNEA from 'fp-ts/ReadonlyNonEmptyArray';
import { ReadonlyNonEmptyArray } from 'fp-ts/ReadonlyNonEmptyArray';
import { NonNegativeInteger, prismNonNegativeInteger } from 'newtype-ts/lib/NonNegativeInteger';
import { prismRandom01, Random01 } from './index';
import { castIndex, castListLength, Index, ListLength, prismIndex, prismListLength } from '../list';
import { monoidSumNonNegativeIntegers } from '../number/integer';
import { panic } from '../index';

export const scaleRandomToListIndex =
  (n: Random01) =>
  (length: ListLength): Index =>
    castIndex(Math.floor(prismRandom01.reverseGet(n) * prismListLength.reverseGet(length)));

export const randomIndex =
  (length: ListLength) =>
  <RNGSTATE>(random: State<RNGSTATE, Random01>): State<RNGSTATE, Index> => {
    if (prismListLength.reverseGet(length) === 0) return panic('randomIndex over an empty list');
    return pipe(
      random,
      ST.map((n) => scaleRandomToListIndex(n)(length))
    );
  };

/**
 * Two distinct indices, every unordered pair equally likely: the first is uniform over the whole list,
 * the second uniform over the remaining `length - 1` positions.
 */
export const randomDistinctPair =
  (length: ListLength) =>
  <RNGSTATE>(random: State<RNGSTATE, Random01>): State<RNGSTATE, readonly [Index, Index]> => {
    const length_ = prismListLength.reverseGet(length);
    if (length_ < 2) return panic(`randomDistinctPair needs at least 2 elements, got ${length_}`);
    return pipe(
      randomIndex(length)(random),
      ST.chain((i) =>
        pipe(
          randomIndex(castListLength(length_ - 1))(random),
          ST.map((j) => {
            const i_ = prismIndex.reverseGet(i);
            const j_ = prismIndex.reverseGet(j);
            return [i, castIndex(j_ >= i_ ? j_ + 1 : j_)] as const;
          })
        )
      )
    );
  };

/**
 * Picks an index with probability proportional to its weight; zero weights are never picked.
 * Weights stay integers so the running total is exact.
 */
export const weightedIndex =
  (weights: ReadonlyNonEmptyArray<NonNegativeInteger>) =>
  <RNGSTATE>(random: State<RNGSTATE, Random01>): State<RNGSTATE, Index> => {
    const weights_ = weights.map(prismNonNegativeInteger.reverseGet);
    const total = prismNonNegativeInteger.reverseGet(RNEA.concatAll(monoidSumNonNegativeIntegers)(weights));
    if (total === 0) return panic('weightedIndex needs a positive total weight');
    const lastPositive = weights_.reduce((acc, w, i) => (w > 0 ? i : acc), 0);
    return pipe(
      random,
      ST.map((n) => {
        const threshold = prismRandom01.reverseGet(n) * total;
        let cumulative = 0;
        for (let i = 0; i < weights_.length; i++) {
          cumulative += weights_[i] ?? 0;
          if (threshold < cumulative) return castIndex(i);
        }
        // threshold may round up to total for very large totals
        return castIndex(lastPositive);
      })
    );
  };
