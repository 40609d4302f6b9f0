import { State } from 'fp-ts/State';
import { ReadonlyNonEmptyArray } from 'fp-ts/ReadonlyNonEmptyArray';
import { castRandom01, Random01 } from './index';

/**
 * Replays the given values in order, cycling when exhausted; the state is the position.
 */
export const sequenceRandom =
  (values: ReadonlyNonEmptyArray<number>): State<number, Random01> =>
  (position) =>
    [castRandom01(values[position % values.length] ?? values[0]), position + 1];
