import { flow } from 'fp-ts/function';
import * as ST from 'fp-ts/State';
import * as TU from 'fp-ts/Tuple';
import { xoroshiro128plus } from 'pure-rand';
import { castRandom01, Random01, RandomSource, RngState } from './index';
import { assertExists } from '../index';
import { intTo01 } from '../number/decimal01';
import { castInteger } from '../number/integer';

export const random = flow(
  ST.gets((state: RngState) => xoroshiro128plus.fromState(state)),
  TU.fst,
  (rng): [Random01, RngState] => {
    const [next, rng1] = rng.next();
    return [
      castRandom01(intTo01(castInteger(next))),
      assertExists(rng1.getState, 'xoroshiro supposed to have getState()').bind(rng1)(),
    ];
  }
) satisfies RandomSource;
