import { Newtype, prism } from 'newtype-ts';
import { Integer, prismInteger } from 'newtype-ts/lib/Integer';
import { constTrue, flow } from 'fp-ts/function';
import { xoroshiro128plus } from 'pure-rand';
import { castToPrism } from '../prism';
import { assertExists } from '../index';
import { hash } from '../string';
import { RngState } from './index';

export type Seed = Newtype<{ readonly SEED: unique symbol }, Integer>;

export const prismSeed = prismInteger.compose(prism<Seed>(constTrue));

export const castSeed = castToPrism(prismSeed)(
  (n) => `Invalid cast, prismSeed: ${n}`
);

export const seedFromString = flow(hash, castSeed);

export const rngStateFromSeed = (seed: Seed): RngState => {
  const rng = xoroshiro128plus(prismSeed.reverseGet(seed));
  return assertExists(rng.getState, 'getState expected on xoroshiro128plus').bind(rng)();
};
