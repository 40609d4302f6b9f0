import { Newtype, prism } from 'newtype-ts';
import { flow } from 'fp-ts/function';
import { State } from 'fp-ts/State';
import { Decimal01, prismDecimal01 } from '../number/decimal01';
import { castToPrism } from '../prism';

// using purerand xoroshiro128plus
export type RngState = readonly number[];

export type Random01 = Newtype<{ readonly RANDOM01: unique symbol }, Decimal01>;

export const prismRandom01 = prismDecimal01.compose(prism<Random01>(flow(prismDecimal01.reverseGet, (n) => n < 1)));
export const castRandom01 = castToPrism(prismRandom01)((n) => `Invalid cast, prismRandom01 is not in range 0-1: ${n}`);

/**
 * A source of uniform numbers in [0, 1) threading its own state.
 * Generators are written against this rather than a concrete generator, so tests can replay fixed sequences.
 */
export type RandomSource<RNGSTATE = RngState> = State<RNGSTATE, Random01>;
