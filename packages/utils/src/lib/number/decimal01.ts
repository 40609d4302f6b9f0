import { Newtype, prism } from 'newtype-ts';
import { NonNegative, prismNonNegative } from 'newtype-ts/lib/NonNegative';
import { Integer, prismInteger } from 'newtype-ts/lib/Integer';
import { flow } from 'fp-ts/function';
import { not } from 'fp-ts/Predicate';
import { castToPrism } from '../prism';

export type Decimal01 = Newtype<
  { readonly DECIMAL01: unique symbol },
  NonNegative
>;

const moreThanOne = (n: number) => n > 1;
const oneOrLess = not(moreThanOne);
const nonNegativeIsDecimal01 = flow(prismNonNegative.reverseGet, oneOrLess);
export const prismDecimal01 = prismNonNegative.compose(prism<Decimal01>(nonNegativeIsDecimal01));

export const castDecimal01 = castToPrism(prismDecimal01)(
  (n) => `Invalid cast, prismDecimal01 is not in range 0-1: ${n}`
);

// 32 bit generator output to [0, 1)
export const intTo01 = (n: Integer) => (prismInteger.reverseGet(n) >>> 0) / 0x100000000;
