import { prismInteger } from 'newtype-ts/lib/Integer';
import {
  NonNegativeInteger,
  prismNonNegativeInteger,
} from 'newtype-ts/lib/NonNegativeInteger';
import { prismPositiveInteger } from 'newtype-ts/lib/PositiveInteger';
import { Semigroup } from 'fp-ts/Semigroup';
import { Monoid } from 'fp-ts/Monoid';
import { castToPrism } from '../prism';

// I throw
export const castInteger = castToPrism(prismInteger)(
  (n) => `Invalid cast, prismInteger is not in range: ${n}`
);

export const castPositiveInteger = castToPrism(prismPositiveInteger)(
  (n) => `Invalid cast, integer not positive: ${n}`
);

export const castNonNegativeInteger = castToPrism(prismNonNegativeInteger)(
  (n) => `Invalid cast, integer is negative or invalid: ${n}`
);

export const ZERO = castNonNegativeInteger(0);
export const ONE = castNonNegativeInteger(1);

export const addNonNegativeIntegers = (a: NonNegativeInteger, b: NonNegativeInteger): NonNegativeInteger =>
  castNonNegativeInteger(prismNonNegativeInteger.reverseGet(a) + prismNonNegativeInteger.reverseGet(b));

export const semigroupSumNonNegativeIntegers: Semigroup<NonNegativeInteger> = {
  concat: addNonNegativeIntegers,
};

export const monoidSumNonNegativeIntegers: Monoid<NonNegativeInteger> = {
  ...semigroupSumNonNegativeIntegers,
  empty: ZERO,
};
