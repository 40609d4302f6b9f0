import { Newtype, prism } from 'newtype-ts';
import { NonNegativeInteger, prismNonNegativeInteger } from 'newtype-ts/lib/NonNegativeInteger';
import { constTrue } from 'fp-ts/function';
import { castToPrism } from './prism';

export type ListLength = Newtype<{ readonly LIST_LENGTH: unique symbol }, NonNegativeInteger>;

export type Index = Newtype<{ readonly INDEX: unique symbol }, NonNegativeInteger>;

export const prismListLength = prismNonNegativeInteger.compose(
  prism<ListLength>(constTrue)
);
export const castListLength = castToPrism(prismListLength)(
  (n) => `Invalid cast, list length: ${n}`
);

export const prismIndex = prismNonNegativeInteger.compose(
  prism<Index>(constTrue)
);
export const castIndex = castToPrism(prismIndex)(
  (n) => `Invalid cast, index: ${n}`
);
