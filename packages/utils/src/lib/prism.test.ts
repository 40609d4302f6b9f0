import { castToPrism } from './prism';
import { prismNonNegativeInteger } from 'newtype-ts/lib/NonNegativeInteger';
import { castNonNegativeInteger, castPositiveInteger } from './number/integer';

class CountError extends Error {}

describe('castToPrism', () => {
  it('returns the value when the prism accepts it', () => {
    expect(prismNonNegativeInteger.reverseGet(castNonNegativeInteger(3))).toBe(3);
  });

  it('throws an Error with the produced message', () => {
    expect(() => castPositiveInteger(0)).toThrow('Invalid cast, integer not positive: 0');
  });

  it('throws the produced error as is', () => {
    const cast = castToPrism(prismNonNegativeInteger)((v) => new CountError(`bad count ${v}`));
    expect(() => cast(-1)).toThrow(CountError);
    expect(() => cast(1.5)).toThrow('bad count 1.5');
  });

  it('falls back to a generic message', () => {
    expect(() => castToPrism(prismNonNegativeInteger)()(-2)).toThrow('Invalid cast, value not in prism: -2');
  });
});
