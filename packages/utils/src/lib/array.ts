import { fromReadonlyArray, ReadonlyNonEmptyArray } from 'fp-ts/ReadonlyNonEmptyArray';
import { isNone } from 'fp-ts/Option';

export const castReadonlyNonEmptyArray = <T>(a: ReadonlyArray<T>, e?: string): ReadonlyNonEmptyArray<T> => {
  const r = fromReadonlyArray(a);
  if (isNone(r)) throw new Error(e || 'castReadonlyNonEmptyArray expects non-empty array');
  return r.value;
};
