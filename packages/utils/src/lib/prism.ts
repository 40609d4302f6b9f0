import { Prism } from 'monocle-ts';
import { pipe } from 'fp-ts/function';
import { isNone, Option } from 'fp-ts/Option';

export const getFromOptionC =
  <E extends Error = Error>(e?: string | (() => E)) =>
  <A>(o: Option<A>): A => {
    if (isNone(o)) {
      if (typeof e === 'function') throw e();
      throw new Error(e || 'panic! getFromOption: None');
    }
    return o.value;
  };

// a string becomes the message of a plain Error; an Error is thrown as is
export type CastFailure<From> = string | ((v: From) => string | Error);

const castFailureToError =
  <From>(e: CastFailure<From> | undefined) =>
  (v: From) =>
  (): Error => {
    const failure = typeof e === 'function' ? e(v) : e;
    return failure instanceof Error ? failure : new Error(failure || `Invalid cast, value not in prism: ${v}`);
  };

export const castToPrism =
  <From, To>(p: Prism<From, To>) =>
  (e?: CastFailure<From>) =>
  (v: From): To =>
    pipe(v, p.getOption, getFromOptionC(castFailureToError(e)(v)));
