import { prismNonNegativeInteger } from 'newtype-ts/lib/NonNegativeInteger';
import { castToPrism } from '@netsci/utils/prism';
import { invalidParameterError } from './errors';

// counts coming from callers: a bad one is their error, not a panic
export const castCount = (parameter: string) =>
  castToPrism(prismNonNegativeInteger)((v) =>
    invalidParameterError(parameter, v, `${parameter} must be a non-negative integer, got ${v}`)
  );
