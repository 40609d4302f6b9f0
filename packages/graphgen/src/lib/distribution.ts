import * as RA from 'fp-ts/ReadonlyArray';
import * as NEA from 'fp-ts/NonEmptyArray';
import { pipe } from 'fp-ts/function';
import { prismNonNegativeInteger } from 'newtype-ts/lib/NonNegativeInteger';
import { castToPrism } from '@netsci/utils/prism';
import { emptyInputError, invalidParameterError } from './errors';

const sum = (xs: ReadonlyArray<number>) => xs.reduce((a, b) => a + b, 0);

/**
 * Degree counts to probabilities. The node count is the histogram total;
 * a graph without nodes has the distribution [1].
 */
export const normalize = (histogram: ReadonlyArray<number>): ReadonlyArray<number> => {
  const nodes = sum(histogram);
  if (nodes === 0) return [1.0];
  return pipe(
    histogram,
    RA.map((count) => count / nodes)
  );
};

export const cumulative = (sequence: ReadonlyArray<number>): ReadonlyArray<number> =>
  pipe(
    sequence,
    RA.scanLeft(0, (acc, x) => acc + x),
    RA.dropLeft(1)
  );

const castMaxDegree = castToPrism(prismNonNegativeInteger)((v) =>
  invalidParameterError('maxDegree', v, `Maximum degree must be a non-negative integer, got ${v}`)
);

/**
 * P(k) ∝ k^-gamma for k in 1..maxDegree, scaled so that Σ k·P(k) = 1, with P(0) = 0 in front.
 */
export const powerLawHistogram = (maxDegree: number, gamma: number): ReadonlyArray<number> => {
  const maxDegree_ = prismNonNegativeInteger.reverseGet(castMaxDegree(maxDegree));
  if (maxDegree_ === 0) return [0.0];
  const raw = pipe(
    NEA.range(1, maxDegree_),
    NEA.map((k) => k ** -gamma)
  );
  const normalization = sum(raw.map((p, i) => (i + 1) * p));
  return [0.0, ...raw.map((p) => p / normalization)];
};

/**
 * Largest gap between the two cumulative distributions, compared over the shorter length only.
 * Pad with `padHistograms` first to compare the whole range.
 */
export const ksDistance = (histogramA: ReadonlyArray<number>, histogramB: ReadonlyArray<number>): number => {
  if (histogramA.length === 0 || histogramB.length === 0) {
    throw emptyInputError('Kolmogorov-Smirnov distance needs two non-empty histograms');
  }
  return pipe(
    RA.zipWith(cumulative(histogramA), cumulative(histogramB), (a, b) => Math.abs(a - b)),
    RA.reduce(0, Math.max)
  );
};

export const padHistograms = (
  histograms: ReadonlyArray<ReadonlyArray<number>>
): ReadonlyArray<ReadonlyArray<number>> => {
  const longest = histograms.reduce((max, h) => Math.max(max, h.length), 0);
  return pipe(
    histograms,
    RA.map((h) => [...h, ...Array.from({ length: longest - h.length }, () => 0)])
  );
};
