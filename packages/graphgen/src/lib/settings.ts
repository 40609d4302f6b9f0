import * as S from '@effect/schema/Schema';
import { Either, pipe } from 'effect';
import { identity } from 'fp-ts/function';
import { PREFERENTIAL_ATTACHMENT_MODEL_NAME, RECOMPUTE_PER_NODE, UNIFORM_RANDOM_MODEL_NAME } from './constants';
import { CountSchema, RecomputePolicySchema } from './types';
import { InvalidParameterError, invalidParameterError } from './errors';
import { edgeLimitViolation } from './uniformRandom';

export const UniformRandomSettingsSchema = S.Struct({
  model: S.Literal(UNIFORM_RANDOM_MODEL_NAME),
  nodes: CountSchema,
  edges: CountSchema,
}).pipe(S.filter((s) => edgeLimitViolation(s.nodes, s.edges) ?? true));

export const PreferentialAttachmentSettingsSchema = S.Struct({
  model: S.Literal(PREFERENTIAL_ATTACHMENT_MODEL_NAME),
  nodes: CountSchema,
  edgesPerStep: CountSchema,
  recompute: S.optionalWith(RecomputePolicySchema, { default: () => RECOMPUTE_PER_NODE }),
});

export const GraphSettingsSchema = S.Union(UniformRandomSettingsSchema, PreferentialAttachmentSettingsSchema);

export type GraphSettings = typeof GraphSettingsSchema.Type;

export const defaultGraphSettings: GraphSettings = {
  model: PREFERENTIAL_ATTACHMENT_MODEL_NAME,
  nodes: 30,
  edgesPerStep: 2,
  recompute: RECOMPUTE_PER_NODE,
};

export const decodeGraphSettings = (input: unknown): Either.Either<GraphSettings, InvalidParameterError> =>
  pipe(
    S.decodeUnknownEither(GraphSettingsSchema)(input),
    Either.mapLeft((e) => invalidParameterError('settings', input, e.message))
  );

export const parseGraphSettings = (input: unknown): GraphSettings =>
  Either.getOrThrowWith(decodeGraphSettings(input), identity);
