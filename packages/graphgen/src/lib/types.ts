import * as S from '@effect/schema/Schema';
import { GRAPH_MODELS, RECOMPUTE_POLICIES } from '@netsci/graphgen/constants';

export const GraphModelSchema = S.Literal(...GRAPH_MODELS);
export type GraphModel = typeof GraphModelSchema.Type;

export const RecomputePolicySchema = S.Literal(...RECOMPUTE_POLICIES);
export type RecomputePolicy = typeof RecomputePolicySchema.Type;

export const CountSchema = S.Number.pipe(S.int(), S.nonNegative());
