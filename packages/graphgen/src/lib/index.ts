import { State } from 'fp-ts/State';
import { match } from 'ts-pattern';
import { RngState, Random01 } from '@netsci/utils/rng';
import { Graph } from './graph';
import { GraphSettings } from './settings';
import { uniformRandomGraph } from './uniformRandom';
import { preferentialAttachmentGraph } from './preferentialAttachment';
import { PREFERENTIAL_ATTACHMENT_MODEL_NAME, UNIFORM_RANDOM_MODEL_NAME } from './constants';

export const generateGraph =
  (settings: GraphSettings) =>
  <RNGSTATE = RngState>(random: State<RNGSTATE, Random01>): State<RNGSTATE, Graph> =>
    match(settings)
      .with({ model: UNIFORM_RANDOM_MODEL_NAME }, (s) => uniformRandomGraph(s)(random))
      .with({ model: PREFERENTIAL_ATTACHMENT_MODEL_NAME }, (s) => preferentialAttachmentGraph(s)(random))
      .exhaustive();

export * from './constants';
export * from './errors';
export * from './nodeId';
export { GraphNode, eqGraphNode, ordGraphNode } from './node';
export { Graph, defaultGraphOptions } from './graph';
export type { GraphOptions, NodeRef } from './graph';
export * from './distribution';
export * from './settings';
export * from './uniformRandom';
export * from './preferentialAttachment';
export * from './edgeList';
export * from './render';
export type { GraphModel, RecomputePolicy } from './types';
