import { State } from 'fp-ts/State';
import { NonNegativeInteger, prismNonNegativeInteger } from 'newtype-ts/lib/NonNegativeInteger';
import { match } from 'ts-pattern';
import { RngState, Random01 } from '@netsci/utils/rng';
import { weightedIndex } from '@netsci/utils/rng/sample';
import { prismIndex } from '@netsci/utils/list';
import { castNonNegativeInteger, ONE } from '@netsci/utils/number/integer';
import { castReadonlyNonEmptyArray } from '@netsci/utils/array';
import { assertExists, panic } from '@netsci/utils/index';
import { ReadonlyNonEmptyArray } from 'fp-ts/ReadonlyNonEmptyArray';
import { Graph } from './graph';
import { GraphNode } from './node';
import { castCount } from './parameters';
import { RECOMPUTE_PER_EDGE, RECOMPUTE_PER_NODE } from './constants';
import { RecomputePolicy } from './types';

export type PreferentialAttachmentGraphSettings = {
  nodes: number;
  edgesPerStep: number;
  recompute?: RecomputePolicy;
};

/**
 * Current degrees of the candidates; with no edges among them yet, everyone weighs the same.
 */
export const attachmentWeights = (
  candidates: ReadonlyNonEmptyArray<GraphNode>
): ReadonlyNonEmptyArray<NonNegativeInteger> => {
  const degrees = candidates.map((node) => castNonNegativeInteger(node.degree()));
  const total = degrees.reduce((acc, d) => acc + prismNonNegativeInteger.reverseGet(d), 0);
  return castReadonlyNonEmptyArray(total === 0 ? candidates.map(() => ONE) : degrees);
};

const positiveWeights = (weights: ReadonlyArray<NonNegativeInteger>) =>
  weights.filter((w) => prismNonNegativeInteger.reverseGet(w) > 0).length;

const attach =
  (graph: Graph, newNode: GraphNode, candidates: ReadonlyNonEmptyArray<GraphNode>, targets: number, recompute: RecomputePolicy) =>
  <RNGSTATE>(random: State<RNGSTATE, Random01>): State<RNGSTATE, void> =>
  (state0) => {
    const refresh = match(recompute)
      .with(RECOMPUTE_PER_NODE, () => false)
      .with(RECOMPUTE_PER_EDGE, () => true)
      .exhaustive();
    let weights = attachmentWeights(candidates);
    if (positiveWeights(weights) < targets) {
      return panic(`${targets} targets requested for node ${newNode} but only ${positiveWeights(weights)} can be drawn`);
    }
    let state = state0;
    let connected = 0;
    while (connected < targets) {
      const [ix, state1] = weightedIndex(weights)(random)(state);
      state = state1;
      const target = assertExists(candidates[prismIndex.reverseGet(ix)], `panic! no candidate at ${ix}`);
      // already chosen in this step
      if (graph.edgeExists(newNode, target)) continue;
      graph.addEdge(newNode, target);
      connected++;
      if (refresh) weights = attachmentWeights(candidates);
    }
    return [undefined, state];
  };

/**
 * Scale-free growth. `nodes` disconnected seed nodes (0..nodes-1), then `nodes` growth steps: step i adds
 * node `nodes + i` and links it to min(edgesPerStep, i + 1) distinct earlier nodes drawn proportionally to degree.
 *
 * `recompute: 'per-node'` (default) weighs the candidates once per new node, before any of its edges exist;
 * `'per-edge'` reweighs after every edge of the step. The new node is never its own candidate.
 */
export const preferentialAttachmentGraph = (settings: PreferentialAttachmentGraphSettings) => {
  const nodes = prismNonNegativeInteger.reverseGet(castCount('nodes')(settings.nodes));
  const edgesPerStep = prismNonNegativeInteger.reverseGet(castCount('edgesPerStep')(settings.edgesPerStep));
  const recompute = settings.recompute ?? RECOMPUTE_PER_NODE;
  return <RNGSTATE = RngState>(random: State<RNGSTATE, Random01>): State<RNGSTATE, Graph> =>
    (state0) => {
      const graph = new Graph({ undirected: true, allowSelfEdges: false });
      const existing: GraphNode[] = [];
      for (let i = 0; i < nodes; i++) existing.push(graph.addNode(i));
      let state = state0;
      for (let i = 0; i < nodes; i++) {
        const newNode = graph.addNode(nodes + i);
        const targets = Math.min(edgesPerStep, i + 1);
        const candidates = castReadonlyNonEmptyArray(existing, 'panic! growth without seed nodes');
        const [, state1] = attach(graph, newNode, candidates, targets, recompute)(random)(state);
        state = state1;
        existing.push(newNode);
      }
      return [graph, state];
    };
};
