import { State } from 'fp-ts/State';
import { prismNonNegativeInteger } from 'newtype-ts/lib/NonNegativeInteger';
import { RngState, Random01 } from '@netsci/utils/rng';
import { randomDistinctPair } from '@netsci/utils/rng/sample';
import { castListLength, prismIndex } from '@netsci/utils/list';
import { Graph } from './graph';
import { invalidParameterError } from './errors';
import { castCount } from './parameters';

export type UniformRandomGraphSettings = {
  nodes: number;
  edges: number;
};

export const maxUndirectedEdges = (nodes: number): number => Math.max(0, (nodes * (nodes - 1)) / 2);

// undefined when the edge count fits
export const edgeLimitViolation = (nodes: number, edges: number): string | undefined => {
  const maxEdges = maxUndirectedEdges(nodes);
  return edges > maxEdges
    ? `The number of edges (${edges}) is higher than is possible (${maxEdges}) for an undirected graph with ${nodes} nodes`
    : undefined;
};

const complete = (graph: Graph, nodes: number) => {
  for (let i = 0; i < nodes; i++) {
    for (let j = i + 1; j < nodes; j++) graph.addEdge(i, j);
  }
};

/**
 * Undirected, no self-edges: `nodes` nodes with identifiers 0..nodes-1 and exactly `edges` distinct edges,
 * each drawn as a uniformly random pair and redrawn when already present.
 * Asking for every possible edge skips sampling and connects all pairs.
 */
export const uniformRandomGraph = (settings: UniformRandomGraphSettings) => {
  const nodes = prismNonNegativeInteger.reverseGet(castCount('nodes')(settings.nodes));
  const edges = prismNonNegativeInteger.reverseGet(castCount('edges')(settings.edges));
  const maxEdges = maxUndirectedEdges(nodes);
  const violation = edgeLimitViolation(nodes, edges);
  if (violation !== undefined) throw invalidParameterError('edges', edges, violation);
  return <RNGSTATE = RngState>(random: State<RNGSTATE, Random01>): State<RNGSTATE, Graph> =>
    (state0) => {
      const graph = new Graph({ undirected: true, allowSelfEdges: false });
      for (let i = 0; i < nodes; i++) graph.addNode(i);
      if (edges === maxEdges) {
        complete(graph, nodes);
        return [graph, state0];
      }
      if (edges === 0) return [graph, state0];
      const pair = randomDistinctPair(castListLength(nodes))(random);
      let state = state0;
      let established = 0;
      while (established < edges) {
        const [[i, j], state1] = pair(state);
        state = state1;
        const i_ = prismIndex.reverseGet(i);
        const j_ = prismIndex.reverseGet(j);
        if (graph.edgeExists(i_, j_)) continue;
        graph.addEdge(i_, j_);
        established++;
      }
      return [graph, state];
    };
};
