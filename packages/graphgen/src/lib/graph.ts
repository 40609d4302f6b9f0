import * as RA from 'fp-ts/ReadonlyArray';
import { pipe } from 'fp-ts/function';
import {
  duplicateNodeError,
  invalidParameterError,
  nodeNotFoundError,
  selfEdgeNotAllowedError,
} from './errors';
import { GraphNode, ordGraphNode } from './node';
import { Edge, NodeId, showNodeId } from './nodeId';
import { normalize } from './distribution';

export type NodeRef = NodeId | GraphNode;

export type GraphOptions = {
  undirected?: boolean;
  allowSelfEdges?: boolean;
};

export const defaultGraphOptions = {
  undirected: true,
  allowSelfEdges: false,
} as const satisfies Required<GraphOptions>;

const identifierOf = (ref: NodeRef): NodeId => (ref instanceof GraphNode ? ref.identifier : ref);

/**
 * Owns its nodes; an edge is nothing but presence in the endpoints' adjacency.
 *
 * Undirected graphs keep adjacency symmetric on every mutation. Adding or removing an undirected edge is
 * all-or-nothing: if the mirrored half fails, the first half is undone before the error propagates.
 */
export class Graph {
  readonly undirected: boolean;
  readonly allowSelfEdges: boolean;
  protected readonly nodes = new Map<NodeId, GraphNode>();

  constructor(options: GraphOptions = {}) {
    this.undirected = options.undirected ?? defaultGraphOptions.undirected;
    this.allowSelfEdges = options.allowSelfEdges ?? defaultGraphOptions.allowSelfEdges;
  }

  size(): number {
    return this.nodes.size;
  }

  addNode(ref: NodeRef): GraphNode {
    const node = ref instanceof GraphNode ? ref : new GraphNode(ref);
    if (this.nodes.has(node.identifier)) throw duplicateNodeError(node.identifier);
    if (node.degree() > 0) {
      throw invalidParameterError(
        'node',
        node.identifier,
        `Node ${showNodeId.show(node.identifier)} must join the graph without edges`
      );
    }
    this.nodes.set(node.identifier, node);
    return node;
  }

  // the stored node, never the caller's look-alike
  getNode(ref: NodeRef): GraphNode {
    const identifier = identifierOf(ref);
    const node = this.nodes.get(identifier);
    if (node === undefined) throw nodeNotFoundError(identifier);
    return node;
  }

  hasNode(ref: NodeRef): boolean {
    return this.nodes.has(identifierOf(ref));
  }

  edgeExists(a: NodeRef, b: NodeRef): boolean {
    const from = this.getNode(a);
    const to = this.getNode(b);
    return this.undirected ? from.hasEdgeTo(to) && to.hasEdgeTo(from) : from.hasEdgeTo(to);
  }

  addEdge(a: NodeRef, b: NodeRef) {
    const from = this.getNode(a);
    const to = this.getNode(b);
    if (from === to && !this.allowSelfEdges) throw selfEdgeNotAllowedError(from.identifier);
    from.addEdge(to);
    if (!this.undirected || from === to) return;
    try {
      to.addEdge(from);
    } catch (e) {
      from.removeEdge(to);
      throw e;
    }
  }

  removeEdge(a: NodeRef, b: NodeRef) {
    const from = this.getNode(a);
    const to = this.getNode(b);
    from.removeEdge(to);
    if (!this.undirected || from === to) return;
    try {
      to.removeEdge(from);
    } catch (e) {
      from.addEdge(to);
      throw e;
    }
  }

  degree(ref: NodeRef): number {
    return this.getNode(ref).degree();
  }

  maxDegree(): number {
    let max = 0;
    for (const node of this.nodes.values()) max = Math.max(max, node.degree());
    return max;
  }

  // a self-edge counts once in either kind of graph
  edgeCount(): number {
    let entries = 0;
    let selfEdges = 0;
    for (const node of this.nodes.values()) {
      entries += node.degree();
      if (node.hasEdgeTo(node)) selfEdges++;
    }
    return this.undirected ? (entries - selfEdges) / 2 + selfEdges : entries;
  }

  degreeHistogram(): number[] {
    const histogram = Array.from({ length: this.maxDegree() + 1 }, () => 0);
    for (const node of this.nodes.values()) {
      const degree = node.degree();
      histogram[degree] = (histogram[degree] ?? 0) + 1;
    }
    return histogram;
  }

  normalizedDegreeDistribution(): ReadonlyArray<number> {
    return normalize(this.degreeHistogram());
  }

  sortedNodes(): ReadonlyArray<GraphNode> {
    return pipe([...this.nodes.values()], RA.sort(ordGraphNode));
  }

  /**
   * Every adjacency entry in node order: directed edges once, undirected edges in both orderings,
   * self-edges once.
   */
  *edges(): Generator<Edge> {
    for (const node of this.sortedNodes()) {
      for (const neighbor of node.neighbors()) yield [node.identifier, neighbor];
    }
  }
}
