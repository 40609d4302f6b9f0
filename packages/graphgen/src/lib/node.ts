import { Eq } from 'fp-ts/Eq';
import * as ORD from 'fp-ts/Ord';
import * as EQ from 'fp-ts/Eq';
import * as RA from 'fp-ts/ReadonlyArray';
import { pipe } from 'fp-ts/function';
import { invalidParameterError, duplicateEdgeError, missingEdgeError } from './errors';
import { eqNodeId, NodeId, ordNodeId, showNodeId } from './nodeId';

const assertNodeId = (identifier: NodeId): NodeId => {
  if (typeof identifier === 'number' && !Number.isSafeInteger(identifier)) {
    throw invalidParameterError('identifier', identifier, `Node identifiers must be integers or strings, got ${identifier}`);
  }
  return identifier;
};

/**
 * A vertex and the identifiers of its neighbours.
 * Neighbours are backlinks into the owning graph's node pool; the graph alone owns the nodes.
 * Mutating a node touches only its own adjacency, symmetry is the graph's job.
 */
export class GraphNode {
  readonly identifier: NodeId;
  protected readonly adjacency = new Set<NodeId>();

  constructor(identifier: NodeId) {
    this.identifier = assertNodeId(identifier);
  }

  degree(): number {
    return this.adjacency.size;
  }

  hasEdgeTo(other: GraphNode): boolean {
    return this.adjacency.has(other.identifier);
  }

  addEdge(other: GraphNode) {
    if (this.hasEdgeTo(other)) throw duplicateEdgeError(this.identifier, other.identifier);
    this.adjacency.add(other.identifier);
  }

  removeEdge(other: GraphNode) {
    if (!this.hasEdgeTo(other)) throw missingEdgeError(this.identifier, other.identifier);
    this.adjacency.delete(other.identifier);
  }

  neighbors(): ReadonlyArray<NodeId> {
    return pipe([...this.adjacency], RA.sort(ordNodeId));
  }

  equals(other: GraphNode): boolean {
    return eqGraphNode.equals(this, other);
  }

  toString() {
    return showNodeId.show(this.identifier);
  }
}

export const eqGraphNode: Eq<GraphNode> = pipe(
  eqNodeId,
  EQ.contramap((node: GraphNode) => node.identifier)
);

export const ordGraphNode: ORD.Ord<GraphNode> = pipe(
  ordNodeId,
  ORD.contramap((node: GraphNode) => node.identifier)
);
