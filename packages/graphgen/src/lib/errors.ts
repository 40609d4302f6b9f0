import { Data } from 'effect';
import { NodeId, showNodeId } from './nodeId';

export class DuplicateNodeError extends Data.TaggedError('DuplicateNodeError')<{
  readonly identifier: NodeId;
  readonly message: string;
}> {}

export class NodeNotFoundError extends Data.TaggedError('NodeNotFoundError')<{
  readonly identifier: NodeId;
  readonly message: string;
}> {}

export class DuplicateEdgeError extends Data.TaggedError('DuplicateEdgeError')<{
  readonly from: NodeId;
  readonly to: NodeId;
  readonly message: string;
}> {}

export class MissingEdgeError extends Data.TaggedError('MissingEdgeError')<{
  readonly from: NodeId;
  readonly to: NodeId;
  readonly message: string;
}> {}

export class SelfEdgeNotAllowedError extends Data.TaggedError('SelfEdgeNotAllowedError')<{
  readonly identifier: NodeId;
  readonly message: string;
}> {}

export class InvalidParameterError extends Data.TaggedError('InvalidParameterError')<{
  readonly parameter: string;
  readonly value: unknown;
  readonly message: string;
}> {}

export class EmptyInputError extends Data.TaggedError('EmptyInputError')<{
  readonly message: string;
}> {}

const show = showNodeId.show;

export const duplicateNodeError = (identifier: NodeId) =>
  new DuplicateNodeError({ identifier, message: `The graph already has a node with identifier ${show(identifier)}` });

export const nodeNotFoundError = (identifier: NodeId) =>
  new NodeNotFoundError({ identifier, message: `There is no node ${show(identifier)} in the graph` });

export const duplicateEdgeError = (from: NodeId, to: NodeId) =>
  new DuplicateEdgeError({ from, to, message: `The edge from ${show(from)} to ${show(to)} already exists` });

export const missingEdgeError = (from: NodeId, to: NodeId) =>
  new MissingEdgeError({ from, to, message: `The edge from ${show(from)} to ${show(to)} does not exist` });

export const selfEdgeNotAllowedError = (identifier: NodeId) =>
  new SelfEdgeNotAllowedError({
    identifier,
    message: `The graph does not allow self-edges, got one on ${show(identifier)}`,
  });

export const invalidParameterError = (parameter: string, value: unknown, message: string) =>
  new InvalidParameterError({ parameter, value, message });

export const emptyInputError = (message: string) => new EmptyInputError({ message });
