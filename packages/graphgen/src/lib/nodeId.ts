import { Eq } from 'fp-ts/Eq';
import { fromCompare, Ord } from 'fp-ts/Ord';
import { Show } from 'fp-ts/Show';
import * as N from 'fp-ts/number';
import * as Str from 'fp-ts/string';
import { match, P } from 'ts-pattern';

/**
 * Node identifiers are integers or strings. `1` and `'1'` are different identifiers.
 */
export type NodeId = number | string;

export type Edge = readonly [from: NodeId, to: NodeId];

export const isIntegerNodeId = (id: NodeId): id is number => typeof id === 'number';

export const eqNodeId: Eq<NodeId> = {
  equals: (a, b) => a === b,
};

// integers first, each kind in its natural order
export const ordNodeId: Ord<NodeId> = fromCompare((a, b) =>
  match([a, b] as const)
    .with([P.number, P.number], ([x, y]) => N.Ord.compare(x, y))
    .with([P.number, P.string], () => -1 as const)
    .with([P.string, P.number], () => 1 as const)
    .with([P.string, P.string], ([x, y]) => Str.Ord.compare(x, y))
    .exhaustive()
);

// strings quoted so 1 and '1' read differently
export const showNodeId: Show<NodeId> = {
  show: (id) => (isIntegerNodeId(id) ? `${id}` : `'${id}'`),
};
