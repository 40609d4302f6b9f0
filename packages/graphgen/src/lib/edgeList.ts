import { DEFAULT_EDGE_LIST_DELIMITER } from './constants';
import { DuplicateEdgeError, SelfEdgeNotAllowedError } from './errors';
import { Graph, GraphOptions } from './graph';
import { NodeId } from './nodeId';

export type IdentifierParsing = 'infer' | 'string';

export type ExportEdgeListOptions = {
  delimiter?: string;
};

export type ImportEdgeListOptions = GraphOptions & {
  delimiter?: string;
  identifiers?: IdentifierParsing;
};

const INTEGER_LITERAL = /^-?\d+$/;

export const parseNodeId =
  (identifiers: IdentifierParsing) =>
  (column: string): NodeId => {
    if (identifiers === 'string' || !INTEGER_LITERAL.test(column)) return column;
    const n = Number(column);
    // '-0' and '007' would come back from export as '0' and '7'
    return Number.isSafeInteger(n) && String(n) === column ? n : column;
  };

/**
 * Two columns per row, one row per adjacency entry (so both orderings of an undirected edge).
 * Isolated nodes have no row.
 */
export const exportEdgeList = (graph: Graph, { delimiter = DEFAULT_EDGE_LIST_DELIMITER }: ExportEdgeListOptions = {}) => {
  const rows: string[] = [];
  for (const [from, to] of graph.edges()) rows.push(`${from}${delimiter}${to}\n`);
  return rows.join('');
};

const addEdgeTolerantly = (graph: Graph, from: NodeId, to: NodeId) => {
  try {
    graph.addEdge(from, to);
  } catch (e) {
    // upstream data repeats edges and may carry loops the graph refuses
    if (e instanceof DuplicateEdgeError || e instanceof SelfEdgeNotAllowedError) return;
    throw e;
  }
};

/**
 * Rows without exactly two non-empty columns are skipped, repeated nodes and edges are ignored.
 * With `identifiers: 'infer'` columns written the way `exportEdgeList` writes an integer become integer
 * identifiers; `'string'` keeps every column as text.
 */
export const importEdgeList = (text: string, options: ImportEdgeListOptions = {}): Graph => {
  const { delimiter = DEFAULT_EDGE_LIST_DELIMITER, identifiers = 'infer', ...graphOptions } = options;
  const parse = parseNodeId(identifiers);
  const graph = new Graph(graphOptions);
  for (const line of text.split('\n')) {
    const columns = line.replace(/\r$/, '').split(delimiter);
    const [a, b] = columns;
    if (columns.length !== 2 || !a || !b) continue;
    const from = parse(a);
    const to = parse(b);
    if (!graph.hasNode(from)) graph.addNode(from);
    if (!graph.hasNode(to)) graph.addNode(to);
    addEdgeTolerantly(graph, from, to);
  }
  return graph;
};
