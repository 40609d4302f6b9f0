import { Graph } from './graph';
import { showNodeId } from './nodeId';

const describeKind = (graph: Graph) =>
  [
    graph.undirected ? 'undirected' : 'directed',
    graph.allowSelfEdges ? 'self-edges allowed' : 'no self-edges allowed',
  ].join(', ');

/**
 * Sorted adjacency listing, e.g.
 *
 * ```
 * Graph (undirected, no self-edges allowed)
 *     1 <--> 'b'
 *   'a' <--> no edges
 *   'b' <--> 1
 * ```
 */
export const renderGraph = (graph: Graph): string => {
  const header = `Graph (${describeKind(graph)})`;
  const nodes = graph.sortedNodes();
  if (nodes.length === 0) return `${header}: empty`;
  const arrow = graph.undirected ? '<-->' : '-->';
  const labels = nodes.map((node) => showNodeId.show(node.identifier));
  const width = labels.reduce((max, label) => Math.max(max, label.length), 0) + 2;
  const rows = nodes.map((node, i) => {
    const neighbors = node.neighbors().map(showNodeId.show).join(', ');
    return `${(labels[i] ?? '').padStart(width)} ${arrow} ${neighbors || 'no edges'}`;
  });
  return [header, ...rows].join('\n');
};
