import { GraphNode, eqGraphNode } from './node';
import { DuplicateEdgeError, InvalidParameterError, MissingEdgeError } from './errors';

describe('GraphNode', () => {
  it('starts without neighbours', () => {
    const node = new GraphNode('a');
    expect(node.degree()).toBe(0);
    expect(node.neighbors()).toEqual([]);
  });

  it('adds an edge on its own side only', () => {
    const a = new GraphNode('a');
    const b = new GraphNode('b');
    a.addEdge(b);
    expect(a.hasEdgeTo(b)).toBe(true);
    expect(b.hasEdgeTo(a)).toBe(false);
    expect(a.degree()).toBe(1);
    expect(b.degree()).toBe(0);
  });

  it('refuses a duplicate edge', () => {
    const a = new GraphNode(1);
    const b = new GraphNode(2);
    a.addEdge(b);
    expect(() => a.addEdge(b)).toThrow(DuplicateEdgeError);
    expect(() => a.addEdge(new GraphNode(2))).toThrow('The edge from 1 to 2 already exists');
  });

  it('removes an existing edge and refuses a missing one', () => {
    const a = new GraphNode(1);
    const b = new GraphNode('b');
    a.addEdge(b);
    a.removeEdge(b);
    expect(a.hasEdgeTo(b)).toBe(false);
    expect(() => a.removeEdge(b)).toThrow(MissingEdgeError);
    expect(() => a.removeEdge(b)).toThrow("The edge from 1 to 'b' does not exist");
  });

  it('is equal to another node with the same identifier', () => {
    expect(new GraphNode(3).equals(new GraphNode(3))).toBe(true);
    expect(eqGraphNode.equals(new GraphNode(3), new GraphNode('3'))).toBe(false);
  });

  it('lists neighbours in identifier order', () => {
    const hub = new GraphNode(0);
    for (const id of ['z', 5, 'a', 2]) hub.addEdge(new GraphNode(id));
    expect(hub.neighbors()).toEqual([2, 5, 'a', 'z']);
  });

  it('refuses identifiers that are not integers', () => {
    expect(() => new GraphNode(1.5)).toThrow(InvalidParameterError);
    expect(() => new GraphNode(Number.NaN)).toThrow(InvalidParameterError);
  });
});
