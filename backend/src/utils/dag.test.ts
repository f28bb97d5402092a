import { describe, it, expect } from 'vitest';
import { DirectedGraph } from './dag.js';

describe('DirectedGraph', () => {
  describe('nodes and edges', () => {
    it('should keep nodes in insertion order', () => {
      const g = new DirectedGraph();
      g.addNode('c');
      g.addNode('a');
      g.addNode('b');
      expect(g.nodes()).toEqual(['c', 'a', 'b']);
    });

    it('should ignore a duplicate node', () => {
      const g = new DirectedGraph();
      g.addNode('a');
      g.addNode('a');
      expect(g.nodeCount).toBe(1);
    });

    it('should create missing endpoints when adding an edge', () => {
      const g = new DirectedGraph();
      g.addEdge('a', 'b');
      expect(g.nodes()).toEqual(['a', 'b']);
      expect(g.hasEdge('a', 'b')).toBe(true);
      expect(g.hasEdge('b', 'a')).toBe(false);
    });

    it('should report successors and predecessors', () => {
      const g = DirectedGraph.fromEdges([['a', 'b'], ['a', 'c'], ['b', 'c']]);
      expect(g.successors('a')).toEqual(['b', 'c']);
      expect(g.predecessors('c')).toEqual(['a', 'b']);
      expect(g.successors('missing')).toEqual([]);
    });

    it('should count a self-loop twice in degree', () => {
      const g = DirectedGraph.fromEdges([['a', 'a']]);
      expect(g.hasSelfLoop('a')).toBe(true);
      expect(g.degree('a')).toBe(2);
      expect(g.edgeCount).toBe(1);
    });
  });

  describe('removal', () => {
    it('should remove a node with its edges', () => {
      const g = DirectedGraph.fromEdges([['a', 'b'], ['b', 'c']]);
      expect(g.removeNode('b')).toBe(true);
      expect(g.nodes()).toEqual(['a', 'c']);
      expect(g.edgeCount).toBe(0);
      expect(g.outDegree('a')).toBe(0);
    });

    it('should return false when removing an absent edge', () => {
      const g = DirectedGraph.fromEdges([['a', 'b']]);
      expect(g.removeEdge('b', 'a')).toBe(false);
      expect(g.removeEdge('a', 'b')).toBe(true);
      expect(g.nodes()).toEqual(['a', 'b']);
    });
  });

  describe('renameNode', () => {
    it('should relabel in place and keep edges', () => {
      const g = DirectedGraph.fromEdges([['a', 'b'], ['b', 'c'], ['b', 'b']]);
      expect(g.renameNode('b', 'x')).toBe(true);
      expect(g.nodes()).toEqual(['a', 'x', 'c']);
      expect(g.edges()).toEqual([
        { src: 'a', dst: 'x' },
        { src: 'x', dst: 'c' },
        { src: 'x', dst: 'x' },
      ]);
    });

    it('should refuse to rename onto an existing node', () => {
      const g = DirectedGraph.fromEdges([['a', 'b']]);
      expect(g.renameNode('a', 'b')).toBe(false);
      expect(g.renameNode('missing', 'z')).toBe(false);
    });
  });

  describe('union and subgraph', () => {
    it('should merge two graphs with the first graph nodes first', () => {
      const a = DirectedGraph.fromEdges([['a', 'b']]);
      const b = DirectedGraph.fromEdges([['c', 'd']]);
      const u = DirectedGraph.union(a, b);
      expect(u.nodes()).toEqual(['a', 'b', 'c', 'd']);
      expect(u.edgeCount).toBe(2);
    });

    it('should build an induced subgraph', () => {
      const g = DirectedGraph.fromEdges([['a', 'b'], ['b', 'c'], ['c', 'c']]);
      const sub = g.subgraph(['c', 'b']);
      expect(sub.nodes()).toEqual(['b', 'c']);
      expect(sub.edges()).toEqual([{ src: 'b', dst: 'c' }, { src: 'c', dst: 'c' }]);
    });

    it('should produce an independent clone', () => {
      const g = DirectedGraph.fromEdges([['a', 'b']]);
      const copy = g.clone();
      copy.addEdge('b', 'c');
      expect(g.hasNode('c')).toBe(false);
    });
  });
});
