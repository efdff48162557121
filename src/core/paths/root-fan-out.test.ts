import { describe, it, expect, vi } from 'vitest';
import { RootFanOut, flattenRootPaths } from './root-fan-out.js';
import { PairFanOut } from './pair-fan-out.js';
import { DependencyGraph } from '../../data/dependency-graph.js';

function graphOf(edges: Record<string, string[]>): DependencyGraph {
  return new DependencyGraph(Object.entries(edges));
}

describe('RootFanOut', () => {
  it('groups paths by root order, then destination order', async () => {
    const graph = graphOf({
      A1: ['D1', 'D2'],
      A2: ['D2', 'X'],
      X: ['D1'],
    });
    const fanOut = new RootFanOut(new PairFanOut(graph));

    const paths = await fanOut.findAllPaths(['A1', 'A2'], ['D1', 'D2']);

    expect(paths).toEqual([
      ['A1', 'D1'],
      ['A1', 'D2'],
      ['A2', 'X', 'D1'],
      ['A2', 'D2'],
    ]);
  });

  it('resolves a separate adjacency map per root', async () => {
    const graph = graphOf({ A1: ['D'], A2: ['D'] });
    const closure = vi.spyOn(graph, 'closure');
    const successors = vi.spyOn(graph, 'successors');
    const fanOut = new RootFanOut(new PairFanOut(graph));

    await fanOut.findAllPaths(['A1', 'A2'], ['D', 'A1', 'A2']);

    expect(closure.mock.calls).toEqual([['A1'], ['A2']]);
    expect(successors).toHaveBeenCalledTimes(2);
  });

  it('returns the grouped results per root', async () => {
    const fanOut = new RootFanOut(new PairFanOut(graphOf({ A: ['B'] })));

    const groups = await fanOut.findGrouped(['A', 'B'], ['B']);

    expect(groups).toEqual([
      { root: 'A', pairs: [{ root: 'A', destination: 'B', paths: [['A', 'B']] }] },
      { root: 'B', pairs: [{ root: 'B', destination: 'B', paths: [['B']] }] },
    ]);
  });

  it('does no graph work when no roots were selected', async () => {
    const graph = graphOf({ A: ['B'] });
    const closure = vi.spyOn(graph, 'closure');
    const fanOut = new RootFanOut(new PairFanOut(graph));

    expect(await fanOut.findAllPaths([], ['B'])).toEqual([]);
    expect(closure).not.toHaveBeenCalled();
  });

  it('fails as a whole when one root fails', async () => {
    const graph = graphOf({ A: ['B'], C: ['B'] });
    vi.spyOn(graph, 'closure').mockImplementation(async (root) => {
      if (root === 'C') throw new Error('cannot resolve C');
      return [root, 'B'];
    });
    const fanOut = new RootFanOut(new PairFanOut(graph));

    await expect(fanOut.findAllPaths(['A', 'C'], ['B'])).rejects.toThrow('cannot resolve C');
  });
});

describe('flattenRootPaths', () => {
  it('keeps discovery order inside each pair', () => {
    expect(
      flattenRootPaths([
        {
          root: 'A',
          pairs: [
            { root: 'A', destination: 'C', paths: [['A', 'C'], ['A', 'B', 'C']] },
            { root: 'A', destination: 'B', paths: [['A', 'B']] },
          ],
        },
        { root: 'Z', pairs: [{ root: 'Z', destination: 'C', paths: [] }] },
      ]),
    ).toEqual([['A', 'C'], ['A', 'B', 'C'], ['A', 'B']]);
  });
});
