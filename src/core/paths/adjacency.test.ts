import { describe, it, expect, vi } from 'vitest';
import { resolveAdjacencyMap, type AdjacencyProvider } from './adjacency.js';
import { silentProgressSink } from './progress.js';

describe('resolveAdjacencyMap', () => {
  it('builds successor lists for the whole closure, in closure order', async () => {
    const provider: AdjacencyProvider = {
      closure: vi.fn(async () => ['A', 'C', 'B']),
      successors: vi.fn(async () => new Map([
        ['B', ['C']],
        ['A', ['B', 'C']],
      ])),
    };

    const adjacency = await resolveAdjacencyMap(provider, 'A', silentProgressSink);

    expect([...adjacency.keys()]).toEqual(['A', 'C', 'B']);
    expect(adjacency.get('A')).toEqual(['B', 'C']);
    expect(adjacency.get('B')).toEqual(['C']);
    expect(adjacency.get('C')).toEqual([]);
    expect(provider.successors).toHaveBeenCalledWith(['A', 'C', 'B']);
  });

  it('freezes the successor lists', async () => {
    const provider: AdjacencyProvider = {
      closure: async () => ['A'],
      successors: async () => new Map([['A', ['B']]]),
    };

    const adjacency = await resolveAdjacencyMap(provider, 'A', silentProgressSink);

    expect(Object.isFrozen(adjacency.get('A'))).toBe(true);
  });
});
