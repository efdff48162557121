import { describe, it, expect } from 'vitest';
import {
  addressDirectory,
  parseNodePattern,
  selectNodes,
} from './node-selector.js';
import { InvalidPatternError } from '../shared/errors.js';

const source = {
  nodes: [
    'src/app:main',
    'src/app:cli',
    'src/app/sub:x',
    'src/application:other',
    'src/lib:util',
    '3rdparty:yaml',
  ],
};

describe('parseNodePattern', () => {
  it('recognises each pattern form', () => {
    expect(parseNodePattern('::')).toEqual({ kind: 'all' });
    expect(parseNodePattern('src/app::')).toEqual({ kind: 'recursive', dir: 'src/app' });
    expect(parseNodePattern('src/app:')).toEqual({ kind: 'directory', dir: 'src/app' });
    expect(parseNodePattern(' src/app:main ')).toEqual({ kind: 'address', address: 'src/app:main' });
  });

  it('strips a leading // from directories', () => {
    expect(parseNodePattern('//src/app::')).toEqual({ kind: 'recursive', dir: 'src/app' });
  });

  it('rejects a blank pattern', () => {
    expect(() => parseNodePattern('   ')).toThrow(InvalidPatternError);
  });
});

describe('addressDirectory', () => {
  it('takes everything before the last colon', () => {
    expect(addressDirectory('src/app:main')).toBe('src/app');
  });

  it('uses the whole address when there is no colon', () => {
    expect(addressDirectory('src/app')).toBe('src/app');
  });
});

describe('selectNodes', () => {
  it('selects every node with ::', () => {
    expect(selectNodes(source, '::')).toEqual(source.nodes);
  });

  it('selects a subtree without matching sibling prefixes', () => {
    expect(selectNodes(source, 'src/app::')).toEqual([
      'src/app:main',
      'src/app:cli',
      'src/app/sub:x',
    ]);
  });

  it('selects one directory only', () => {
    expect(selectNodes(source, 'src/app:')).toEqual(['src/app:main', 'src/app:cli']);
  });

  it('selects an exact address', () => {
    expect(selectNodes(source, 'src/lib:util')).toEqual(['src/lib:util']);
  });

  it('returns nothing for a pattern without matches', () => {
    expect(selectNodes(source, 'src/missing::')).toEqual([]);
    expect(selectNodes(source, 'src/lib:missing')).toEqual([]);
  });
});
