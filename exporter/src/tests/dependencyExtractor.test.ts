import { describe, it, expect } from 'vitest';
import type { ScriptGraph } from '../models/scriptAsset.js';
import { extractDependencies } from '../services/dependencyExtractor.js';
import { makeNode, makePort } from './helpers.js';

function callGraph(name: string, parents: Array<string | undefined>): ScriptGraph {
  return {
    name,
    nodes: parents.map((parent, i) =>
      makeNode(`Call${i}`, 'K2Node_CallFunction', [], {
        functionReference: { memberName: `Fn${i}`, ...(parent !== undefined ? { memberParent: parent } : {}) },
      }),
    ),
    ports: [],
    wires: [],
  };
}

describe('extractDependencies', () => {
  it('keeps the first occurrence of each path', () => {
    expect(extractDependencies([callGraph('G', ['/Game/A', '/Game/B', '/Game/A', '/Game/C'])])).toEqual([
      '/Game/A',
      '/Game/B',
      '/Game/C',
    ]);
  });

  it('walks graphs in order', () => {
    const graphs = [callGraph('First', ['/Game/B']), callGraph('Second', ['/Game/A', '/Game/B'])];
    expect(extractDependencies(graphs)).toEqual(['/Game/B', '/Game/A']);
  });

  it('skips calls without an owning type', () => {
    expect(extractDependencies([callGraph('G', [undefined, ''])])).toEqual([]);
  });

  it('records default objects of object-typed ports only', () => {
    const graph: ScriptGraph = {
      name: 'G',
      nodes: [makeNode('Spawn', 'K2Node_SpawnActor', [0, 1, 2])],
      ports: [
        makePort('Class', 'input', 0, 'object', { defaultObject: '/Game/Enemies/Goblin.Goblin_C' }),
        makePort('Owner', 'input', 0, 'object'),
        makePort('Label', 'input', 0, 'string', { defaultObject: '/Game/Ignored.Ignored' }),
      ],
      wires: [],
    };
    expect(extractDependencies([graph])).toEqual(['/Game/Enemies/Goblin.Goblin_C']);
  });

  it('ignores owning types of nodes that are not function calls', () => {
    const graph: ScriptGraph = {
      name: 'G',
      nodes: [
        makeNode('Get', 'K2Node_VariableGet', [], {
          functionReference: { memberName: 'X', memberParent: '/Game/NotADependency' },
        }),
      ],
      ports: [],
      wires: [],
    };
    expect(extractDependencies([graph])).toEqual([]);
  });

  it('returns nothing for no graphs', () => {
    expect(extractDependencies([])).toEqual([]);
  });
});
