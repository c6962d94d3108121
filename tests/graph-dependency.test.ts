import { describe, expect, it } from 'vitest';

import {
  DependencyGraph,
  ModuleResolver,
  buildDependencyGraph,
  normalizeModulePath
} from '../src/graph/dependency-graph.js';

describe('normalizeModulePath', () => {
  it('drops the extension and dots the directories', () => {
    expect(normalizeModulePath('src/app/main.py')).toBe('src.app.main');
    expect(normalizeModulePath('Dockerfile')).toBe('Dockerfile');
  });
});

describe('ModuleResolver', () => {
  const paths = ['src/app.py', 'src/models/user.py', 'config'];

  it('tries exact paths, then module names, then partial names', () => {
    const resolver = new ModuleResolver(paths, { partialMatch: true });
    expect(resolver.resolve('config')).toBe('config');
    expect(resolver.resolve('src.app')).toBe('src/app.py');
    expect(resolver.resolve('user')).toBe('src/models/user.py');
    expect(resolver.resolve('nothing')).toBeNull();
  });

  it('stops after exact lookups when partial matching is off', () => {
    const resolver = new ModuleResolver(paths, { partialMatch: false });
    expect(resolver.resolve('user')).toBeNull();
    expect(resolver.resolve('src.models.user')).toBe('src/models/user.py');
  });
});

describe('buildDependencyGraph', () => {
  it('links a file to the module it imports', () => {
    const graph = buildDependencyGraph([
      { path: 'a.py', content: 'import b\n' },
      { path: 'b.py', content: 'x = 1\n' }
    ]);
    expect(graph.nodes()).toEqual(['a.py', 'b.py']);
    expect(graph.hasEdge('a.py', 'b.py')).toBe(true);
    expect(graph.upstream('a.py')).toEqual(['b.py']);
    expect(graph.downstream('b.py')).toEqual(['a.py']);
    expect(graph.upstream('b.py')).toEqual([]);
  });

  it('never records a file importing itself', () => {
    const graph = buildDependencyGraph([{ path: 'utils.py', content: 'import utils\n' }]);
    expect(graph.nodes()).toEqual(['utils.py']);
    expect(graph.edgeCount).toBe(0);
  });

  it('links short names loosely through partial matching', () => {
    const files = [
      { path: 'app.py', content: 'import os\n' },
      { path: 'src/posts.py', content: 'x = 1\n' }
    ];
    // "src.posts" contains "os".
    expect(buildDependencyGraph(files).upstream('app.py')).toEqual(['src/posts.py']);
    expect(buildDependencyGraph(files, { partialMatch: false }).upstream('app.py')).toEqual([]);
  });

  it('resolves JavaScript package names against repository files', () => {
    const graph = buildDependencyGraph([
      { path: 'web/main.js', content: "import api from 'api';\nimport React from 'react';\n" },
      { path: 'api.js', content: 'module.exports = {};\n' },
      { path: 'index.js', content: "const c = require('config');\n" },
      { path: 'config', content: 'port=80\n' }
    ]);
    expect(graph.upstream('web/main.js')).toEqual(['api.js']);
    expect(graph.upstream('index.js')).toEqual(['config']);
    expect(graph.downstream('config')).toEqual(['index.js']);
  });

  it('skips records without a path or content', () => {
    const graph = buildDependencyGraph([
      { path: '', content: 'import os' },
      { path: 'empty.py', content: '' }
    ]);
    expect(graph.nodeCount).toBe(0);
  });

  it('keeps upstream and downstream mutually consistent', () => {
    const graph = buildDependencyGraph([
      { path: 'a.py', content: 'import b\nimport c\n' },
      { path: 'b.py', content: 'import c\n' },
      { path: 'c.py', content: 'x = 1\n' }
    ]);
    for (const x of graph.nodes()) {
      for (const y of graph.upstream(x)) expect(graph.downstream(y)).toContain(x);
      for (const y of graph.downstream(x)) expect(graph.upstream(y)).toContain(x);
    }
    expect(graph.downstream('c.py')).toEqual(['a.py', 'b.py']);
  });

  it('returns an empty graph for no input', () => {
    const graph = buildDependencyGraph([]);
    expect(graph.toTransferObject()).toEqual({ nodes: [], edges: {} });
  });
});

describe('DependencyGraph', () => {
  it('ignores duplicate edges and rejects self-loops', () => {
    const graph = new DependencyGraph();
    expect(graph.addEdge('x', 'x')).toBe(false);
    expect(graph.nodeCount).toBe(0);

    expect(graph.addEdge('x', 'y')).toBe(true);
    graph.addEdge('x', 'y');
    expect(graph.edgeCount).toBe(1);
    expect(graph.upstream('missing')).toEqual([]);
  });

  it('serializes only nodes with outgoing edges into the edge map', () => {
    const graph = new DependencyGraph();
    graph.addNode('lonely.py');
    graph.addEdge('b.py', 'a.py');
    graph.addEdge('b.py', 'c.py');
    expect(graph.toTransferObject()).toEqual({
      nodes: ['a.py', 'b.py', 'c.py', 'lonely.py'],
      edges: { 'b.py': ['a.py', 'c.py'] }
    });
  });

  it('rebuilds an equivalent graph from its transfer object', () => {
    const graph = new DependencyGraph();
    graph.addNode('solo.ts');
    graph.addEdge('main.ts', 'lib.ts');
    const copy = DependencyGraph.fromTransferObject(graph.toTransferObject());
    expect(copy.nodes()).toEqual(graph.nodes());
    expect(copy.toTransferObject()).toEqual(graph.toTransferObject());
  });

  it('keeps edges of a node named __proto__ through a round trip', () => {
    const graph = new DependencyGraph();
    graph.addEdge('__proto__', 'b.py');
    const transfer = graph.toTransferObject();
    expect(Object.entries(transfer.edges)).toEqual([['__proto__', ['b.py']]]);

    expect(DependencyGraph.fromTransferObject(transfer).upstream('__proto__')).toEqual(['b.py']);
    const parsed: unknown = JSON.parse(JSON.stringify(transfer));
    expect(DependencyGraph.fromTransferObject(parsed).upstream('__proto__')).toEqual(['b.py']);
  });

  it('rejects malformed transfer objects', () => {
    expect(() => DependencyGraph.fromTransferObject({ nodes: 'x' })).toThrow();
  });
});
