/**
 * Unit tests for core/dependencyGraph.ts
 */

import { describe, it, expect } from 'vitest';
import { DependencyGraph } from '@core/dependencyGraph';
import {
  CycleDetectedError,
  DuplicateTestCaseError,
  UndefinedDependencyError,
} from '@core/errors';
import { testCase } from '../../helpers/fixtures';

describe('DependencyGraph', () => {
  it('should order dependencies first and keep definition order between independent cases', () => {
    const graph = new DependencyGraph([
      testCase('c', { dependencies: ['b'] }),
      testCase('a'),
      testCase('b', { dependencies: ['a'] }),
      testCase('d'),
    ]);

    expect(graph.topologicalOrder()).toEqual(['a', 'd', 'b', 'c']);
  });

  it('should place every case after all of its dependencies', () => {
    const cases = [
      testCase('report', { dependencies: ['query', 'table'] }),
      testCase('query', { dependencies: ['database'] }),
      testCase('table', { dependencies: ['database'] }),
      testCase('database'),
    ];
    const order = new DependencyGraph(cases).topologicalOrder();

    for (const c of cases) {
      for (const dependency of c.dependencies ?? []) {
        expect(order.indexOf(dependency)).toBeLessThan(order.indexOf(c.name));
      }
    }
  });

  it('should expose dependents and dependencies', () => {
    const graph = new DependencyGraph([
      testCase('a'),
      testCase('b', { dependencies: ['a'] }),
      testCase('c', { dependencies: ['a', 'b'] }),
    ]);

    expect(graph.dependentsOf('a')).toEqual(['b', 'c']);
    expect(graph.dependenciesOf('c')).toEqual(['a', 'b']);
    expect(graph.dependenciesOf('unknown')).toEqual([]);
    expect(graph.size).toBe(3);
  });

  it('should detect a cycle and name the cases left on it', () => {
    const build = () =>
      new DependencyGraph([
        testCase('x', { dependencies: ['y'] }),
        testCase('y', { dependencies: ['x'] }),
        testCase('z'),
        testCase('w', { dependencies: ['x'] }),
      ]);

    expect(build).toThrow(CycleDetectedError);
    expect(build).toThrow('Cycle detected in test dependencies among: x, y, w');
  });

  it('should detect a self dependency', () => {
    expect(() => new DependencyGraph([testCase('self', { dependencies: ['self'] })])).toThrow(
      CycleDetectedError
    );
  });

  it('should reject a dependency on an undefined case', () => {
    expect(() => new DependencyGraph([testCase('a', { dependencies: ['ghost'] })])).toThrow(
      new UndefinedDependencyError('a', 'ghost')
    );
  });

  it('should reject duplicate names', () => {
    expect(() => new DependencyGraph([testCase('a'), testCase('a')])).toThrow(
      new DuplicateTestCaseError('a')
    );
  });

  it('should accept an empty run', () => {
    expect(new DependencyGraph([]).topologicalOrder()).toEqual([]);
  });
});
