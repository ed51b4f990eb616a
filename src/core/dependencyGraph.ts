/**
 * Dependency graph over the test cases of one run.
 *
 * Edges point from a test case to the cases that depend on it. The graph is
 * validated on construction: duplicate names, dependencies on unknown cases
 * and cycles are all rejected before anything executes.
 */

import type { TestCase } from '@shared/types';
import { CycleDetectedError, DuplicateTestCaseError, UndefinedDependencyError } from './errors';

export class DependencyGraph {
  private readonly nodes = new Map<string, TestCase>();
  private readonly dependents = new Map<string, string[]>();
  private readonly inDegree = new Map<string, number>();
  private readonly order: readonly string[];

  constructor(testCases: readonly TestCase[]) {
    for (const testCase of testCases) {
      if (this.nodes.has(testCase.name)) {
        throw new DuplicateTestCaseError(testCase.name);
      }
      this.nodes.set(testCase.name, testCase);
      this.dependents.set(testCase.name, []);
      this.inDegree.set(testCase.name, 0);
    }

    for (const testCase of testCases) {
      for (const dependency of testCase.dependencies ?? []) {
        const successors = this.dependents.get(dependency);
        if (successors === undefined) {
          throw new UndefinedDependencyError(testCase.name, dependency);
        }
        successors.push(testCase.name);
        this.inDegree.set(testCase.name, (this.inDegree.get(testCase.name) ?? 0) + 1);
      }
    }

    this.order = this.sort();
  }

  /**
   * Kahn's algorithm with a FIFO queue seeded in definition order, so that
   * independent cases keep the order they were declared in.
   */
  private sort(): string[] {
    const remaining = new Map(this.inDegree);
    const queue: string[] = [];
    for (const [name, degree] of remaining) {
      if (degree === 0) {
        queue.push(name);
      }
    }

    const order: string[] = [];
    let head = 0;
    while (head < queue.length) {
      const name = queue[head++];
      if (name === undefined) break;
      order.push(name);

      for (const successor of this.dependents.get(name) ?? []) {
        const degree = (remaining.get(successor) ?? 0) - 1;
        remaining.set(successor, degree);
        if (degree === 0) {
          queue.push(successor);
        }
      }
    }

    if (order.length < this.nodes.size) {
      const visited = new Set(order);
      throw new CycleDetectedError([...this.nodes.keys()].filter((name) => !visited.has(name)));
    }

    return order;
  }

  /**
   * Test case names in a valid execution order.
   */
  topologicalOrder(): readonly string[] {
    return this.order;
  }

  get(name: string): TestCase | undefined {
    return this.nodes.get(name);
  }

  /**
   * Direct dependencies of a test case, in declaration order.
   */
  dependenciesOf(name: string): readonly string[] {
    return this.nodes.get(name)?.dependencies ?? [];
  }

  /**
   * Test cases that directly depend on the given one.
   */
  dependentsOf(name: string): readonly string[] {
    return this.dependents.get(name) ?? [];
  }

  get size(): number {
    return this.nodes.size;
  }
}
