/**
 * Dependency graph resolution.
 *
 * Depth-first topological sort over the registry. Roots are visited in
 * registration order and dependencies in declared order, so the output is
 * deterministic for a fixed registration sequence.
 */

import { createLogger } from '../utils/logger.js';
import { CircularDependencyError, MissingDependencyError } from './errors.js';
import type { UnitRegistry } from './registry.js';

const logger = createLogger('resolver');

/**
 * Outcome of a resolution. Failures never carry a partial order.
 */
export type ResolveResult =
  | { kind: 'resolved'; order: string[] }
  | { kind: 'cycle'; node: string }
  | { kind: 'missing'; dependent: string; missing: string };

type Failure = Exclude<ResolveResult, { kind: 'resolved' }>;

/**
 * What to do with a dependency that names an unregistered unit.
 */
type MissingPolicy = 'fail' | 'ignore';

interface Frame {
  name: string;
  /** Next dependency to visit */
  index: number;
}

/**
 * Iterative post-order DFS; dependency chains are not bounded by the call
 * stack.
 */
function topologicalSort(registry: UnitRegistry, onMissing: MissingPolicy): ResolveResult {
  const order: string[] = [];
  const temporary = new Set<string>();
  const permanent = new Set<string>();

  const visit = (root: string): Failure | null => {
    const stack: Frame[] = [{ name: root, index: 0 }];
    temporary.add(root);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const dependencies = registry.dependenciesOf(frame.name);

      if (frame.index < dependencies.length) {
        const dependency = dependencies[frame.index];
        frame.index++;

        if (!registry.has(dependency)) {
          if (onMissing === 'ignore') continue;
          return { kind: 'missing', dependent: frame.name, missing: dependency };
        }
        if (permanent.has(dependency)) continue;
        if (temporary.has(dependency)) {
          return { kind: 'cycle', node: dependency };
        }

        temporary.add(dependency);
        stack.push({ name: dependency, index: 0 });
        continue;
      }

      stack.pop();
      temporary.delete(frame.name);
      permanent.add(frame.name);
      order.push(frame.name);
    }

    return null;
  };

  for (const name of registry.names()) {
    if (permanent.has(name)) continue;
    const failure = visit(name);
    if (failure) {
      return failure;
    }
  }

  return { kind: 'resolved', order };
}

/**
 * Compute an execution order in which every unit follows all of its
 * dependencies.
 */
export function resolveExecutionOrder(registry: UnitRegistry): ResolveResult {
  const result = topologicalSort(registry, 'fail');

  if (result.kind === 'resolved') {
    logger.debug({ order: result.order }, 'Execution order resolved');
  } else {
    logger.warn({ failure: result }, 'Execution order resolution failed');
  }

  return result;
}

/**
 * Resolve or throw MissingDependencyError / CircularDependencyError.
 */
export function resolveOrThrow(registry: UnitRegistry): string[] {
  const result = resolveExecutionOrder(registry);
  switch (result.kind) {
    case 'resolved':
      return result.order;
    case 'cycle':
      throw new CircularDependencyError(result.node);
    case 'missing':
      throw new MissingDependencyError(result.dependent, result.missing);
  }
}

/**
 * A single problem found by validation.
 */
export type ValidationIssue =
  | { type: 'missing_dependency'; unit: string; missingDependency: string }
  | { type: 'circular_dependency'; node: string; error: string };

export interface ValidationReport {
  validationPassed: boolean;
  issues: ValidationIssue[];
  totalIssues: number;
  circularDependenciesDetected: boolean;
}

/**
 * Report every missing dependency and whether the graph restricted to
 * registered units has a cycle. Executes nothing.
 */
export function validateDependencies(registry: UnitRegistry): ValidationReport {
  const issues: ValidationIssue[] = [];

  for (const unit of registry.units()) {
    for (const dependency of unit.dependencies) {
      if (!registry.has(dependency)) {
        issues.push({ type: 'missing_dependency', unit: unit.name, missingDependency: dependency });
      }
    }
  }

  const cycleCheck = topologicalSort(registry, 'ignore');
  const circularDependenciesDetected = cycleCheck.kind === 'cycle';
  if (cycleCheck.kind === 'cycle') {
    issues.push({
      type: 'circular_dependency',
      node: cycleCheck.node,
      error: new CircularDependencyError(cycleCheck.node).message,
    });
  }

  logger.debug({ totalIssues: issues.length, circularDependenciesDetected }, 'Dependencies validated');

  return {
    validationPassed: issues.length === 0,
    issues,
    totalIssues: issues.length,
    circularDependenciesDetected,
  };
}

export interface DependencyGraphNode {
  dependencies: string[];
  dependents: string[];
}

export interface DependencyGraphView {
  graph: Record<string, DependencyGraphNode>;
  totalUnits: number;
  unitsWithDependencies: number;
  unitsWithDependents: number;
}

/**
 * Declared dependencies and the reverse relation for every registered unit.
 */
export function buildDependencyGraph(registry: UnitRegistry): DependencyGraphView {
  const units = registry.units();
  const entries = units.map((unit): [string, DependencyGraphNode] => [
    unit.name,
    {
      dependencies: [...unit.dependencies],
      dependents: units
        .filter((other) => other.dependencies.includes(unit.name))
        .map((other) => other.name),
    },
  ]);

  // fromEntries defines own properties, so a unit named __proto__ stays an entry
  const graph: Record<string, DependencyGraphNode> = Object.fromEntries(entries);
  const nodes = entries.map(([, node]) => node);
  return {
    graph,
    totalUnits: units.length,
    unitsWithDependencies: nodes.filter((n) => n.dependencies.length > 0).length,
    unitsWithDependents: nodes.filter((n) => n.dependents.length > 0).length,
  };
}
