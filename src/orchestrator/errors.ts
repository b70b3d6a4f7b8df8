/**
 * Orchestration error taxonomy.
 */

/**
 * Error thrown when a unit name is not in the registry.
 */
export class UnitNotFoundError extends Error {
  constructor(public readonly unit: string) {
    super(`Unit ${unit} not found`);
    this.name = 'UnitNotFoundError';
  }
}

/**
 * Error thrown when a declared dependency is not registered.
 */
export class MissingDependencyError extends Error {
  constructor(
    public readonly dependent: string,
    public readonly missing: string
  ) {
    super(`Dependency ${missing} not found for unit ${dependent}`);
    this.name = 'MissingDependencyError';
  }
}

/**
 * Error thrown when the dependency graph contains a cycle.
 */
export class CircularDependencyError extends Error {
  constructor(public readonly node: string) {
    super(`Circular dependency detected at ${node}`);
    this.name = 'CircularDependencyError';
  }
}

/**
 * Error thrown when a unit's handler fails. Wraps the original error.
 */
export class UnitExecutionError extends Error {
  public readonly originalMessage: string;

  constructor(
    public readonly unit: string,
    cause: unknown
  ) {
    const originalMessage = errorMessage(cause);
    super(`Unit ${unit} failed: ${originalMessage}`, { cause });
    this.name = 'UnitExecutionError';
    this.originalMessage = originalMessage;
  }
}

/**
 * Error thrown when a phase name is not in the phase catalog.
 */
export class PhaseNotFoundError extends Error {
  constructor(
    public readonly phase: string,
    public readonly availablePhases: string[]
  ) {
    super(`Invalid phase ${phase}. Valid phases: ${availablePhases.join(', ')}`);
    this.name = 'PhaseNotFoundError';
  }
}

/**
 * Error thrown when a phase catalog file cannot be read, parsed or validated.
 */
export class PhaseCatalogError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly problems: string[]
  ) {
    super(`Invalid phase catalog at ${filePath}: ${problems.join('; ')}`);
    this.name = 'PhaseCatalogError';
  }
}

/**
 * Either resolver failure.
 */
export type ResolutionError = MissingDependencyError | CircularDependencyError;

export function isResolutionError(error: unknown): error is ResolutionError {
  return (
    error instanceof MissingDependencyError ||
    error instanceof CircularDependencyError
  );
}

/**
 * Extract a message from anything a handler may throw.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
