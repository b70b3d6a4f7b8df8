import { createLogger } from '../utils/logger.js';
import { UnitNotFoundError } from './errors.js';
import type { UnitHandler, WorkUnit } from './types.js';

const logger = createLogger('unit-registry');

/**
 * Named work units and their declared dependencies.
 *
 * Dependencies are not validated here; they may name units registered
 * later. The resolver checks them.
 */
export class UnitRegistry {
  private readonly entries: Map<string, WorkUnit> = new Map();

  /**
   * Register a unit, replacing any existing entry with the same name.
   * A replaced entry keeps its original position in iteration order.
   */
  register(name: string, handler: UnitHandler, dependencies: readonly string[] = []): WorkUnit {
    const unit: WorkUnit = {
      name,
      handler,
      dependencies: [...dependencies],
    };

    const replaced = this.entries.has(name);
    this.entries.set(name, unit);

    logger.debug({ unit: name, dependencies: unit.dependencies, replaced }, 'Unit registered');
    return unit;
  }

  get(name: string): WorkUnit | undefined {
    return this.entries.get(name);
  }

  /**
   * Get a unit or throw UnitNotFoundError.
   */
  require(name: string): WorkUnit {
    const unit = this.entries.get(name);
    if (!unit) {
      throw new UnitNotFoundError(name);
    }
    return unit;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Registered names in insertion order.
   */
  names(): string[] {
    return [...this.entries.keys()];
  }

  units(): WorkUnit[] {
    return [...this.entries.values()];
  }

  dependenciesOf(name: string): readonly string[] {
    return this.entries.get(name)?.dependencies ?? [];
  }

  get size(): number {
    return this.entries.size;
  }
}
