/**
 * Phase catalog: named, fixed lists of unit names run together.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { PhaseCatalogError, PhaseNotFoundError } from './errors.js';

const logger = createLogger('phases');

/**
 * Catalog shipped with the package.
 */
export const DEFAULT_PHASES_PATH = fileURLToPath(
  new URL('../../config/phases.yaml', import.meta.url)
);

export const phaseCatalogSchema = z.object({
  phases: z.record(z.string().min(1), z.array(z.string().min(1))),
});

export type PhaseDefinitions = z.infer<typeof phaseCatalogSchema>['phases'];

export class PhaseCatalog {
  private readonly phases: Map<string, readonly string[]>;

  constructor(definitions: PhaseDefinitions) {
    this.phases = new Map(
      Object.entries(definitions).map(([phase, units]) => [phase, [...units]])
    );
  }

  names(): string[] {
    return [...this.phases.keys()];
  }

  has(phase: string): boolean {
    return this.phases.has(phase);
  }

  /**
   * Unit names of a phase.
   * @throws PhaseNotFoundError listing the valid phases
   */
  unitsOf(phase: string): readonly string[] {
    const units = this.phases.get(phase);
    if (!units) {
      throw new PhaseNotFoundError(phase, this.names());
    }
    return units;
  }

  toJSON(): Record<string, string[]> {
    return Object.fromEntries(
      [...this.phases].map(([phase, units]) => [phase, [...units]])
    );
  }
}

/**
 * Parse catalog content. JSON is accepted as well, being valid YAML.
 * @throws PhaseCatalogError if parsing or validation fails
 */
export function parsePhaseCatalog(content: string, source = '<string>'): PhaseCatalog {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new PhaseCatalogError(source, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const result = phaseCatalogSchema.safeParse(parsed);
  if (!result.success) {
    throw new PhaseCatalogError(
      source,
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  return new PhaseCatalog(result.data.phases);
}

/**
 * Load a catalog file, or the built-in one when no path is given.
 */
export async function loadPhaseCatalog(filePath: string = DEFAULT_PHASES_PATH): Promise<PhaseCatalog> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new PhaseCatalogError(filePath, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const catalog = parsePhaseCatalog(content, filePath);
  logger.debug({ filePath, phases: catalog.names() }, 'Phase catalog loaded');
  return catalog;
}
