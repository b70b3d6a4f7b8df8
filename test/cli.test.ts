/**
 * CLI Unit Tests
 * Runs commands against an in-process orchestrator and inspects console output
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { createProgram, runCli } from '../src/control-plane/cli.js';
import type { Orchestrator } from '../src/orchestrator/orchestrator.js';
import { createTestOrchestrator, failing } from './helpers.js';

describe('CLI', () => {
  let orchestrator: Orchestrator;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const run = async (...args: string[]): Promise<void> => {
    const program = createProgram({ createOrchestrator: async () => orchestrator });
    await program.parseAsync(['node', 'workgraph', ...args]);
  };

  /** Parse the single JSON document printed by a --json command */
  const printedJson = (): unknown => JSON.parse(String(logSpy.mock.calls[0]?.[0]));

  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
    orchestrator = createTestOrchestrator({ nightly: ['a', 'ghost'] });
    orchestrator.register('a', () => 'a-result');
    orchestrator.register('b', () => 'b-result', ['a']);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
  });

  describe('validate', () => {
    it('should print a passing report as JSON', async () => {
      await run('validate', '--json');

      expect(printedJson()).toEqual({
        validationPassed: true,
        issues: [],
        totalIssues: 0,
        circularDependenciesDetected: false,
      });
      expect(process.exitCode).toBeUndefined();
    });

    it('should set a failing exit code for missing dependencies', async () => {
      orchestrator.register('c', () => 1, ['ghost']);

      await run('validate', '--json');

      expect(printedJson()).toMatchObject({
        validationPassed: false,
        issues: [{ type: 'missing_dependency', unit: 'c', missingDependency: 'ghost' }],
      });
      expect(process.exitCode).toBe(1);
    });
  });

  describe('run', () => {
    it('should run every unit and print the report', async () => {
      await run('run', '--json');

      expect(printedJson()).toMatchObject({ order: ['a', 'b'], successful: 2, failed: 0 });
      expect(process.exitCode).toBeUndefined();
    });

    it('should not retry with --no-retry and exit with a failure code', async () => {
      const handler = vi.fn(failing());
      orchestrator.register('c', handler);

      await run('run', '--no-retry', '--json');

      expect(handler).toHaveBeenCalledTimes(1);
      expect(printedJson()).toMatchObject({
        failed: 1,
        results: [
          { unit: 'a', success: true },
          { unit: 'b', success: true },
          { unit: 'c', success: false, attempts: 1 },
        ],
      });
      expect(process.exitCode).toBe(1);
    });

    it('should print scheduled retries in text mode', async () => {
      orchestrator.register('c', failing());

      await run('run', '--max-retries', '2');

      const lines = logSpy.mock.calls.map((call) => String(call[0]));
      expect(lines).toContain('  ↻ c attempt 2 in 0ms');
      expect(lines).toContain('! 1 unit(s) failed');
      expect(orchestrator.engine.listenerCount('retry-scheduled')).toBe(0);
    });

    it('should reject an invalid --max-retries value', async () => {
      await run('run', '--max-retries', '20');

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(orchestrator.executionLog().totalEntries).toBe(0);
      expect(process.exitCode).toBe(1);
    });

    it('should report a resolution failure', async () => {
      orchestrator.register('a', () => 1, ['b']);

      await run('run', '--json');

      expect(errorSpy).toHaveBeenCalledWith('✗ Circular dependency detected at a');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('run-unit', () => {
    it('should print the unit result', async () => {
      await run('run-unit', 'b', '--json');

      expect(printedJson()).toMatchObject({ unit: 'b', success: true, result: 'b-result' });
    });

    it('should report an unknown unit', async () => {
      await run('run-unit', 'ghost');

      expect(errorSpy).toHaveBeenCalledWith('✗ Unit ghost not found');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('run-phase', () => {
    it('should run the registered members of a phase', async () => {
      await run('run-phase', 'nightly', '--json');

      expect(printedJson()).toMatchObject({
        phase: 'nightly',
        unitsExecuted: 1,
        skipped: ['ghost'],
      });
      expect(process.exitCode).toBeUndefined();
    });

    it('should report an unknown phase', async () => {
      await run('run-phase', 'weekly');

      expect(errorSpy).toHaveBeenCalledWith('✗ Invalid phase weekly. Valid phases: nightly');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('inspection', () => {
    it('should list units as JSON', async () => {
      await run('units', '--json');

      expect(printedJson()).toMatchObject({
        totalUnits: 2,
        executionOrder: ['a', 'b'],
        unitsWithDependencies: 1,
      });
    });

    it('should print the dependency graph as JSON', async () => {
      await run('graph', '--json');

      expect(printedJson()).toEqual(orchestrator.dependencyGraph());
    });
  });

  describe('runCli', () => {
    it('should return quietly after printing the version', async () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      await expect(
        runCli(['node', 'workgraph', '--version'], {
          createOrchestrator: async () => orchestrator,
        })
      ).resolves.toBeUndefined();
      expect(writeSpy).toHaveBeenCalledWith('0.1.0\n');
    });
  });
});
