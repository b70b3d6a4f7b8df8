/**
 * Orchestrator facade tests
 */

import { describe, it, expect, vi } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { createOrchestrator } from '../src/orchestrator/orchestrator.js';
import {
  CircularDependencyError,
  PhaseNotFoundError,
  UnitExecutionError,
  UnitNotFoundError,
} from '../src/orchestrator/errors.js';
import type { WorkgraphConfig } from '../src/config/index.js';
import { createTestOrchestrator, failing } from './helpers.js';

describe('Orchestrator', () => {
  describe('runEverything', () => {
    it('should keep running past a failed dependency (A -> B -> C with A failing)', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('A', failing('A broke'));
      orchestrator.register('B', () => 'b', ['A']);
      orchestrator.register('C', () => 'c', ['B']);

      const report = await orchestrator.runEverything({ maxRetries: 1 });

      expect(report.order).toEqual(['A', 'B', 'C']);
      expect(report.successful).toBe(2);
      expect(report.failed).toBe(1);
      expect(report.successRate).toBeCloseTo(66.667, 2);
      expect(orchestrator.unitStatus('A').status).toBe('failed');
      expect(orchestrator.unitStatus('B').status).toBe('success');
      expect(orchestrator.unitStatus('C').status).toBe('success');
    });

    it('should use configured retry defaults', async () => {
      const orchestrator = createTestOrchestrator({}, { retry: { maxRetries: 2 } });
      const handler = vi.fn(failing());
      orchestrator.register('a', handler);

      await orchestrator.runEverything();

      expect(handler).toHaveBeenCalledTimes(2);
    });

    it('should reject a cyclic graph', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('a', () => 1, ['b']);
      orchestrator.register('b', () => 2, ['a']);

      await expect(orchestrator.runEverything()).rejects.toBeInstanceOf(CircularDependencyError);
    });
  });

  describe('runOne', () => {
    it('should return the unit result', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('a', () => ({ ok: true }));

      const result = await orchestrator.runOne('a');

      expect(result).toMatchObject({ unit: 'a', success: true, result: { ok: true } });
    });

    it('should throw UnitNotFoundError for unknown units', async () => {
      const orchestrator = createTestOrchestrator();

      await expect(orchestrator.runOne('ghost')).rejects.toBeInstanceOf(UnitNotFoundError);
    });

    it('should throw UnitExecutionError when the unit fails', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('a', failing('bad input'));

      await expect(orchestrator.runOne('a')).rejects.toThrow(UnitExecutionError);
      expect(orchestrator.unitStatus('a').detail).toBe('bad input');
    });
  });

  describe('runPhase', () => {
    it('should run registered phase members and skip the rest', async () => {
      const orchestrator = createTestOrchestrator({ nightly: ['a', 'ghost', 'b'] });
      orchestrator.register('a', () => 'a');
      orchestrator.register('b', failing());

      const report = await orchestrator.runPhase('nightly');

      expect(report.phase).toBe('nightly');
      expect(report.unitsExecuted).toBe(2);
      expect(report.skipped).toEqual(['ghost']);
      expect(report.results.map((r) => [r.unit, r.success])).toEqual([
        ['a', true],
        ['b', false],
      ]);
    });

    it('should throw PhaseNotFoundError for unknown phases', async () => {
      const orchestrator = createTestOrchestrator({ nightly: [] });

      await expect(orchestrator.runPhase('weekly')).rejects.toThrow(
        'Invalid phase weekly. Valid phases: nightly'
      );
      await expect(orchestrator.runPhase('weekly')).rejects.toBeInstanceOf(PhaseNotFoundError);
    });
  });

  describe('reports', () => {
    it('should grade health from the latest outcomes', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('a', () => 1);
      orchestrator.register('b', failing());

      expect(orchestrator.health()).toMatchObject({
        healthStatus: 'FAIR',
        totalUnits: 2,
        successfulUnits: 0,
        failedUnits: 0,
        notRunUnits: 2,
      });

      await orchestrator.runEverything({ retryFailed: false });

      expect(orchestrator.health()).toMatchObject({
        healthStatus: 'POOR',
        successfulUnits: 1,
        failedUnits: 1,
        notRunUnits: 0,
        successPercentage: 50,
      });
    });

    it('should report system status', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('a', () => 1);

      expect(orchestrator.status()).toMatchObject({
        systemHealth: 'healthy',
        lastExecution: null,
        totalLogEntries: 0,
        runInProgress: false,
      });

      await orchestrator.runOne('a');

      const status = orchestrator.status();
      expect(status.successRate).toBe(100);
      expect(status.lastExecution).toBe(orchestrator.unitStatus('a').lastRun);
      expect(status.totalLogEntries).toBe(1);
    });

    it('should list units with status and execution order', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('b', () => 1, ['a']);
      orchestrator.register('a', () => 1);
      await orchestrator.runOne('a');

      expect(orchestrator.listUnits()).toEqual({
        units: [
          { name: 'b', dependencies: ['a'], status: 'not_run', lastRun: null },
          {
            name: 'a',
            dependencies: [],
            status: 'success',
            lastRun: orchestrator.unitStatus('a').lastRun,
          },
        ],
        totalUnits: 2,
        executionOrder: ['a', 'b'],
        unitsWithDependencies: 1,
      });
    });

    it('should list an empty execution order for an unresolvable graph', () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('a', () => 1, ['ghost']);

      expect(orchestrator.listUnits().executionOrder).toEqual([]);
    });

    it('should include a unit\'s own records in its status', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('a', () => 1);
      orchestrator.register('b', () => 2);
      await orchestrator.runOne('a');
      await orchestrator.runOne('b');
      await orchestrator.runOne('a');

      const status = orchestrator.unitStatus('a');

      expect(status.totalExecutions).toBe(2);
      expect(status.executionLogs.every((r) => r.unit === 'a')).toBe(true);
      expect(status.detail).toBe(1);
      expect(() => orchestrator.unitStatus('ghost')).toThrow(UnitNotFoundError);
    });

    it('should limit the dashboard to the last 100 log entries', async () => {
      const orchestrator = createTestOrchestrator();
      let calls = 0;
      orchestrator.register('a', () => ++calls);
      for (let i = 0; i < 105; i++) {
        await orchestrator.runOne('a');
      }

      const dashboard = orchestrator.dashboard();

      expect(dashboard.totalLogEntries).toBe(105);
      expect(dashboard.recentLogs).toHaveLength(100);
      expect(dashboard.successfulUnits).toBe(1);
      expect(dashboard.details['a']?.detail).toBe(105);
    });

    it('should page the execution log with the configured default size', async () => {
      const orchestrator = createTestOrchestrator({}, { logPageSize: 2 });
      orchestrator.register('a', () => 1);
      for (let i = 0; i < 5; i++) {
        await orchestrator.runOne('a');
      }

      expect(orchestrator.executionLog().returned).toBe(2);
      expect(orchestrator.executionLog({ limit: 10, offset: 3 })).toMatchObject({
        totalEntries: 5,
        returned: 2,
        offset: 3,
        limit: 10,
      });
    });

    it('should validate without executing', () => {
      const orchestrator = createTestOrchestrator();
      const handler = vi.fn(() => 1);
      orchestrator.register('a', handler, ['ghost']);

      expect(orchestrator.validate().validationPassed).toBe(false);
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('reset', () => {
    it('should return the previous state and clear history', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('a', () => 1);
      orchestrator.register('b', failing());
      await orchestrator.runEverything({ maxRetries: 2 });

      const report = await orchestrator.reset();

      expect(report.previousState).toEqual({
        totalUnits: 2,
        successfulUnits: 1,
        failedUnits: 1,
        logEntriesCleared: 3,
      });
      expect(orchestrator.executionLog().totalEntries).toBe(0);
      expect(orchestrator.unitStatus('a').status).toBe('not_run');
    });

    it('should wait for an in-flight run before clearing', async () => {
      const orchestrator = createTestOrchestrator();
      orchestrator.register('slow', async () => {
        await sleep(20);
        return 'done';
      });

      const run = orchestrator.runEverything();
      const reset = orchestrator.reset();

      const [report, resetReport] = await Promise.all([run, reset]);

      expect(report.successful).toBe(1);
      expect(resetReport.previousState.logEntriesCleared).toBe(1);
      expect(orchestrator.executionLog().totalEntries).toBe(0);
    });
  });

  describe('createOrchestrator', () => {
    it('should register the built-in units and load the default phases', async () => {
      const config: WorkgraphConfig = {
        port: 3001,
        host: '127.0.0.1',
        retry: { retryFailed: true, maxRetries: 3, delayMs: 0 },
        logPageSize: 100,
      };

      const orchestrator = await createOrchestrator(config);

      expect(orchestrator.listUnits().totalUnits).toBe(5);
      expect(orchestrator.phases.names()).toHaveLength(5);

      const report = await orchestrator.runEverything();
      expect(report.successful).toBe(5);
      expect(orchestrator.unitStatus('local_seo_agent').detail).toEqual({
        task: 'local_seo',
        status: 'completed',
        actions: ['google_my_business_optimized', 'local_citations_updated'],
      });

      // None of the default phase members are built in
      const phase = await orchestrator.runPhase('phase_1_foundation');
      expect(phase.unitsExecuted).toBe(0);
      expect(phase.skipped).toHaveLength(3);
    });
  });
});
