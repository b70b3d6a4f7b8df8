/**
 * Execution engine.
 *
 * Runs work units one at a time: the whole graph in resolved order, a
 * single unit, or a named subset. Every attempt is appended to the
 * execution history and updates the unit's status.
 */

import { EventEmitter } from 'node:events';
import { setImmediate as nextTurn, setTimeout as sleep } from 'node:timers/promises';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { UnitExecutionError, errorMessage } from './errors.js';
import { resolveOrThrow } from './resolver.js';
import { buildRetryPolicy, shouldRetry, type RetryPolicy } from './retry-policy.js';
import type { OrchestratorState } from './state.js';
import type {
  RunAllOptions,
  RunAllReport,
  RunNamedReport,
  UnitHandler,
  UnitOutcome,
  WorkUnit,
} from './types.js';

/**
 * Events emitted by ExecutionEngine.
 */
export interface ExecutionEngineEvents {
  'unit-started': (unit: string, attempt: number) => void;
  'unit-succeeded': (unit: string, attempt: number) => void;
  'unit-failed': (unit: string, attempt: number, message: string) => void;
  'retry-scheduled': (unit: string, delayMs: number, nextAttempt: number) => void;
}

export interface ExecutionEngineOptions {
  /** Defaults for full-graph runs; per-call options override them */
  retry?: Partial<RetryPolicy>;
}

/**
 * Invoke a handler on a later turn of the event loop and await it.
 * Synchronous handlers still block while they run, but never inside the
 * caller's own turn.
 */
async function invokeDeferred(handler: UnitHandler): Promise<unknown> {
  await nextTurn();
  return await handler();
}

export class ExecutionEngine extends EventEmitter {
  private readonly logger: Logger;
  private readonly retryDefaults: RetryPolicy;

  constructor(
    private readonly state: OrchestratorState,
    options: ExecutionEngineOptions = {}
  ) {
    super();
    this.logger = createLogger('execution-engine');
    this.retryDefaults = buildRetryPolicy(options.retry);
  }

  /**
   * Run one unit once.
   *
   * @returns The handler's result
   * @throws UnitNotFoundError if the unit is not registered
   * @throws UnitExecutionError if the handler fails
   */
  async runUnit(name: string): Promise<unknown> {
    const unit = this.state.registry.require(name);
    return this.attempt(unit, 1);
  }

  /**
   * Run every registered unit in dependency order.
   *
   * Resolution failures propagate before anything runs. A failing unit is
   * retried per policy and then recorded; the run always continues with
   * the next unit, including the failed unit's dependents.
   */
  async runAll(options: RunAllOptions = {}): Promise<RunAllReport> {
    const policy = buildRetryPolicy(
      {
        ...(options.retryFailed !== undefined && { retryFailed: options.retryFailed }),
        ...(options.maxRetries !== undefined && { maxRetries: options.maxRetries }),
      },
      this.retryDefaults
    );
    const registry = this.state.registry;
    const order = resolveOrThrow(registry);

    const runId = nanoid(12);
    const startedAt = new Date();
    this.logger.info({ runId, order, policy }, 'Run started');

    const results: UnitOutcome[] = [];
    for (const name of order) {
      results.push(await this.runWithRetry(registry.require(name), policy));
    }

    const completedAt = new Date();
    const successful = results.filter((r) => r.success).length;
    const failed = results.length - successful;
    const totalUnits = registry.size;

    const report: RunAllReport = {
      runId,
      order,
      results,
      totalUnits,
      successful,
      failed,
      successRate: totalUnits > 0 ? (successful / totalUnits) * 100 : 0,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };

    this.logger.info(
      { runId, successful, failed, durationMs: report.durationMs },
      'Run completed'
    );
    return report;
  }

  /**
   * Run the given units once each, in the given order. Unregistered names
   * are skipped; failures are collected rather than thrown.
   */
  async runNamed(names: readonly string[]): Promise<RunNamedReport> {
    const results: UnitOutcome[] = [];
    const skipped: string[] = [];

    for (const name of names) {
      const unit = this.state.registry.get(name);
      if (!unit) {
        skipped.push(name);
        continue;
      }

      try {
        const result = await this.attempt(unit, 1);
        results.push({ unit: name, success: true, result, attempts: 1 });
      } catch (error) {
        results.push({ unit: name, success: false, error: errorMessage(error), attempts: 1 });
      }
    }

    if (skipped.length > 0) {
      this.logger.debug({ skipped }, 'Skipped unregistered units');
    }

    return { results, executed: results.length, skipped };
  }

  private async runWithRetry(unit: WorkUnit, policy: RetryPolicy): Promise<UnitOutcome> {
    let attempts = 0;

    for (;;) {
      attempts++;
      try {
        const result = await this.attempt(unit, attempts);
        return { unit: unit.name, success: true, result, attempts };
      } catch (error) {
        if (!shouldRetry(attempts, policy)) {
          this.logger.error(
            { unit: unit.name, attempts, retryFailed: policy.retryFailed },
            'Unit failed after all attempts'
          );
          return { unit: unit.name, success: false, error: errorMessage(error), attempts };
        }

        this.emit('retry-scheduled', unit.name, policy.delayMs, attempts + 1);
        this.logger.info(
          { unit: unit.name, nextAttempt: attempts + 1, delayMs: policy.delayMs },
          'Retrying unit'
        );
        await sleep(policy.delayMs);
      }
    }
  }

  /**
   * One attempt: invoke, then append the record and update the status.
   */
  private async attempt(unit: WorkUnit, attempt: number): Promise<unknown> {
    const history = this.state.history;
    this.emit('unit-started', unit.name, attempt);

    try {
      const result = await invokeDeferred(unit.handler);
      const timestamp = new Date().toISOString();
      history.append({
        unit: unit.name,
        success: true,
        message: 'Executed successfully',
        timestamp,
      });
      history.setStatus(unit.name, 'success', result, timestamp);

      this.logger.debug({ unit: unit.name, attempt }, 'Unit succeeded');
      this.emit('unit-succeeded', unit.name, attempt);
      return result;
    } catch (error) {
      const message = errorMessage(error);
      const timestamp = new Date().toISOString();
      history.append({ unit: unit.name, success: false, message, timestamp });
      history.setStatus(unit.name, 'failed', message, timestamp);

      this.logger.warn({ unit: unit.name, attempt, error: message }, 'Unit failed');
      this.emit('unit-failed', unit.name, attempt, message);
      throw new UnitExecutionError(unit.name, error);
    }
  }
}
