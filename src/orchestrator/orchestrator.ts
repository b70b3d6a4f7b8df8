/**
 * Orchestrator
 *
 * Single entry point composing the registry, resolver, engine and history.
 * Operations that execute units or clear history are serialized through
 * the state's run lock; read-only reports are taken directly.
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { getConfig, type WorkgraphConfig } from '../config/index.js';
import { registerBuiltInUnits } from '../units/builtin.js';
import { ExecutionEngine } from './engine.js';
import {
  DEFAULT_HEALTH_THRESHOLDS,
  classifyHealth,
  classifySystem,
  successPercentage,
  type HealthCounts,
  type HealthGrade,
  type HealthThresholds,
  type SystemHealth,
} from './health.js';
import { PhaseCatalog, loadPhaseCatalog } from './phases.js';
import {
  buildDependencyGraph,
  resolveExecutionOrder,
  validateDependencies,
  type DependencyGraphView,
  type ValidationReport,
} from './resolver.js';
import type { RetryPolicy } from './retry-policy.js';
import { OrchestratorState } from './state.js';
import type {
  ExecutionLogPage,
  ExecutionRecord,
  ResetSnapshot,
  RunAllOptions,
  RunAllReport,
  StatusEntry,
  UnitHandler,
  UnitOutcome,
  UnitStatus,
  WorkUnit,
} from './types.js';

/**
 * Number of log entries included in the dashboard.
 */
const DASHBOARD_LOG_ENTRIES = 100;

export interface OrchestratorOptions {
  state?: OrchestratorState;
  phases?: PhaseCatalog;
  retry?: Partial<RetryPolicy>;
  /** Page size for executionLog() when no limit is given */
  logPageSize?: number;
  healthThresholds?: Partial<HealthThresholds>;
}

export interface UnitRunResult {
  unit: string;
  success: true;
  result: unknown;
  timestamp: string;
}

export interface PhaseRunReport {
  phase: string;
  unitsExecuted: number;
  results: UnitOutcome[];
  /** Phase members that are not registered */
  skipped: string[];
  timestamp: string;
}

export interface HealthReport {
  healthStatus: HealthGrade;
  totalUnits: number;
  successfulUnits: number;
  failedUnits: number;
  notRunUnits: number;
  successPercentage: number;
  timestamp: string;
}

export interface StatusReport {
  systemHealth: SystemHealth;
  totalUnits: number;
  successfulUnits: number;
  failedUnits: number;
  notRunUnits: number;
  successRate: number;
  lastExecution: string | null;
  totalLogEntries: number;
  runInProgress: boolean;
  timestamp: string;
}

export interface UnitSummary {
  name: string;
  dependencies: string[];
  status: UnitStatus;
  lastRun: string | null;
}

export interface UnitListing {
  units: UnitSummary[];
  totalUnits: number;
  /** Empty when the graph cannot be resolved */
  executionOrder: string[];
  unitsWithDependencies: number;
}

export interface UnitStatusReport extends UnitSummary {
  detail: unknown;
  executionLogs: ExecutionRecord[];
  totalExecutions: number;
  timestamp: string;
}

export interface DashboardReport {
  totalUnits: number;
  successfulUnits: number;
  failedUnits: number;
  notRunUnits: number;
  details: Record<string, StatusEntry>;
  recentLogs: ExecutionRecord[];
  totalLogEntries: number;
  timestamp: string;
}

export interface ResetReport {
  message: string;
  previousState: ResetSnapshot;
  timestamp: string;
}

export interface ExecutionLogQuery {
  limit?: number;
  offset?: number;
}

export class Orchestrator {
  readonly state: OrchestratorState;
  readonly engine: ExecutionEngine;
  readonly phases: PhaseCatalog;
  private readonly logPageSize: number;
  private readonly healthThresholds: HealthThresholds;
  private readonly logger: Logger;

  constructor(options: OrchestratorOptions = {}) {
    this.state = options.state ?? new OrchestratorState();
    this.engine = new ExecutionEngine(this.state, { retry: options.retry });
    this.phases = options.phases ?? new PhaseCatalog({});
    this.logPageSize = options.logPageSize ?? 100;
    this.healthThresholds = { ...DEFAULT_HEALTH_THRESHOLDS, ...options.healthThresholds };
    this.logger = createLogger('orchestrator');
  }

  register(name: string, handler: UnitHandler, dependencies: readonly string[] = []): WorkUnit {
    return this.state.registry.register(name, handler, dependencies);
  }

  /**
   * Run every unit in dependency order.
   * @throws MissingDependencyError / CircularDependencyError before anything runs
   */
  async runEverything(options: RunAllOptions = {}): Promise<RunAllReport> {
    return this.state.lock.runExclusive(() => this.engine.runAll(options));
  }

  /**
   * Run a single unit once, without retries.
   * @throws UnitNotFoundError
   * @throws UnitExecutionError
   */
  async runOne(name: string): Promise<UnitRunResult> {
    const result = await this.state.lock.runExclusive(() => this.engine.runUnit(name));
    return { unit: name, success: true, result, timestamp: new Date().toISOString() };
  }

  /**
   * Run the registered members of a phase, in catalog order.
   * @throws PhaseNotFoundError
   */
  async runPhase(phase: string): Promise<PhaseRunReport> {
    const members = this.phases.unitsOf(phase);
    const report = await this.state.lock.runExclusive(() => this.engine.runNamed(members));

    this.logger.info(
      { phase, executed: report.executed, skipped: report.skipped.length },
      'Phase executed'
    );

    return {
      phase,
      unitsExecuted: report.executed,
      results: report.results,
      skipped: report.skipped,
      timestamp: new Date().toISOString(),
    };
  }

  health(): HealthReport {
    const counts = this.counts();
    return {
      healthStatus: classifyHealth(counts, this.healthThresholds),
      totalUnits: counts.totalUnits,
      successfulUnits: counts.successful,
      failedUnits: counts.failed,
      notRunUnits: this.notRun(counts),
      successPercentage: successPercentage(counts),
      timestamp: new Date().toISOString(),
    };
  }

  status(): StatusReport {
    const counts = this.counts();
    return {
      systemHealth: classifySystem(counts, this.healthThresholds),
      totalUnits: counts.totalUnits,
      successfulUnits: counts.successful,
      failedUnits: counts.failed,
      notRunUnits: this.notRun(counts),
      successRate: successPercentage(counts),
      lastExecution: this.state.history.lastExecution(),
      totalLogEntries: this.state.history.size,
      runInProgress: this.state.lock.isLocked,
      timestamp: new Date().toISOString(),
    };
  }

  validate(): ValidationReport {
    return validateDependencies(this.state.registry);
  }

  listUnits(): UnitListing {
    const resolved = resolveExecutionOrder(this.state.registry);
    const units = this.state.registry.units().map((unit) => this.summarize(unit));

    return {
      units,
      totalUnits: units.length,
      executionOrder: resolved.kind === 'resolved' ? resolved.order : [],
      unitsWithDependencies: units.filter((u) => u.dependencies.length > 0).length,
    };
  }

  /**
   * @throws UnitNotFoundError
   */
  unitStatus(name: string): UnitStatusReport {
    const unit = this.state.registry.require(name);
    const executionLogs = this.state.history.recordsFor(name);

    return {
      ...this.summarize(unit),
      detail: this.state.history.getStatus(name)?.detail ?? null,
      executionLogs,
      totalExecutions: executionLogs.length,
      timestamp: new Date().toISOString(),
    };
  }

  dashboard(): DashboardReport {
    const counts = this.counts();
    return {
      totalUnits: counts.totalUnits,
      successfulUnits: counts.successful,
      failedUnits: counts.failed,
      notRunUnits: this.notRun(counts),
      details: this.state.history.statuses(),
      recentLogs: this.state.history.recent(DASHBOARD_LOG_ENTRIES),
      totalLogEntries: this.state.history.size,
      timestamp: new Date().toISOString(),
    };
  }

  executionLog(query: ExecutionLogQuery = {}): ExecutionLogPage {
    return this.state.history.query(query.limit ?? this.logPageSize, query.offset ?? 0);
  }

  dependencyGraph(): DependencyGraphView {
    return buildDependencyGraph(this.state.registry);
  }

  /**
   * Clear history and statuses once any in-flight run has finished.
   */
  async reset(): Promise<ResetReport> {
    const previousState = await this.state.lock.runExclusive(async () =>
      this.state.history.reset(this.state.registry.size)
    );

    return {
      message: 'All unit statuses and logs have been reset',
      previousState,
      timestamp: new Date().toISOString(),
    };
  }

  private counts(): HealthCounts {
    const { successful, failed } = this.state.history.counts();
    return { totalUnits: this.state.registry.size, successful, failed };
  }

  private notRun(counts: HealthCounts): number {
    return Math.max(0, counts.totalUnits - counts.successful - counts.failed);
  }

  private summarize(unit: WorkUnit): UnitSummary {
    const entry = this.state.history.getStatus(unit.name);
    return {
      name: unit.name,
      dependencies: [...unit.dependencies],
      status: entry?.status ?? 'not_run',
      lastRun: entry?.lastRun ?? null,
    };
  }
}

/**
 * Build an orchestrator from configuration: load the phase catalog and
 * register the built-in units.
 */
export async function createOrchestrator(
  config: WorkgraphConfig = getConfig()
): Promise<Orchestrator> {
  const phases = await loadPhaseCatalog(config.phasesFile);
  const orchestrator = new Orchestrator({
    phases,
    retry: config.retry,
    logPageSize: config.logPageSize,
  });

  registerBuiltInUnits(orchestrator.state.registry);
  return orchestrator;
}
