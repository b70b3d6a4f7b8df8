import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import type {
  ExecutionLogPage,
  ExecutionRecord,
  ResetSnapshot,
  StatusEntry,
} from './types.js';

/**
 * Status counts over units that have run.
 */
export interface StatusCounts {
  successful: number;
  failed: number;
}

/**
 * In-memory execution history.
 *
 * Holds the append-only log of every attempt and the latest status per
 * unit. Lives for the life of the process; cleared only by reset().
 */
export class ExecutionHistory {
  private readonly logger: Logger;
  private readonly records: ExecutionRecord[] = [];
  private readonly statusByUnit: Map<string, StatusEntry> = new Map();

  constructor() {
    this.logger = createLogger('execution-history');
  }

  append(record: ExecutionRecord): void {
    this.records.push(record);
  }

  setStatus(
    unit: string,
    status: StatusEntry['status'],
    detail: unknown,
    timestamp: string
  ): void {
    this.statusByUnit.set(unit, { status, detail, lastRun: timestamp });
  }

  getStatus(unit: string): StatusEntry | undefined {
    return this.statusByUnit.get(unit);
  }

  /**
   * Status entries keyed by unit, in first-run order.
   */
  statuses(): Record<string, StatusEntry> {
    return Object.fromEntries(this.statusByUnit);
  }

  counts(): StatusCounts {
    let successful = 0;
    let failed = 0;
    for (const entry of this.statusByUnit.values()) {
      if (entry.status === 'success') successful++;
      else failed++;
    }
    return { successful, failed };
  }

  /**
   * A page of the log in append order: records [offset, offset + limit).
   */
  query(limit: number, offset = 0): ExecutionLogPage {
    const start = Math.max(0, offset);
    const logs = this.records.slice(start, start + Math.max(0, limit));
    return {
      totalEntries: this.records.length,
      returned: logs.length,
      offset,
      limit,
      logs,
    };
  }

  recordsFor(unit: string): ExecutionRecord[] {
    return this.records.filter((r) => r.unit === unit);
  }

  /**
   * Most recent records, oldest first.
   */
  recent(count: number): ExecutionRecord[] {
    return count > 0 ? this.records.slice(-count) : [];
  }

  /**
   * Timestamp of the most recent attempt of any unit.
   */
  lastExecution(): string | null {
    let latest: string | null = null;
    for (const entry of this.statusByUnit.values()) {
      if (latest === null || entry.lastRun > latest) {
        latest = entry.lastRun;
      }
    }
    return latest;
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Clear the log and the status map, returning the counts they held.
   */
  reset(totalUnits: number): ResetSnapshot {
    const { successful, failed } = this.counts();
    const snapshot: ResetSnapshot = {
      totalUnits,
      successfulUnits: successful,
      failedUnits: failed,
      logEntriesCleared: this.records.length,
    };

    this.records.length = 0;
    this.statusByUnit.clear();

    this.logger.info(snapshot, 'Execution history reset');
    return snapshot;
  }
}
