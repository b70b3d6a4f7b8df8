/**
 * Health classification over the status map.
 *
 * Both classifications are pure functions of the counts; timestamps are
 * added by the caller.
 */

/**
 * Grade of the most recent outcomes across all registered units.
 */
export const HealthGrade = {
  EXCELLENT: 'EXCELLENT',
  GOOD: 'GOOD',
  FAIR: 'FAIR',
  POOR: 'POOR',
} as const;

export type HealthGrade = (typeof HealthGrade)[keyof typeof HealthGrade];

/**
 * Coarse system state used by the status report.
 */
export type SystemHealth = 'healthy' | 'degraded' | 'critical';

export interface HealthCounts {
  totalUnits: number;
  successful: number;
  failed: number;
}

/**
 * Ratios of the registered unit count. A grade applies when both of its
 * bounds hold; grades are tried from best to worst.
 */
export interface HealthThresholds {
  excellentMinSuccess: number;
  goodMaxFailed: number;
  goodMinSuccess: number;
  fairMaxFailed: number;
  /** Failed share above which the system is critical */
  criticalFailed: number;
}

export const DEFAULT_HEALTH_THRESHOLDS: HealthThresholds = {
  excellentMinSuccess: 0.8,
  goodMaxFailed: 0.1,
  goodMinSuccess: 0.6,
  fairMaxFailed: 0.2,
  criticalFailed: 0.3,
};

export function classifyHealth(
  counts: HealthCounts,
  thresholds: HealthThresholds = DEFAULT_HEALTH_THRESHOLDS
): HealthGrade {
  const { totalUnits, successful, failed } = counts;

  if (failed === 0 && successful >= totalUnits * thresholds.excellentMinSuccess) {
    return HealthGrade.EXCELLENT;
  }
  if (
    failed < totalUnits * thresholds.goodMaxFailed &&
    successful >= totalUnits * thresholds.goodMinSuccess
  ) {
    return HealthGrade.GOOD;
  }
  if (failed < totalUnits * thresholds.fairMaxFailed) {
    return HealthGrade.FAIR;
  }
  return HealthGrade.POOR;
}

export function classifySystem(
  counts: HealthCounts,
  thresholds: HealthThresholds = DEFAULT_HEALTH_THRESHOLDS
): SystemHealth {
  if (counts.failed > counts.totalUnits * thresholds.criticalFailed) {
    return 'critical';
  }
  return counts.failed > 0 ? 'degraded' : 'healthy';
}

/**
 * Share of registered units whose latest attempt succeeded, as a percentage.
 */
export function successPercentage(counts: HealthCounts): number {
  return (counts.successful / Math.max(1, counts.totalUnits)) * 100;
}
