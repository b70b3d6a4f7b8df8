import type { UnitRegistry } from '../orchestrator/registry.js';

/**
 * Result shape shared by the demonstration units.
 */
export interface TaskReport {
  task: string;
  status: 'completed';
  actions: string[];
}

interface BuiltInUnit {
  name: string;
  dependencies: string[];
  task: string;
  actions: string[];
}

const BUILT_IN_UNITS: BuiltInUnit[] = [
  {
    name: 'seo_orchestration_core',
    dependencies: [],
    task: 'seo_orchestration',
    actions: ['workflow_orchestrated', 'agents_prioritized', 'resources_allocated'],
  },
  {
    name: 'on_page_seo_agent',
    dependencies: [],
    task: 'on_page_seo',
    actions: ['meta_tags_optimized', 'headers_checked', 'content_analyzed'],
  },
  {
    name: 'off_page_seo_agent',
    dependencies: ['on_page_seo_agent'],
    task: 'off_page_seo',
    actions: ['backlinks_analyzed', 'social_signals_checked'],
  },
  {
    name: 'technical_seo_agent',
    dependencies: [],
    task: 'technical_seo',
    actions: ['site_speed_analyzed', 'mobile_friendliness_checked'],
  },
  {
    name: 'local_seo_agent',
    dependencies: ['technical_seo_agent'],
    task: 'local_seo',
    actions: ['google_my_business_optimized', 'local_citations_updated'],
  },
];

/**
 * Register the demonstration units. Returns the registered names in order.
 */
export function registerBuiltInUnits(registry: UnitRegistry): string[] {
  for (const unit of BUILT_IN_UNITS) {
    registry.register(
      unit.name,
      (): TaskReport => ({ task: unit.task, status: 'completed', actions: [...unit.actions] }),
      unit.dependencies
    );
  }
  return BUILT_IN_UNITS.map((unit) => unit.name);
}
