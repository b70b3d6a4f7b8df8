// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  cyan,
  formatUnitStatus,
  formatHealthGrade,
  formatDuration,
  truncate,
  padRight,
  padLeft,
  formatTable,
  formatRunReport,
  formatPhaseReport,
  formatUnitList,
  formatValidationReport,
  formatDependencyGraph,
  formatHealth,
  formatSuccess,
  formatError,
  formatWarning,
  formatJson,
  formatValidationErrors,
  print,
  printError,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createServeCommand,
  createRunCommand,
  createRunUnitCommand,
  createRunPhaseCommand,
  createValidateCommand,
  createGraphCommand,
  createUnitsCommand,
  type ProgramOptions,
} from './cli.js';
export type { OrchestratorFactory } from './types.js';
