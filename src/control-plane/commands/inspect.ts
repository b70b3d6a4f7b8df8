import { Command } from 'commander';
import type { OrchestratorFactory } from '../types.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatValidationReport,
  formatDependencyGraph,
  formatUnitList,
  formatHealth,
} from '../formatter.js';

/**
 * Commands that report on the registry without executing anything.
 */

export function createValidateCommand(getOrchestrator: OrchestratorFactory): Command {
  return new Command('validate')
    .description('Check the dependency graph for missing dependencies and cycles')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        const report = (await getOrchestrator()).validate();
        print(options.json ? formatJson(report) : formatValidationReport(report));
        if (!report.validationPassed) {
          process.exitCode = 1;
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });
}

export function createGraphCommand(getOrchestrator: OrchestratorFactory): Command {
  return new Command('graph')
    .description('Show each unit with its dependencies and dependents')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        const view = (await getOrchestrator()).dependencyGraph();
        print(options.json ? formatJson(view) : formatDependencyGraph(view));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });
}

export function createUnitsCommand(getOrchestrator: OrchestratorFactory): Command {
  return new Command('units')
    .description('List registered units, their status and the execution order')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        const orchestrator = await getOrchestrator();
        const listing = orchestrator.listUnits();

        if (options.json) {
          print(formatJson(listing));
          return;
        }

        print(formatUnitList(listing));
        print('');
        print(formatHealth(orchestrator.health()));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });
}
