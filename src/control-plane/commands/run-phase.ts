import { Command } from 'commander';
import type { OrchestratorFactory } from '../types.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatPhaseReport,
} from '../formatter.js';

/**
 * Create the run-phase command.
 */
export function createRunPhaseCommand(getOrchestrator: OrchestratorFactory): Command {
  const command = new Command('run-phase')
    .description('Run the registered units of a phase')
    .argument('<phase>', 'Phase name')
    .option('--json', 'Output result as JSON', false)
    .action(async (phase: string, options: { json?: boolean }) => {
      try {
        const orchestrator = await getOrchestrator();
        const report = await orchestrator.runPhase(phase.trim());

        print(options.json ? formatJson(report) : formatPhaseReport(report));

        if (report.results.some((r) => !r.success)) {
          process.exitCode = 1;
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
