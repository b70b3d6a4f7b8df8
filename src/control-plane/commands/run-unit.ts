import { Command } from 'commander';
import type { OrchestratorFactory } from '../types.js';
import { print, printError, formatError, formatSuccess, formatJson } from '../formatter.js';

/**
 * Create the run-unit command.
 */
export function createRunUnitCommand(getOrchestrator: OrchestratorFactory): Command {
  const command = new Command('run-unit')
    .description('Run a single unit once, ignoring its dependencies')
    .argument('<name>', 'Unit name')
    .option('--json', 'Output result as JSON', false)
    .action(async (name: string, options: { json?: boolean }) => {
      try {
        const orchestrator = await getOrchestrator();
        const result = await orchestrator.runOne(name.trim());

        if (options.json) {
          print(formatJson(result));
        } else {
          print(formatSuccess(`Unit ${result.unit} executed successfully`));
          print(formatJson(result.result));
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
