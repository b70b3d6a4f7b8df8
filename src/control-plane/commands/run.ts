import { Command } from 'commander';
import { z } from 'zod';
import type { OrchestratorFactory } from '../types.js';
import {
  print,
  printError,
  formatError,
  formatSuccess,
  formatWarning,
  formatRunReport,
  formatValidationErrors,
  formatJson,
  bold,
  dim,
  yellow,
} from '../formatter.js';

/**
 * Schema for run command options. Commander sets `retry` to false for
 * `--no-retry`.
 */
const runOptionsSchema = z.object({
  retry: z.boolean().default(true),
  maxRetries: z.coerce.number().int().min(1).max(10).optional(),
  json: z.boolean().default(false),
});

type RunOptions = z.infer<typeof runOptionsSchema>;

/**
 * Create the run command.
 */
export function createRunCommand(getOrchestrator: OrchestratorFactory): Command {
  const command = new Command('run')
    .description('Run every unit in dependency order')
    .option('--no-retry', 'Do not retry failed units')
    .option('--max-retries <n>', 'Total attempts per unit (1-10)')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeRun(getOrchestrator, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the run command.
 */
async function executeRun(
  getOrchestrator: OrchestratorFactory,
  rawOptions: Record<string, unknown>
): Promise<void> {
  const optionsResult = runOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printError(
      formatValidationErrors(
        optionsResult.error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        }))
      )
    );
    process.exitCode = 1;
    return;
  }

  const options: RunOptions = optionsResult.data;
  const orchestrator = await getOrchestrator();

  const onRetry = (unit: string, delayMs: number, nextAttempt: number): void => {
    print(`  ${yellow('↻')} ${unit} ${dim(`attempt ${nextAttempt} in ${delayMs}ms`)}`);
  };

  if (!options.json) {
    print(bold('Running all units'));
    print('');
    orchestrator.engine.on('retry-scheduled', onRetry);
  }

  try {
    const report = await orchestrator.runEverything({
      retryFailed: options.retry,
      maxRetries: options.maxRetries,
    });

    if (options.json) {
      print(formatJson(report));
    } else {
      print('');
      print(
        report.failed === 0
          ? formatSuccess('All units executed successfully')
          : formatWarning(`${report.failed} unit(s) failed`)
      );
      print('');
      print(formatRunReport(report));
    }

    if (report.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    orchestrator.engine.off('retry-scheduled', onRetry);
  }
}
