import { Command } from 'commander';
import { createOrchestrator, type Orchestrator } from '../orchestrator/orchestrator.js';
import type { OrchestratorFactory } from './types.js';
import { createServeCommand } from './commands/serve.js';
import { createRunCommand } from './commands/run.js';
import { createRunUnitCommand } from './commands/run-unit.js';
import { createRunPhaseCommand } from './commands/run-phase.js';
import {
  createValidateCommand,
  createGraphCommand,
  createUnitsCommand,
} from './commands/inspect.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

export interface ProgramOptions {
  /** Defaults to an orchestrator built from environment configuration */
  createOrchestrator?: OrchestratorFactory;
}

/**
 * Memoize a factory so every command in one invocation shares an instance.
 */
function once(factory: OrchestratorFactory): OrchestratorFactory {
  let instance: Promise<Orchestrator> | null = null;
  return () => {
    instance ??= factory();
    return instance;
  };
}

/**
 * Create and configure the CLI program.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const getOrchestrator = once(options.createOrchestrator ?? (() => createOrchestrator()));
  const program = new Command();

  program
    .name('workgraph')
    .description('Dependency-aware task orchestration: register units, resolve order, run with retries')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createServeCommand(getOrchestrator));
  program.addCommand(createRunCommand(getOrchestrator));
  program.addCommand(createRunUnitCommand(getOrchestrator));
  program.addCommand(createRunPhaseCommand(getOrchestrator));
  program.addCommand(createValidateCommand(getOrchestrator));
  program.addCommand(createGraphCommand(getOrchestrator));
  program.addCommand(createUnitsCommand(getOrchestrator));

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(
  args: string[] = process.argv,
  options: ProgramOptions = {}
): Promise<void> {
  const program = createProgram(options);

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createServeCommand } from './commands/serve.js';
export { createRunCommand } from './commands/run.js';
export { createRunUnitCommand } from './commands/run-unit.js';
export { createRunPhaseCommand } from './commands/run-phase.js';
export {
  createValidateCommand,
  createGraphCommand,
  createUnitsCommand,
} from './commands/inspect.js';
