import { Command } from 'commander';
import { z } from 'zod';
import { startServer } from '../../server/index.js';
import { getConfig } from '../../config/index.js';
import type { OrchestratorFactory } from '../types.js';
import {
  print,
  printError,
  formatError,
  formatValidationErrors,
  bold,
  cyan,
} from '../formatter.js';

/**
 * Schema for serve command options. Port and host fall back to the
 * environment configuration.
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().optional(),
  corsOrigin: z.string().optional(),
});

type ServeOptions = z.infer<typeof serveOptionsSchema>;

/**
 * Create the serve command.
 */
export function createServeCommand(getOrchestrator: OrchestratorFactory): Command {
  const command = new Command('serve')
    .description('Start the HTTP server')
    .option('-p, --port <port>', 'Port to listen on')
    .option('-H, --host <host>', 'Host to bind to')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(getOrchestrator, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the serve command.
 */
async function executeServe(
  getOrchestrator: OrchestratorFactory,
  rawOptions: Record<string, unknown>
): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
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

  const options: ServeOptions = optionsResult.data;
  const config = getConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;

  const corsOrigins = options.corsOrigin
    ? options.corsOrigin.split(',').map((o) => o.trim())
    : ['*'];

  print(`Starting workgraph server...`);
  print('');
  print(`${bold('Port:')} ${cyan(String(port))}`);
  print(`${bold('Host:')} ${cyan(host)}`);
  print(`${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print(`${bold('Auth:')} ${cyan(config.apiKey ? 'API key required for POST routes' : 'disabled')}`);
  print('');

  const orchestrator = await getOrchestrator();
  const server = await startServer({
    orchestrator,
    port,
    host,
    corsOrigins,
    apiKey: config.apiKey,
  });

  const shutdown = (): void => {
    print('');
    print('Shutting down server...');
    server.close().then(() => {
      print('Server stopped');
      process.exit(0);
    }).catch((err: unknown) => {
      printError(formatError(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('POST')} /api/v1/runs                - Run every unit`);
  print(`  ${cyan('POST')} /api/v1/units/:name/run     - Run one unit`);
  print(`  ${cyan('POST')} /api/v1/phases/:phase/run   - Run a phase`);
  print(`  ${cyan('GET')}  /api/v1/units               - List units`);
  print(`  ${cyan('GET')}  /api/v1/dashboard           - Dashboard summary`);
  print(`  ${cyan('GET')}  /health                     - Health grade`);
  print('');
  print('Press Ctrl+C to stop the server');
}
