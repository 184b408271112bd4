import { Command } from 'commander';
import { z } from 'zod';
import { print, printError, formatError, formatDurationMs, bold, cyan } from '../formatter.js';
import { getConfig } from '../../config/index.js';
import { createRuntime } from '../../runtime.js';
import { loadDeploymentsFile, seedStore } from '../deployments-file.js';
import { createLogger } from '../../utils/logger.js';
import { printOptionErrors } from './options.js';

const log = createLogger('serve-command');

/**
 * Schema for serve command options
 */
const serveOptionsSchema = z.object({
  deployments: z.string().min(1, 'A deployments file is required'),
});

type ServeOptions = z.infer<typeof serveOptionsSchema>;

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Run the scheduler and late-run services until interrupted')
    .requiredOption('-d, --deployments <file>', 'YAML file of deployments and concurrency limits')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
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
async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printOptionErrors(optionsResult.error);
    return;
  }
  const options: ServeOptions = optionsResult.data;

  const config = getConfig();
  const file = await loadDeploymentsFile(options.deployments);
  const runtime = createRuntime({ config });
  const deployments = await seedStore(runtime.store, file);

  print('Starting runplane services...');
  print('');
  print(`${bold('Deployments:')} ${cyan(String(deployments.length))}`);
  print(`${bold('Concurrency Limits:')} ${cyan(String(file.concurrencyLimits.length))}`);
  print('');
  print(bold('Scheduler:'));
  print(`  ${bold('Interval:')} ${cyan(formatDurationMs(config.scheduler.loopIntervalMs))}`);
  print(`  ${bold('Max Runs:')} ${cyan(String(config.scheduler.maxRuns))}`);
  print(`  ${bold('Horizon:')} ${cyan(formatDurationMs(config.scheduler.maxScheduledTimeMs))}`);
  print(bold('Late Runs:'));
  print(`  ${bold('Interval:')} ${cyan(formatDurationMs(config.lateRuns.loopIntervalMs))}`);
  print(`  ${bold('Threshold:')} ${cyan(formatDurationMs(config.lateRuns.lateThresholdMs))}`);
  print('');

  runtime.notifier.onTransition((event) => {
    log.debug(
      { runId: event.runId, from: event.fromState.name, to: event.toState.name },
      'Transition published'
    );
  });
  runtime.start();

  const shutdown = (): void => {
    print('');
    print('Shutting down services...');
    runtime
      .stop()
      .then(() => {
        print('Services stopped');
        process.exit(0);
      })
      .catch((err: unknown) => {
        printError(formatError(err instanceof Error ? err.message : String(err)));
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print('Services are running. Press Ctrl+C to stop.');
}
