import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { createRuntime } from '../../runtime.js';
import { loadDeploymentsFile, seedStore } from '../deployments-file.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatRunList,
  formatTickSummary,
} from '../formatter.js';
import { printOptionErrors } from './options.js';

const tickOptionsSchema = z.object({
  deployments: z.string().min(1),
  json: z.boolean().default(false),
});

/**
 * Create the tick command.
 */
export function createTickCommand(): Command {
  const command = new Command('tick')
    .description('Run one scheduler tick and one late-run tick, then exit')
    .requiredOption('-d, --deployments <file>', 'YAML file of deployments and concurrency limits')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeTick(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeTick(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = tickOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printOptionErrors(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  const runtime = createRuntime({ config: getConfig() });
  await seedStore(runtime.store, await loadDeploymentsFile(options.deployments));

  const scheduler = await runtime.scheduler.scheduleRuns();
  const lateRuns = await runtime.lateRuns.markLateRuns();
  const runs = await runtime.store.listRuns();

  if (options.json) {
    print(
      formatJson({
        scheduler,
        lateRuns,
        runs: runs.map((run) => ({
          id: run.id,
          name: run.name,
          deploymentId: run.deploymentId,
          state: run.state.name,
          expectedStartTime: run.expectedStartTime?.toISOString() ?? null,
        })),
      })
    );
    return;
  }

  print(formatTickSummary(scheduler, lateRuns));
  print('');
  print(formatRunList(runs));
}
