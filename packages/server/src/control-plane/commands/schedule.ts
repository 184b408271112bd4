import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { getScheduleDates } from '../../schedules/index.js';
import { MemoryOrchestrationStore } from '../../storage/memory-store.js';
import { loadDeploymentsFile, seedStore } from '../deployments-file.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatSchedulePreview,
} from '../formatter.js';
import { printOptionErrors } from './options.js';

const previewOptionsSchema = z.object({
  deployments: z.string().min(1),
  name: z.string().trim().min(1, 'Deployment name is required'),
  count: z.coerce.number().int().min(1).max(1000).default(10),
  json: z.boolean().default(false),
});

/**
 * Create the schedule command.
 */
export function createScheduleCommand(): Command {
  const command = new Command('schedule').description('Inspect deployment schedules');

  command
    .command('preview')
    .description('Print the upcoming occurrences of a deployment schedule')
    .requiredOption('-d, --deployments <file>', 'YAML file of deployments')
    .requiredOption('--name <deployment>', 'Deployment name')
    .option('-n, --count <count>', 'Number of occurrences to show', '10')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executePreview(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executePreview(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = previewOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    printOptionErrors(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  const store = new MemoryOrchestrationStore();
  await seedStore(store, await loadDeploymentsFile(options.deployments));

  const deployment = await store.getDeploymentByName(options.name);
  if (!deployment) {
    printError(formatError(`Deployment not found: ${options.name}`));
    process.exitCode = 1;
    return;
  }
  if (!deployment.schedule) {
    printError(formatError(`Deployment has no schedule: ${options.name}`));
    process.exitCode = 1;
    return;
  }

  const now = new Date();
  const dates = getScheduleDates(deployment.schedule, {
    start: now,
    end: new Date(now.getTime() + getConfig().scheduler.maxScheduledTimeMs),
    limit: options.count,
  });

  if (options.json) {
    print(
      formatJson({
        deployment: deployment.name,
        isScheduleActive: deployment.isScheduleActive,
        occurrences: dates.map((date) => date.toISOString()),
      })
    );
  } else {
    print(formatSchedulePreview(deployment, dates));
  }
}
