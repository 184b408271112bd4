import { Command } from 'commander';
import { createServeCommand } from './commands/serve.js';
import { createScheduleCommand } from './commands/schedule.js';
import { createTickCommand } from './commands/tick.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('runplane')
    .description('Runplane - workflow run orchestration with scheduling and late-run detection')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createServeCommand());
  program.addCommand(createScheduleCommand());
  program.addCommand(createTickCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }
    throw error;
  }
}

export { createServeCommand } from './commands/serve.js';
export { createScheduleCommand } from './commands/schedule.js';
export { createTickCommand } from './commands/tick.js';
