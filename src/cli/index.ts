/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createServeCommand } from './commands/serve.js';
import { createRecommendCommand } from './commands/recommend.js';
import { createStrategiesCommand } from './commands/strategies.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Cadence — adaptive intervention recommendations')
    .option('-v, --verbose', 'Print debug logs to the console instead of the log file');

  program.addCommand(createServeCommand());
  program.addCommand(createRecommendCommand());
  program.addCommand(createStrategiesCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(`\n❌ ${String(error)}\n`);
    }
    process.exit(1);
  }
}
