/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createLogger, setLogger } from '../core/logger.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createClassifyCommand } from './commands/classify.js';
import { createValidateSkuCommand } from './commands/validate-sku.js';
import { createCheckAvailabilityCommand } from './commands/check-availability.js';
import { createFindAlternativesCommand } from './commands/find-alternatives.js';
import { createCompareRegionsCommand } from './commands/compare-regions.js';
import { createRankSkusCommand } from './commands/rank-skus.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('VM rightsizing recommendations from inventory, catalog and pricing data')
    .option('-v, --verbose', 'Log to the terminal at debug level')
    .hook('preAction', (thisCommand) => {
      const { verbose } = thisCommand.opts<{ verbose?: boolean }>();
      setLogger(createLogger(NAME, verbose === true));
    });

  program.addCommand(createAnalyzeCommand());
  program.addCommand(createClassifyCommand());
  program.addCommand(createValidateSkuCommand());
  program.addCommand(createCheckAvailabilityCommand());
  program.addCommand(createFindAlternativesCommand());
  program.addCommand(createCompareRegionsCommand());
  program.addCommand(createRankSkusCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
