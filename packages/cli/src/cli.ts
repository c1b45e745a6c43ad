#!/usr/bin/env node
/**
 * tillwire CLI
 * Commands: decode, encode, probe-event, entities
 */

import { Command } from 'commander';
import { EntitiesCommand } from './commands/entities.js';
import { DecodeCommand } from './commands/decode.js';
import { EncodeCommand } from './commands/encode.js';
import { ProbeEventCommand } from './commands/probe-event.js';
import { loadConfig, withFlags, type CliConfig } from './config.js';
import { getVersion } from './lib/version.js';
import { createLogger, type Logger } from './logger.js';
import type { CLIOptions, CommandResult } from './types.js';
import { createExitHandler, exitCodeOf, formatOutput, handleError, readInput } from './utils.js';

const program = new Command();
const exit = createExitHandler();

program
  .name('tillwire')
  .description('Decode, validate and re-encode payments API objects')
  .version(getVersion());

// Global options
program
  .option('-j, --json', 'output in JSON format')
  .option('-s, --strict', 'also reject documented invariants the API does not enforce')
  .option('-p, --preserve-expanded', 'keep embedded objects when re-encoding');

function report(result: CommandResult): void {
  console.log(formatOutput(result, program.opts<CLIOptions>().json));
  exit(exitCodeOf(result));
}

/**
 * Load configuration, read the input and run one command.
 */
async function runWithInput(
  file: string | undefined,
  execute: (input: string, config: CliConfig, logger: Logger) => CommandResult
): Promise<void> {
  let result: CommandResult;
  try {
    const config = withFlags(loadConfig(), program.opts<CLIOptions>());
    const logger = createLogger(config.logLevel);
    result = execute(await readInput(file), config, logger);
  } catch (error) {
    result = handleError(error);
  }
  report(result);
}

// tillwire decode <entity> [file]
program
  .command('decode <entity> [file]')
  .description('Decode JSON (from file or stdin) as the named entity')
  .action(async (entity: string, file: string | undefined) => {
    await runWithInput(file, (input, config, logger) =>
      new DecodeCommand(logger).execute(entity, input, { strict: config.strict })
    );
  });

// tillwire encode <entity> [file]
program
  .command('encode <entity> [file]')
  .description('Decode then re-encode as canonical wire JSON')
  .action(async (entity: string, file: string | undefined) => {
    await runWithInput(file, (input, config, logger) =>
      new EncodeCommand(logger).execute(entity, input, {
        strict: config.strict,
        preserveExpanded: config.preserveExpanded,
      })
    );
  });

// tillwire probe-event [file]
program
  .command('probe-event [file]')
  .description('Read an event type, then decode its payload')
  .action(async (file: string | undefined) => {
    await runWithInput(file, (input, config, logger) =>
      new ProbeEventCommand(logger).execute(input, { strict: config.strict })
    );
  });

// tillwire entities
program
  .command('entities')
  .description('List the entity names decode and encode accept')
  .action(() => {
    report(new EntitiesCommand().execute());
  });

// Handle unknown commands
program.on('command:*', () => {
  console.error('Invalid command. See --help for available commands.');
  exit(2);
});

// If no command provided, show help
if (!process.argv.slice(2).length) {
  program.outputHelp();
  exit(0);
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  exit(1);
});
