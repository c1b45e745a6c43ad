/**
 * @tillwire/cli - command-line decoding and encoding of payments API objects
 */

export { DecodeCommand } from './commands/decode.js';
export { EncodeCommand } from './commands/encode.js';
export { ProbeEventCommand } from './commands/probe-event.js';
export { EntitiesCommand } from './commands/entities.js';
export { loadConfig, withFlags } from './config.js';
export type { CliConfig } from './config.js';
export { ConfigError, InputError } from './errors.js';
export { createLogger } from './logger.js';
export { formatOutput, exitCodeOf, readInput } from './utils.js';
export { EXIT_CODES } from './types.js';
export type { CLIOptions, CommandData, CommandResult, ExitCode } from './types.js';
