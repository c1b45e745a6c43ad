/**
 * tillwire decode <entity> [file]
 */

import type { Logger } from '../logger.js';
import { decodeLogged } from '../lib/decode.js';
import type { CommandResult } from '../types.js';
import { decodeFailure, handleError, parseJson, resolveCodec } from '../utils.js';

export interface DecodeCommandOptions {
  strict?: boolean;
}

export class DecodeCommand {
  constructor(private readonly logger: Logger) {}

  execute(entity: string, input: string, options: DecodeCommandOptions = {}): CommandResult {
    try {
      const codec = resolveCodec(entity);
      const result = decodeLogged(this.logger, codec, parseJson(input), { strict: options.strict });
      if (!result.ok) {
        return decodeFailure(result.error);
      }
      return { success: true, data: { kind: 'decoded', entity: codec.name, value: result.value } };
    } catch (error) {
      return handleError(error);
    }
  }
}
