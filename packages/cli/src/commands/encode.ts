/**
 * tillwire encode <entity> [file]
 *
 * Decodes the input, then writes it back as canonical wire JSON: unknown
 * fields dropped, defaults filled in, expanded references collapsed unless
 * preserveExpanded is set.
 */

import type { Logger } from '../logger.js';
import { decodeLogged } from '../lib/decode.js';
import type { CommandResult } from '../types.js';
import { decodeFailure, handleError, parseJson, resolveCodec } from '../utils.js';

export interface EncodeCommandOptions {
  strict?: boolean;
  preserveExpanded?: boolean;
}

export class EncodeCommand {
  constructor(private readonly logger: Logger) {}

  execute(entity: string, input: string, options: EncodeCommandOptions = {}): CommandResult {
    try {
      const codec = resolveCodec(entity);
      const decoded = decodeLogged(this.logger, codec, parseJson(input), { strict: options.strict });
      if (!decoded.ok) {
        return decodeFailure(decoded.error);
      }
      const wire = codec.encode(decoded.value, { preserveExpanded: options.preserveExpanded });
      return { success: true, data: { kind: 'encoded', entity: codec.name, wire } };
    } catch (error) {
      return handleError(error);
    }
  }
}
