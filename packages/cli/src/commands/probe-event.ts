/**
 * tillwire probe-event [file]
 *
 * Reads the event type first, then decodes the payload with the codec the
 * type maps to.
 */

import { decodeKnownEvent, probeEventType } from '@tillwire/schema';
import type { Logger } from '../logger.js';
import type { CommandResult } from '../types.js';
import { decodeFailure, handleError, parseJson } from '../utils.js';

export interface ProbeEventCommandOptions {
  strict?: boolean;
}

export class ProbeEventCommand {
  constructor(private readonly logger: Logger) {}

  execute(input: string, options: ProbeEventCommandOptions = {}): CommandResult {
    try {
      const json = parseJson(input);

      const probe = probeEventType(json);
      if (!probe.ok) {
        this.logger.warn({ entity: 'event', code: probe.error.code, path: probe.error.path }, 'probe failed');
        return decodeFailure(probe.error);
      }

      const { id, type } = probe.value;
      const known = decodeKnownEvent(json, { strict: options.strict });
      if (!known.ok) {
        this.logger.warn(
          { entity: 'event', type, code: known.error.code, path: known.error.path },
          'decode failed'
        );
        return decodeFailure(known.error);
      }

      this.logger.debug({ entity: 'event', type, payload: known.value.payload }, 'decoded');
      return { success: true, data: { kind: 'event', id, type, payload: known.value.payload } };
    } catch (error) {
      return handleError(error);
    }
  }
}
