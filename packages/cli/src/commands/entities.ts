/**
 * tillwire entities
 */

import { ENTITY_CODECS } from '@tillwire/schema';
import type { CommandResult } from '../types.js';

export class EntitiesCommand {
  execute(): CommandResult {
    return { success: true, data: { kind: 'entities', names: Object.keys(ENTITY_CODECS) } };
  }
}
