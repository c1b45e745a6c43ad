/**
 * Paginated list envelope
 *
 * `{ object: "list", data, has_more, url, total_count? }`. Elements are
 * decoded in order with the item schema; one bad element fails the list.
 * Following `has_more` to later pages is the transport's job.
 */

import { z } from 'zod';
import type { WireSchema } from './errors.js';
import type { JsonObject, JsonValue } from './json.js';
import { NonnegIntSchema } from './scalars.js';
import type { PaginatedList } from './types.js';
import { compact, parseNested } from './wire.js';

const ListEnvelopeSchema = z.object({
  object: z.literal('list'),
  data: z.array(z.unknown()),
  has_more: z.boolean(),
  url: z.string(),
  total_count: NonnegIntSchema.optional(),
});

export function paginatedList<T>(item: WireSchema<T>): WireSchema<PaginatedList<T>> {
  return ListEnvelopeSchema.transform((list, ctx): PaginatedList<T> => {
    const data: T[] = [];
    let failed = false;
    for (const [index, element] of list.data.entries()) {
      const nested = parseNested(item, element, ['data', index], ctx);
      if (nested.ok) {
        data.push(nested.value);
      } else {
        failed = true;
      }
    }
    if (failed) {
      return z.NEVER;
    }
    return list.total_count === undefined
      ? { data, has_more: list.has_more, url: list.url }
      : { data, has_more: list.has_more, url: list.url, total_count: list.total_count };
  });
}

export function listToWire<T>(list: PaginatedList<T>, toWire: (item: T) => JsonValue): JsonObject {
  return compact({
    object: 'list',
    data: list.data.map(toWire),
    has_more: list.has_more,
    url: list.url,
    total_count: list.total_count,
  });
}
