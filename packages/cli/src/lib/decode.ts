import type { DecodeOptions, DecodeResult, EntityCodec } from '@tillwire/schema';
import type { Logger } from '../logger.js';

/**
 * Decode with a codec, logging the outcome.
 */
export function decodeLogged<T>(
  logger: Logger,
  codec: EntityCodec<T>,
  input: unknown,
  options: DecodeOptions
): DecodeResult<T> {
  const result = codec.decode(input, options);
  if (result.ok) {
    logger.debug({ entity: codec.name, ok: true }, 'decoded');
  } else {
    logger.warn(
      { entity: codec.name, code: result.error.code, path: result.error.path },
      'decode failed'
    );
  }
  return result;
}
