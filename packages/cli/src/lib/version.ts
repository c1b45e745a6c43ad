/**
 * CLI Version Utility
 *
 * Reads version from package.json at runtime to avoid hardcoding.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Get CLI version from package.json (two levels up from src/lib or dist/lib)
 */
export function getVersion(): string {
  let text: string;
  try {
    text = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
  } catch {
    return '0.0.0-unknown';
  }
  const pkg = PackageJsonSchema.safeParse(JSON.parse(text));
  return pkg.success ? pkg.data.version : '0.0.0-unknown';
}
