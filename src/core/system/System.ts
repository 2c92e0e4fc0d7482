import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const isDevelopment = process.env.NODE_ENV === 'development';

/**
 * Walks up from `start` to the first directory holding the bundled error
 * templates. Works from both `src/core/system` and the built `dist/`.
 */
export function findPackageRoot(start: string, marker = join('templates', 'Error')): string {
  let current = start;

  for (;;) {
    if (existsSync(join(current, marker))) return current;

    const parent = dirname(current);
    if (parent === current) return start;
    current = parent;
  }
}

export const PACKAGE_ROOT = findPackageRoot(dirname(fileURLToPath(import.meta.url)));
export const CORE_TEMPLATES = join(PACKAGE_ROOT, 'templates');
