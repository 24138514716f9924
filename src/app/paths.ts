/**
 * Path resolution utilities
 *
 * Resolves paths relative to the project root regardless of process.cwd(),
 * so config.defaults.yaml is found wherever the CLI is started from.
 */

import { fileURLToPath } from 'url';
import { dirname, join, isAbsolute } from 'path';

// Detect project root based on runtime location:
// - tsx/vitest run from src/app/paths.ts (2 levels up)
// - node runs from dist/src/app/paths.js (3 levels up)
const moduleDir = dirname(fileURLToPath(import.meta.url));
const isCompiledDist = moduleDir.includes(`${join('dist', 'src')}`);
export const PROJECT_ROOT = isCompiledDist
  ? join(moduleDir, '..', '..', '..')
  : join(moduleDir, '..', '..');

/**
 * Resolve a path relative to the project root (unless already absolute).
 * A leading `~` expands to the home directory.
 */
export function resolveProjectPath(path: string): string {
  if (isAbsolute(path)) return path;
  if (path.startsWith('~')) {
    return path.replace('~', process.env.HOME || '');
  }
  return join(PROJECT_ROOT, path);
}

/** Resolve a user-supplied path against the working directory. */
export function resolveUserPath(path: string): string {
  if (path.startsWith('~')) return path.replace('~', process.env.HOME || '');
  return isAbsolute(path) ? path : join(process.cwd(), path);
}
