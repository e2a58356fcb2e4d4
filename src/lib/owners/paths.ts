/**
 * Path utilities
 *
 * Every OWNERS file is addressed by a monorepo path, as if all repositories
 * lived in one tree laid out as org/repo/files. Raw URIs from sigs.yaml are
 * converted to that form on the way in and may be converted back on the way
 * out.
 */

import * as path from 'node:path';
import type { OwnersConfig } from './types.js';

type UriConfig = Pick<OwnersConfig, 'rawUriPrefix' | 'branch'>;

/**
 * Normalize path to use forward slashes
 */
export function normalizeToForwardSlashes(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Monorepo path of a file found under an org directory
 *
 * root: /repos/kubernetes, file: /repos/kubernetes/test-infra/OWNERS
 *   -> kubernetes/test-infra/OWNERS
 */
export function toMonorepoPath(root: string, filePath: string): string {
  const relative = normalizeToForwardSlashes(path.relative(root, filePath));
  return `${path.basename(path.resolve(root))}/${relative}`;
}

/**
 * https://raw.githubusercontent.com/org/repo/master/path -> org/repo/path
 *
 * Values without the raw prefix are returned unchanged.
 */
export function monorepoPathFromUri(uri: string, config: UriConfig): string {
  if (!uri.startsWith(config.rawUriPrefix)) {
    return uri;
  }
  // org/repo/<branch>/path
  const parts = uri.slice(config.rawUriPrefix.length).split('/');
  if (parts.length < 4 || parts[2] !== config.branch) {
    return uri;
  }
  return [parts[0], parts[1], ...parts.slice(3)].join('/');
}

/**
 * org/repo/path -> https://raw.githubusercontent.com/org/repo/master/path
 */
export function uriFromMonorepoPath(monorepoPath: string, config: UriConfig): string {
  const parts = monorepoPath.split('/');
  if (parts.length < 3) {
    return monorepoPath;
  }
  const repo = parts.slice(0, 2).join('/');
  return `${config.rawUriPrefix}${repo}/${config.branch}/${parts.slice(2).join('/')}`;
}

/**
 * org/repo of a monorepo path, or null when there are fewer than two segments
 */
export function repoOfPath(monorepoPath: string): string | null {
  const parts = monorepoPath.split('/').filter((p) => p.length > 0);
  if (parts.length < 2) {
    return null;
  }
  return `${parts[0]}/${parts[1]}`;
}

/**
 * Alias file that applies to a monorepo path: org/repo/OWNERS_ALIASES
 */
export function aliasesPathFor(monorepoPath: string, aliasesFile: string): string | null {
  const repo = repoOfPath(monorepoPath);
  return repo ? `${repo}/${aliasesFile}` : null;
}

/**
 * True for OWNERS files inside a vendored tree (vendor/x/.../OWNERS)
 *
 * vendor/OWNERS itself is not vendored.
 */
export function isVendoredPath(monorepoPath: string): boolean {
  return /(^|\/)vendor\/.+\/[^/]+$/.test(monorepoPath);
}

/**
 * Code-unit order, stable across locales
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
