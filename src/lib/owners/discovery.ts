/**
 * Discovery of OWNERS and OWNERS_ALIASES files
 *
 * Uses ripgrep to list declaration files below each org directory.
 * ripgrep does not follow symlinks, which keeps it out of the symlink loops
 * some repositories contain.
 */

import { execSync, spawnSync } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { isVendoredPath, normalizeToForwardSlashes, toMonorepoPath } from './paths.js';

/**
 * Kind of declaration file
 */
export type DeclarationKind = 'owners' | 'aliases';

/**
 * A discovered declaration file
 */
export interface DeclarationFile {
  /** Monorepo path, e.g. kubernetes/test-infra/OWNERS */
  path: string;
  /** Absolute path on disk */
  absolutePath: string;
  kind: DeclarationKind;
}

/**
 * Discovery result for one root
 */
export interface DiscoveryResult {
  files: DeclarationFile[];
  skipped: Array<{ path: string; reason: string }>;
  errors: Array<{ path: string; error: string }>;
}

/**
 * Names of the declaration files
 */
export interface DeclarationNames {
  ownersFile: string;
  aliasesFile: string;
}

/**
 * Filesystem walk the loader reads declarations through
 */
export interface DeclarationSource {
  /** Enumerate declaration files below an org directory */
  discover(root: string): DiscoveryResult;
  /** Read a declaration file; throws when unreadable */
  read(file: DeclarationFile): string;
}

/**
 * Minimal environment for ripgrep: no user config files, no pager
 */
function ripgrepEnv(): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const name of ['PATH', 'HOME', 'SYSTEMROOT']) {
    if (process.env[name] !== undefined) {
      env[name] = process.env[name];
    }
  }
  return env;
}

/**
 * Check if ripgrep is available
 */
export function isRipgrepAvailable(): boolean {
  try {
    execSync('rg --version', {
      stdio: ['pipe', 'pipe', 'pipe'],
      encoding: 'utf-8',
      env: ripgrepEnv(),
    });
    return true;
  } catch {
    return false;
  }
}

/**
 * Turn root-relative file paths into declaration files
 *
 * Keeps files named exactly like a declaration file and drops OWNERS files
 * inside vendored trees. vendor/OWNERS is kept.
 */
export function classifyDeclarationPaths(
  root: string,
  relativePaths: string[],
  names: DeclarationNames
): DiscoveryResult {
  const result: DiscoveryResult = { files: [], skipped: [], errors: [] };

  for (const relativePath of relativePaths) {
    const normalized = normalizeToForwardSlashes(relativePath);
    const base = path.posix.basename(normalized);

    let kind: DeclarationKind;
    if (base === names.ownersFile) {
      kind = 'owners';
    } else if (base === names.aliasesFile) {
      kind = 'aliases';
    } else {
      continue;
    }

    const absolutePath = path.resolve(root, relativePath);
    const monorepoPath = toMonorepoPath(root, absolutePath);

    if (isVendoredPath(normalized)) {
      result.skipped.push({ path: monorepoPath, reason: 'Vendored declaration ignored' });
      continue;
    }

    result.files.push({ path: monorepoPath, absolutePath, kind });
  }

  result.files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return result;
}

/**
 * Declaration source backed by ripgrep and the local filesystem
 */
export class RipgrepDeclarationSource implements DeclarationSource {
  constructor(private readonly names: DeclarationNames) {}

  discover(root: string): DiscoveryResult {
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      return {
        files: [],
        skipped: [],
        errors: [{ path: root, error: 'Search path is not a directory' }],
      };
    }

    const args = [
      '--files',
      '--hidden',
      '--no-ignore',
      '--glob',
      '!**/.git/**',
      '--glob',
      this.names.ownersFile,
      '--glob',
      this.names.aliasesFile,
    ];

    const rg = spawnSync('rg', args, {
      cwd: root,
      encoding: 'utf-8',
      maxBuffer: 100 * 1024 * 1024,
      env: ripgrepEnv(),
    });

    if (rg.error) {
      return { files: [], skipped: [], errors: [{ path: root, error: `ripgrep execution failed: ${rg.error.message}` }] };
    }

    // exit code 1 means no matches
    if (rg.status === 2) {
      return { files: [], skipped: [], errors: [{ path: root, error: `ripgrep error: ${rg.stderr}` }] };
    }

    const relativePaths = (rg.stdout || '')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    return classifyDeclarationPaths(root, relativePaths, this.names);
  }

  read(file: DeclarationFile): string {
    return fs.readFileSync(file.absolutePath, 'utf-8');
  }
}
