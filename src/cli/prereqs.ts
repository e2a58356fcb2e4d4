import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { isRipgrepAvailable } from '../lib/owners/index.js';

export interface WorkdirContext {
  workdir: string;
  created: boolean;
  /** Created under the OS temp dir for this run only */
  temporary: boolean;
}

/**
 * Resolve the directory that caches fetched OWNERS files
 *
 * Without an override a fresh temp directory is used, which forces every
 * file to be fetched again.
 */
export function resolveWorkdir(cwd: string, overrideWorkdir?: string): WorkdirContext {
  if (!overrideWorkdir) {
    return {
      workdir: fs.mkdtempSync(path.join(os.tmpdir(), 'verify-subproject-owners-')),
      created: true,
      temporary: true,
    };
  }

  const workdir = path.resolve(cwd, overrideWorkdir);
  if (fs.existsSync(workdir)) {
    if (!fs.statSync(workdir).isDirectory()) {
      throw new Error(`Expected directory, got file: ${workdir}`);
    }
    return { workdir, created: false, temporary: false };
  }

  fs.mkdirSync(workdir, { recursive: true });
  return { workdir, created: true, temporary: false };
}

/**
 * Org directories to search, resolved against cwd
 *
 * Returns the resolved roots and the ones that are not directories.
 */
export function resolveRoots(cwd: string, roots: string[]): { roots: string[]; missing: string[] } {
  const resolved = roots.map((root) => path.resolve(cwd, root));
  const missing = resolved.filter((root) => !fs.existsSync(root) || !fs.statSync(root).isDirectory());
  return { roots: resolved, missing };
}

/**
 * ripgrep is needed to walk the org directories
 */
export function checkWalkPrereqs(): string | null {
  return isRipgrepAvailable() ? null : 'ripgrep (rg) is not installed or not in PATH';
}
