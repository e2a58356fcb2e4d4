/**
 * Shared test doubles
 */

import * as path from 'node:path';
import { classifyDeclarationPaths, type DeclarationFile, type DeclarationSource, type DiscoveryResult } from '../discovery.js';
import type { OwnersConfig, ReportLogger } from '../types.js';

export const testConfig: OwnersConfig = {
  rawUriPrefix: 'https://raw.githubusercontent.com/',
  branch: 'master',
  ownersFile: 'OWNERS',
  aliasesFile: 'OWNERS_ALIASES',
  owningCategories: ['sigs', 'committees'],
  catchAllGroup: 'committee-steering',
  primaryRepo: 'org/monorepo',
  sharedRepos: ['org/shared'],
  stagingMonorepo: '',
  stagingDir: '',
};

export interface RecordingLogger extends ReportLogger {
  infos: string[];
  warnings: string[];
}

export function recordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info(message) {
      infos.push(message);
    },
    warn(message) {
      warnings.push(message);
    },
    verbose() {},
  };
}

/**
 * Declaration source over an in-memory tree
 *
 * files: org dir -> root-relative path -> content; null content fails to read
 */
export class MemoryDeclarationSource implements DeclarationSource {
  readonly reads: string[] = [];
  errors: DiscoveryResult['errors'] = [];

  constructor(private readonly files: Record<string, Record<string, string | null>>) {}

  discover(root: string): DiscoveryResult {
    const tree = this.files[root] ?? {};
    const result = classifyDeclarationPaths(root, Object.keys(tree), testConfig);
    return { ...result, errors: this.errors };
  }

  read(file: DeclarationFile): string {
    this.reads.push(file.path);
    for (const [root, tree] of Object.entries(this.files)) {
      const relative = path.relative(root, file.absolutePath).split(path.sep).join('/');
      const content = tree[relative];
      if (content === null) {
        throw new Error('permission denied');
      }
      if (content !== undefined) {
        return content;
      }
    }
    throw new Error('no such file');
  }
}
