/**
 * Ownership resolution
 *
 * Every OWNERS path ends up owned by exactly one subproject:
 *   - declared: listed under the subproject's owners in sigs.yaml
 *   - prefix:   the deepest declared directory above it belongs to the subproject
 *   - unknown:  nothing above it is declared; goes to the catch-all
 */

import type {
  OwnersConfig,
  PathAssignment,
  ReportLogger,
  Resolution,
  SigsDataset,
} from './types.js';
import type { SubprojectTable } from './groups.js';
import { PrefixTrie, stripDeclarationFile } from './prefix-trie.js';
import { groupsIn, subprojectsOf } from './dataset.js';
import { comparePaths, uriFromMonorepoPath } from './paths.js';
import { ConsistencyError } from './errors.js';

/**
 * Build the prefix index from every declared owners path
 */
export function buildOwnershipTrie(table: SubprojectTable, ownersFile: string): PrefixTrie<string> {
  const trie = new PrefixTrie<string>();
  for (const [name, entry] of table.subprojects) {
    for (const ownersPath of entry.ownersPaths) {
      trie.insert(stripDeclarationFile(ownersPath, ownersFile), name);
    }
  }
  return trie;
}

function fullNameOf(table: SubprojectTable, name: string, ownersPath: string): string {
  const entry = table.subprojects.get(name);
  if (!entry) {
    throw new ConsistencyError(`${ownersPath} resolved to subproject ${name}, which does not exist`, ownersPath);
  }
  return entry.fullName;
}

/**
 * Assign every OWNERS path to a subproject
 *
 * ownersPaths are the paths found on disk; declared paths that were not
 * found are still assigned to their declaring subproject.
 */
export function resolveOwnership(
  table: SubprojectTable,
  ownersPaths: Iterable<string>,
  ownersFile: string,
  log: ReportLogger
): Resolution {
  const assignments = new Map<string, PathAssignment>();

  // first pass: declared owners
  for (const [name, entry] of table.subprojects) {
    for (const ownersPath of entry.ownersPaths) {
      const previous = assignments.get(ownersPath);
      if (previous && previous.subproject !== name) {
        log.warn(`${ownersPath} is declared by both ${previous.subproject} and ${name}, keeping ${name}`);
      }
      assignments.set(ownersPath, { path: ownersPath, subproject: name, state: 'declared' });
    }
  }

  const trie = buildOwnershipTrie(table, ownersFile);

  // second pass: longest prefix match for everything else
  for (const ownersPath of ownersPaths) {
    if (assignments.has(ownersPath)) {
      continue;
    }

    const match = trie.longestPrefix(stripDeclarationFile(ownersPath, ownersFile));
    if (match) {
      const fullName = fullNameOf(table, match.value, ownersPath);
      assignments.set(ownersPath, {
        path: ownersPath,
        subproject: match.value,
        state: 'prefix',
        reason: `longest prefix match: ${match.prefix} implies ownership by ${fullName}`,
      });
    } else {
      const fullName = fullNameOf(table, table.catchAll, ownersPath);
      assignments.set(ownersPath, {
        path: ownersPath,
        subproject: table.catchAll,
        state: 'unknown',
        reason: `no prefix match implies ownership by ${fullName}`,
      });
    }
  }

  const owners = new Map<string, string[]>();
  for (const name of table.subprojects.keys()) {
    owners.set(name, []);
  }

  const annotations = new Map<string, string>();
  for (const assignment of assignments.values()) {
    const list = owners.get(assignment.subproject);
    if (!list) {
      throw new ConsistencyError(
        `${assignment.path} resolved to subproject ${assignment.subproject}, which does not exist`,
        assignment.path
      );
    }
    list.push(assignment.path);
    if (assignment.reason) {
      annotations.set(assignment.path, assignment.reason);
    }
  }

  for (const list of owners.values()) {
    list.sort(comparePaths);
  }

  return { owners, assignments, annotations };
}

/**
 * Options for applyResolution
 */
export interface ApplyResolutionOptions {
  config: Pick<OwnersConfig, 'owningCategories' | 'rawUriPrefix' | 'branch'>;
  /** Write owners as raw URIs instead of monorepo paths */
  emitUris: boolean;
}

/**
 * Write resolved owners lists back into the dataset
 *
 * Returns the annotations keyed by the value written, ready for rendering.
 */
export function applyResolution(
  dataset: SigsDataset,
  resolution: Resolution,
  options: ApplyResolutionOptions
): Map<string, string> {
  const toValue = (ownersPath: string): string =>
    options.emitUris ? uriFromMonorepoPath(ownersPath, options.config) : ownersPath;

  for (const group of groupsIn(dataset, options.config.owningCategories)) {
    for (const subproject of subprojectsOf(group)) {
      const resolved = resolution.owners.get(subproject.name);
      if (resolved) {
        subproject.owners = resolved.map(toValue);
      }
    }
  }

  const annotations = new Map<string, string>();
  for (const [ownersPath, reason] of resolution.annotations) {
    annotations.set(toValue(ownersPath), reason);
  }
  return annotations;
}
