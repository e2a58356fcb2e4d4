/**
 * Repositories claimed by more than one group
 *
 * A repository should fall under a single group. Known cross-cutting
 * repositories are flagged as expected but still reported.
 */

import type { Group, OwnersConfig, SigsDataset } from './types.js';
import { groupsIn, subprojectsOf } from './dataset.js';
import { comparePaths, monorepoPathFromUri, repoOfPath } from './paths.js';

export type RepoConfig = Pick<OwnersConfig, 'owningCategories' | 'rawUriPrefix' | 'branch' | 'sharedRepos'>;

/**
 * A repository with several owning groups
 */
export interface MultiOwnedRepo {
  repo: string;
  /** Owning group dirs, in dataset order */
  owners: string[];
  /** Listed in shared_repos */
  expected: boolean;
}

/**
 * Sorted org/repo list of every repository a group's subprojects own files in
 */
export function reposFromGroup(group: Group, config: Pick<OwnersConfig, 'rawUriPrefix' | 'branch'>): string[] {
  const repos = new Set<string>();
  for (const subproject of subprojectsOf(group)) {
    for (const uri of subproject.owners) {
      const repo = repoOfPath(monorepoPathFromUri(uri, config));
      if (repo !== null) {
        repos.add(repo);
      }
    }
  }
  return [...repos].sort(comparePaths);
}

/**
 * Every repository owned by more than one group
 *
 * Sorted by number of owners descending, then by repository.
 */
export function findMultiOwnedRepos(dataset: SigsDataset, config: RepoConfig): MultiOwnedRepo[] {
  const owners = new Map<string, string[]>();

  for (const group of groupsIn(dataset, config.owningCategories)) {
    for (const repo of reposFromGroup(group, config)) {
      const list = owners.get(repo) ?? [];
      list.push(group.dir);
      owners.set(repo, list);
    }
  }

  const shared = new Set(config.sharedRepos);
  return [...owners.entries()]
    .filter(([, groups]) => groups.length > 1)
    .map(([repo, groups]) => ({ repo, owners: groups, expected: shared.has(repo) }))
    .sort((a, b) => b.owners.length - a.owners.length || comparePaths(a.repo, b.repo));
}

/**
 * org/repo owned by 2 groups (sig-foo, sig-bar)
 */
export function formatMultiOwnedRepo(entry: MultiOwnedRepo): string {
  const line = `${entry.repo} owned by ${entry.owners.length} groups (${entry.owners.join(', ')})`;
  return entry.expected ? `${line} [expected]` : line;
}
