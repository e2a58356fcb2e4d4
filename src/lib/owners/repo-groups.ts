/**
 * repo_groups.sql generation
 *
 * One update statement per owning group, assigning its repositories to the
 * group's repo_group.
 */

import type { OwnersConfig, SigsDataset } from './types.js';
import { groupDisplayName, groupsIn } from './dataset.js';
import { reposFromGroup } from './multi-owner.js';

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Render the update statements
 *
 * The primary repository belongs to everyone and is left out. Groups without
 * any other repository get no statement.
 */
export function renderRepoGroupsSql(
  dataset: SigsDataset,
  config: Pick<OwnersConfig, 'owningCategories' | 'rawUriPrefix' | 'branch' | 'primaryRepo'>
): string {
  let sql = '';

  for (const group of groupsIn(dataset, config.owningCategories)) {
    const repos = reposFromGroup(group, config).filter((r) => r !== config.primaryRepo);
    if (repos.length === 0) {
      continue;
    }
    sql +=
      `\nupdate gha_repos set repo_group = ${sqlString(groupDisplayName(group))} where name in (\n` +
      repos.map((r) => `  ${sqlString(r)}`).join(',\n') +
      '\n);\n';
  }

  return sql;
}
