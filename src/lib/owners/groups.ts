/**
 * Group and subproject table
 *
 * Only groups in the owning categories (sigs and committees by default) may
 * own code. A placeholder `unknown` subproject is added to the catch-all
 * group to collect OWNERS files no other subproject covers.
 */

import type { OwnersConfig, ReportLogger, SigsDataset, Subproject, SubprojectEntry } from './types.js';
import { groupsIn, subprojectsOf } from './dataset.js';
import { monorepoPathFromUri } from './paths.js';
import { ConsistencyError } from './errors.js';

export const UNKNOWN_SUBPROJECT = 'unknown';

export type GroupsConfig = Pick<OwnersConfig, 'owningCategories' | 'catchAllGroup' | 'rawUriPrefix' | 'branch'>;

/**
 * Subproject table keyed by subproject name
 */
export interface SubprojectTable {
  subprojects: Map<string, SubprojectEntry>;
  /** Name of the catch-all subproject */
  catchAll: string;
}

/**
 * Build the subproject table from the dataset
 *
 * Adds the catch-all subproject to the catch-all group in the dataset.
 * Duplicate subproject names are reported; the later one wins.
 */
export function loadGroupsAndSubprojects(
  dataset: SigsDataset,
  config: GroupsConfig,
  log: ReportLogger
): SubprojectTable {
  const subprojects = new Map<string, SubprojectEntry>();

  for (const group of groupsIn(dataset, config.owningCategories)) {
    for (const subproject of subprojectsOf(group)) {
      const existing = subprojects.get(subproject.name);
      if (existing) {
        log.warn(`subproject ${subproject.name} already exists in ${existing.parent}, replacing with ${group.dir}`);
      }
      subprojects.set(subproject.name, {
        subproject,
        parent: group.dir,
        fullName: `${group.dir}/${subproject.name}`,
        ownersPaths: subproject.owners.map((uri) => monorepoPathFromUri(uri, config)),
      });
    }
  }

  const catchAllGroup = groupsIn(dataset, config.owningCategories).find((g) => g.dir === config.catchAllGroup);
  if (!catchAllGroup) {
    throw new ConsistencyError(`catch-all group ${config.catchAllGroup} is not in ${config.owningCategories.join(', ')}`);
  }
  if (subprojects.has(UNKNOWN_SUBPROJECT)) {
    throw new ConsistencyError(`subproject name ${UNKNOWN_SUBPROJECT} is reserved for the catch-all`);
  }

  const unknown: Subproject = {
    name: UNKNOWN_SUBPROJECT,
    description: 'placeholder subproject to catch any OWNERS files not covered by other subprojects',
    owners: [],
  };
  catchAllGroup.subprojects = [...subprojectsOf(catchAllGroup), unknown];
  subprojects.set(UNKNOWN_SUBPROJECT, {
    subproject: unknown,
    parent: catchAllGroup.dir,
    fullName: `${catchAllGroup.dir}/${UNKNOWN_SUBPROJECT}`,
    ownersPaths: [],
  });

  return { subprojects, catchAll: UNKNOWN_SUBPROJECT };
}
