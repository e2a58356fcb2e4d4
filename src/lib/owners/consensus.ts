/**
 * Consensus analysis across the OWNERS files of one subproject
 *
 * A well formed subproject has people and labels in the intersection of all
 * of its OWNERS files.
 */

import type { AttributeSets, OwnersAttribute, OwnersRecord } from './types.js';
import { OWNERS_ATTRIBUTES } from './types.js';
import { comparePaths } from './paths.js';
import { OwnersErrorCode } from './errors.js';

export type FindingKind = 'missing-all' | 'missing' | 'no-consensus' | 'consensus';

/**
 * One observation about a subproject
 */
export interface ConsensusFinding {
  kind: FindingKind;
  level: 'warning' | 'info';
  /** Subproject id, e.g. sig-foo/core */
  subproject: string;
  attribute?: OwnersAttribute;
  path?: string;
  message: string;
}

/**
 * Consensus of a subproject
 */
export interface ConsensusResult {
  common: AttributeSets;
  union: AttributeSets;
  findings: ConsensusFinding[];
}

/**
 * Warning code for a finding
 */
export function findingCode(kind: FindingKind): OwnersErrorCode | null {
  switch (kind) {
    case 'missing-all':
      return OwnersErrorCode.OWNERS_MISSING_ALL;
    case 'missing':
      return OwnersErrorCode.OWNERS_MISSING_DATA;
    case 'no-consensus':
      return OwnersErrorCode.OWNERS_NO_CONSENSUS;
    case 'consensus':
      return null;
  }
}

function emptySets(): AttributeSets {
  return { approvers: [], reviewers: [], labels: [] };
}

function intersect(sets: Array<Set<string>>): Set<string> {
  if (sets.length === 0) {
    return new Set();
  }
  const [first, ...rest] = sets;
  return new Set([...first].filter((v) => rest.every((s) => s.has(v))));
}

function unite(sets: Array<Set<string>>): Set<string> {
  const result = new Set<string>();
  for (const set of sets) {
    for (const v of set) result.add(v);
  }
  return result;
}

/**
 * Compute common and union attribute sets for a subproject's OWNERS files
 *
 * Absent files (present: false) are reported and take part with empty sets.
 */
export function analyzeConsensus(
  subprojectId: string,
  records: Record<string, OwnersRecord>
): ConsensusResult {
  const entries = Object.entries(records);
  entries.sort((a, b) => comparePaths(a[0], b[0]));

  const findings: ConsensusFinding[] = [];
  const present = entries.filter(([, record]) => record.present);

  if (present.length === 0) {
    findings.push({
      kind: 'missing-all',
      level: 'warning',
      subproject: subprojectId,
      message: `${subprojectId} is missing ALL of its OWNERS files, why is this a subproject?`,
    });
  }
  for (const [ownersPath, record] of entries) {
    if (!record.present) {
      findings.push({
        kind: 'missing',
        level: 'warning',
        subproject: subprojectId,
        path: ownersPath,
        message: `${subprojectId} is missing ${ownersPath}`,
      });
    }
  }

  const common = emptySets();
  const union = emptySets();

  for (const attribute of OWNERS_ATTRIBUTES) {
    const sets = entries.map(([, record]) => new Set(record.present ? record[attribute] ?? [] : []));
    common[attribute] = [...intersect(sets)].sort(comparePaths);
    union[attribute] = [...unite(sets)].sort(comparePaths);

    if (entries.length < 2) {
      continue;
    }
    if (common[attribute].length === 0 && union[attribute].length > 0) {
      findings.push({
        kind: 'no-consensus',
        level: 'warning',
        subproject: subprojectId,
        attribute,
        message: `${subprojectId} has no common ${attribute}`,
      });
    } else {
      findings.push({
        kind: 'consensus',
        level: 'info',
        subproject: subprojectId,
        attribute,
        message: `OK: ${subprojectId} has ${common[attribute].length} common ${attribute}`,
      });
    }
  }

  return { common, union, findings };
}
