/**
 * Governance dataset (sigs.yaml) loading and rendering
 */

import * as fs from 'node:fs';
import yaml from 'js-yaml';
import { Document, isScalar, isSeq, visit } from 'yaml';
import type { AttributeSets, Group, GroupType, OwnersRecord, SigsDataset, Subproject } from './types.js';
import { OWNERS_ATTRIBUTES } from './types.js';
import { MalformedDataError, MissingDataError, errorMessage } from './errors.js';
import { toOwnersRecord } from './store.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, field: string, file: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new MalformedDataError(file, `${field} must be a non-empty string`);
  }
  return value;
}

/**
 * Copy keys this tool does not interpret (description, contact, ...)
 */
function copyExtraKeys(target: Record<string, unknown>, source: Record<string, unknown>, known: string[]): void {
  for (const [key, value] of Object.entries(source)) {
    if (!known.includes(key)) {
      target[key] = value;
    }
  }
}

function toAttributeSets(value: unknown): AttributeSets | undefined {
  if (!isPlainObject(value)) {
    return undefined;
  }
  const sets: AttributeSets = { approvers: [], reviewers: [], labels: [] };
  for (const attribute of OWNERS_ATTRIBUTES) {
    const list = value[attribute];
    sets[attribute] = Array.isArray(list) ? list.filter((v): v is string => typeof v === 'string') : [];
  }
  return sets;
}

function toSubproject(value: unknown, where: string, file: string): Subproject {
  if (!isPlainObject(value)) {
    throw new MalformedDataError(file, `${where} must be a mapping`);
  }
  const name = requireString(value.name, `${where}.name`, file);
  const owners = value.owners ?? [];
  if (!Array.isArray(owners) || owners.some((o) => typeof o !== 'string')) {
    throw new MalformedDataError(file, `${where}.owners must be a list of strings`);
  }
  const subproject: Subproject = { name, owners: owners.filter((o): o is string => typeof o === 'string') };
  copyExtraKeys(subproject, value, ['name', 'owners', 'paths', 'common', 'union']);

  if (isPlainObject(value.paths)) {
    const paths: Record<string, OwnersRecord> = {};
    for (const [key, record] of Object.entries(value.paths)) {
      paths[key] = toOwnersRecord(record, key, file);
    }
    subproject.paths = paths;
  }
  const common = toAttributeSets(value.common);
  if (common) subproject.common = common;
  const union = toAttributeSets(value.union);
  if (union) subproject.union = union;

  return subproject;
}

function toGroup(value: unknown, where: string, file: string): Group {
  if (!isPlainObject(value)) {
    throw new MalformedDataError(file, `${where} must be a mapping`);
  }
  const dir = requireString(value.dir, `${where}.dir`, file);
  const name = requireString(value.name, `${where}.name`, file);
  const group: Group = { dir, name };
  copyExtraKeys(group, value, ['dir', 'name', 'subprojects']);

  if (value.subprojects === null) {
    group.subprojects = null;
  } else if (value.subprojects !== undefined) {
    if (!Array.isArray(value.subprojects)) {
      throw new MalformedDataError(file, `${where}.subprojects must be a list`);
    }
    group.subprojects = value.subprojects.map((sp, i) => toSubproject(sp, `${where}.subprojects[${i}]`, file));
  }
  return group;
}

/**
 * Parse sigs.yaml content
 */
export function parseDataset(content: string, file: string): SigsDataset {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: file });
  } catch (error) {
    throw new MalformedDataError(file, errorMessage(error));
  }
  if (!isPlainObject(parsed)) {
    throw new MalformedDataError(file, 'expected a mapping of group categories');
  }

  const dataset: SigsDataset = {};
  for (const [category, groups] of Object.entries(parsed)) {
    if (groups === null || groups === undefined) {
      dataset[category] = [];
      continue;
    }
    if (!Array.isArray(groups)) {
      throw new MalformedDataError(file, `${category} must be a list of groups`);
    }
    dataset[category] = groups.map((g, i) => toGroup(g, `${category}[${i}]`, file));
  }
  return dataset;
}

/**
 * Load sigs.yaml from disk
 */
export function loadDataset(file: string): SigsDataset {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new MissingDataError(file, errorMessage(error));
  }
  return parseDataset(content, file);
}

/**
 * Group type of a dataset category
 */
export function groupTypeOf(category: string): GroupType {
  switch (category) {
    case 'sigs':
      return 'sig';
    case 'committees':
      return 'committee';
    case 'workinggroups':
      return 'working-group';
    default:
      return 'other';
  }
}

/**
 * Human readable name of a group
 *   sig-foo       -> SIG Foo
 *   committee-bar -> Bar Committee
 *   wg-baz        -> Baz Working Group
 */
export function groupDisplayName(group: Pick<Group, 'dir' | 'name'>): string {
  if (group.dir.startsWith('sig-')) {
    return `SIG ${group.name}`;
  }
  if (group.dir.startsWith('committee-')) {
    return `${group.name} Committee`;
  }
  if (group.dir.startsWith('wg-')) {
    return `${group.name} Working Group`;
  }
  return `UNKNOWN ${group.dir}`;
}

/**
 * Subprojects of a group; null and missing both read as none
 */
export function subprojectsOf(group: Group): Subproject[] {
  return group.subprojects ?? [];
}

/**
 * Groups of the given categories, in dataset order
 */
export function groupsIn(dataset: SigsDataset, categories: string[]): Group[] {
  const groups: Group[] = [];
  for (const category of categories) {
    groups.push(...(dataset[category] ?? []));
  }
  return groups;
}

/**
 * Render the dataset as YAML
 *
 * Owners entries found in annotations get the annotation as an end-of-line
 * comment.
 */
export function renderDataset(dataset: SigsDataset, annotations: ReadonlyMap<string, string> = new Map()): string {
  const doc = new Document(dataset);

  if (annotations.size > 0) {
    visit(doc, {
      Pair(_, pair) {
        if (!isScalar(pair.key) || pair.key.value !== 'owners' || !isSeq(pair.value)) {
          return;
        }
        for (const item of pair.value.items) {
          if (isScalar(item) && typeof item.value === 'string') {
            const reason = annotations.get(item.value);
            if (reason) {
              item.comment = ` ${reason}`;
            }
          }
        }
      },
    });
  }

  return doc.toString({ lineWidth: 0 });
}
