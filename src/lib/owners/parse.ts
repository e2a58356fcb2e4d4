/**
 * OWNERS and OWNERS_ALIASES parsing
 *
 * OWNERS:
 *   approvers: [a, b]
 *   reviewers: [c]
 *   labels: [sig/foo]
 *   filters:
 *     ".*":
 *       approvers: [a]
 *     "\\.go$":
 *       reviewers: [d]
 *
 * Only the catch-all ".*" filter is kept; it replaces the top-level
 * approvers and reviewers. Finer-grained filters are dropped.
 */

import yaml from 'js-yaml';
import type { AliasTable, AliasesRecord, OwnersRecord } from './types.js';
import { MalformedDataError, errorMessage } from './errors.js';

export const CATCH_ALL_FILTER = '.*';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadYaml(content: string, filePath: string): unknown {
  try {
    return yaml.load(content, { filename: filePath });
  } catch (error) {
    throw new MalformedDataError(filePath, errorMessage(error));
  }
}

/**
 * Read a list of identifiers; null entries are dropped
 */
function asIdentifierList(value: unknown, field: string, filePath: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new MalformedDataError(filePath, `${field} must be a list`);
  }

  const result: string[] = [];
  for (const item of value) {
    if (item === null || item === undefined || item === '') {
      continue;
    }
    if (typeof item === 'string') {
      result.push(item);
    } else if (typeof item === 'number') {
      result.push(String(item));
    } else {
      throw new MalformedDataError(filePath, `${field} must only contain names`);
    }
  }
  return result;
}

/**
 * Parse the contents of an OWNERS file into an unexpanded record
 */
export function parseOwnersFile(content: string, filePath: string): OwnersRecord {
  const parsed = loadYaml(content, filePath);

  if (parsed === undefined || parsed === null) {
    return { approvers: [], reviewers: [], present: true, expanded: false };
  }
  if (!isPlainObject(parsed)) {
    throw new MalformedDataError(filePath, 'expected a mapping');
  }

  let approversSource = parsed.approvers;
  let reviewersSource = parsed.reviewers;

  if (parsed.filters !== undefined && parsed.filters !== null) {
    if (!isPlainObject(parsed.filters)) {
      throw new MalformedDataError(filePath, 'filters must be a mapping');
    }
    const catchAll = parsed.filters[CATCH_ALL_FILTER];
    const filter = isPlainObject(catchAll) ? catchAll : {};
    approversSource = filter.approvers;
    reviewersSource = filter.reviewers;
  }

  const record: OwnersRecord = {
    approvers: asIdentifierList(approversSource, 'approvers', filePath),
    reviewers: asIdentifierList(reviewersSource, 'reviewers', filePath),
    present: true,
    expanded: false,
  };

  if (parsed.labels !== undefined && parsed.labels !== null) {
    record.labels = asIdentifierList(parsed.labels, 'labels', filePath);
  }

  return record;
}

/**
 * Parse the contents of an OWNERS_ALIASES file
 */
export function parseAliasesFile(content: string, filePath: string): AliasesRecord {
  const parsed = loadYaml(content, filePath);

  if (parsed === undefined || parsed === null) {
    return { aliases: {} };
  }
  if (!isPlainObject(parsed)) {
    throw new MalformedDataError(filePath, 'expected a mapping');
  }
  if (parsed.aliases === undefined || parsed.aliases === null) {
    return { aliases: {} };
  }
  if (!isPlainObject(parsed.aliases)) {
    throw new MalformedDataError(filePath, 'aliases must be a mapping, not a list');
  }

  const aliases: AliasTable = {};
  for (const [alias, members] of Object.entries(parsed.aliases)) {
    aliases[alias] = members === null || members === undefined
      ? null
      : asIdentifierList(members, `aliases.${alias}`, filePath);
  }
  return { aliases };
}
