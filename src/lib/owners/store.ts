/**
 * Owners cache persistence (owners.yaml)
 *
 * The cache lets a run skip re-parsing OWNERS files it has already seen.
 * A corrupt cache is treated as empty: the next refresh rebuilds it.
 */

import * as fs from 'node:fs';
import yaml from 'js-yaml';
import type { AliasesRecord, OwnersRecord, OwnersStore } from './types.js';
import { emptyOwnersStore } from './loader.js';
import { MalformedDataError, errorMessage } from './errors.js';
import { writeTextAtomic } from './writer.js';

/**
 * Result of loading the cache
 */
export interface LoadStoreResult {
  store: OwnersStore;
  /** Set when the file existed but could not be used */
  error?: MalformedDataError;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function toOwnersRecord(value: unknown, key: string, file: string): OwnersRecord {
  if (!isPlainObject(value)) {
    throw new MalformedDataError(file, `owners entry ${key} must be a mapping`);
  }
  const record: OwnersRecord = {
    approvers: stringList(value.approvers),
    reviewers: stringList(value.reviewers),
    present: value.present !== false,
    expanded: value.expanded === true,
  };
  if (value.labels !== undefined) {
    record.labels = stringList(value.labels);
  }
  return record;
}

function toAliasesRecord(value: unknown, key: string, file: string): AliasesRecord {
  if (!isPlainObject(value)) {
    throw new MalformedDataError(file, `aliases entry ${key} must be a mapping`);
  }
  const table = isPlainObject(value.aliases) ? value.aliases : {};
  const aliases: AliasesRecord['aliases'] = {};
  for (const [alias, members] of Object.entries(table)) {
    aliases[alias] = members === null || members === undefined ? null : stringList(members);
  }
  return { aliases };
}

/**
 * Parse owners.yaml content
 */
export function parseOwnersStore(content: string, file: string): OwnersStore {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: file });
  } catch (error) {
    throw new MalformedDataError(file, errorMessage(error));
  }

  if (parsed === undefined || parsed === null) {
    return emptyOwnersStore();
  }
  if (!isPlainObject(parsed)) {
    throw new MalformedDataError(file, 'expected a mapping with owners and aliases');
  }

  const store = emptyOwnersStore();
  if (isPlainObject(parsed.owners)) {
    for (const [key, value] of Object.entries(parsed.owners)) {
      store.owners[key] = toOwnersRecord(value, key, file);
    }
  }
  if (isPlainObject(parsed.aliases)) {
    for (const [key, value] of Object.entries(parsed.aliases)) {
      store.aliases[key] = toAliasesRecord(value, key, file);
    }
  }
  return store;
}

/**
 * Load owners.yaml; a missing file gives an empty store
 */
export function loadOwnersStore(file: string): LoadStoreResult {
  if (!fs.existsSync(file)) {
    return { store: emptyOwnersStore() };
  }

  try {
    return { store: parseOwnersStore(fs.readFileSync(file, 'utf-8'), file) };
  } catch (error) {
    const malformed = error instanceof MalformedDataError ? error : new MalformedDataError(file, errorMessage(error));
    return { store: emptyOwnersStore(), error: malformed };
  }
}

/**
 * Render the store as YAML with keys in path order
 */
export function formatOwnersStore(store: OwnersStore): string {
  return yaml.dump(
    { owners: store.owners, aliases: store.aliases },
    { sortKeys: true, lineWidth: -1, noRefs: true }
  );
}

/**
 * Save owners.yaml atomically
 */
export function saveOwnersStore(file: string, store: OwnersStore): void {
  writeTextAtomic(file, formatOwnersStore(store));
}
