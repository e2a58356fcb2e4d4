/**
 * Ownership record loading
 *
 * Builds the owners cache (owners.yaml) from the OWNERS and OWNERS_ALIASES
 * files below a set of org directories:
 *   1. parse every declaration file not already in the cache
 *   2. expand aliases in every record not yet expanded
 *
 * eg: { aliases:
 *         org/repo/OWNERS_ALIASES: { aliases: { alias1: [foo, bar] } }
 *       owners:
 *         org/repo/path/to/OWNERS:
 *           approvers: [baz, qux]
 *           reviewers: [foo, bar]
 *           labels: [sig/testing] }
 */

import type {
  AliasTable,
  OwnersConfig,
  OwnersRecord,
  OwnersStore,
  ReportLogger,
  ReportWarning,
} from './types.js';
import type { DeclarationFile, DeclarationSource } from './discovery.js';
import { expandAliases } from './aliases.js';
import { parseAliasesFile, parseOwnersFile } from './parse.js';
import { aliasesPathFor, repoOfPath } from './paths.js';
import { MalformedDataError, MissingDataError, OwnersErrorCode, errorMessage } from './errors.js';

export type LoaderConfig = Pick<OwnersConfig, 'ownersFile' | 'aliasesFile' | 'stagingMonorepo' | 'stagingDir'>;

/**
 * Options for loadAllOwners
 */
export interface LoadOwnersOptions {
  /** Org directories to search, e.g. /repos/kubernetes */
  roots: string[];
  source: DeclarationSource;
  config: LoaderConfig;
  log: ReportLogger;
}

/**
 * Result of loadAllOwners
 */
export interface LoadOwnersResult {
  store: OwnersStore;
  warnings: ReportWarning[];
  /** Declaration files parsed in this run */
  parsed: number;
  /** Records expanded in this run */
  expanded: number;
}

/**
 * Empty owners cache
 */
export function emptyOwnersStore(): OwnersStore {
  return { owners: {}, aliases: {} };
}

function missingRecord(): OwnersRecord {
  return { approvers: [], reviewers: [], present: false, expanded: false };
}

function loadDeclaration(
  file: DeclarationFile,
  store: OwnersStore,
  source: DeclarationSource,
  warnings: ReportWarning[],
  log: ReportLogger
): void {
  let content: string;
  try {
    content = source.read(file);
  } catch (error) {
    const missing = new MissingDataError(file.path, errorMessage(error));
    warnings.push({ code: missing.code, file: file.path, message: missing.message });
    log.warn(missing.message);
    if (file.kind === 'owners') {
      store.owners[file.path] = missingRecord();
    }
    return;
  }

  try {
    if (file.kind === 'owners') {
      store.owners[file.path] = parseOwnersFile(content, file.path);
    } else {
      store.aliases[file.path] = parseAliasesFile(content, file.path);
    }
  } catch (error) {
    if (!(error instanceof MalformedDataError)) {
      throw error;
    }
    warnings.push({ code: error.code, file: file.path, message: error.message });
    log.warn(error.message);
    if (file.kind === 'owners') {
      store.owners[file.path] = { approvers: [], reviewers: [], present: true, expanded: false };
    } else {
      store.aliases[file.path] = { aliases: {} };
    }
  }
}

/**
 * Repositories published from the monorepo staging directory
 *
 * kubernetes/kubernetes/staging/src/k8s.io/api/OWNERS -> kubernetes/api
 */
export function findStagedRepos(store: OwnersStore, config: LoaderConfig): Set<string> {
  const staged = new Set<string>();
  if (!config.stagingMonorepo || !config.stagingDir) {
    return staged;
  }

  const org = config.stagingMonorepo.split('/')[0];
  const prefix = `${config.stagingMonorepo}/${config.stagingDir}/`;
  for (const key of [...Object.keys(store.owners), ...Object.keys(store.aliases)]) {
    if (!key.startsWith(prefix)) continue;
    const name = key.slice(prefix.length).split('/')[0];
    if (name) {
      staged.add(`${org}/${name}`);
    }
  }
  return staged;
}

/**
 * Path of the alias file that applies to an OWNERS path
 *
 * Staged repositories without an alias file of their own use the
 * monorepo's.
 */
export function aliasesPathForRecord(
  ownersPath: string,
  store: OwnersStore,
  config: LoaderConfig,
  stagedRepos: Set<string>
): string | null {
  const own = aliasesPathFor(ownersPath, config.aliasesFile);
  if (own === null || own in store.aliases) {
    return own;
  }
  const repo = repoOfPath(ownersPath);
  if (repo !== null && stagedRepos.has(repo)) {
    return `${config.stagingMonorepo}/${config.aliasesFile}`;
  }
  return own;
}

/**
 * Expand approvers and reviewers of a record through an alias table
 */
export function expandRecord(
  record: OwnersRecord,
  aliases: AliasTable,
  onEmptyAlias: (alias: string) => void
): OwnersRecord {
  return {
    ...record,
    approvers: expandAliases(record.approvers, aliases, onEmptyAlias),
    reviewers: expandAliases(record.reviewers, aliases, onEmptyAlias),
    expanded: true,
  };
}

/**
 * Expand aliases in every record of the store that is not expanded yet
 *
 * Mutates the store; returns the number of records expanded.
 */
export function expandStoreAliases(
  store: OwnersStore,
  config: LoaderConfig,
  warnings: ReportWarning[],
  log: ReportLogger
): number {
  const stagedRepos = findStagedRepos(store, config);
  let count = 0;

  for (const ownersPath of Object.keys(store.owners).sort()) {
    const record = store.owners[ownersPath];
    if (record.expanded) {
      continue;
    }

    const aliasesPath = aliasesPathForRecord(ownersPath, store, config, stagedRepos);
    const aliases = aliasesPath !== null ? store.aliases[aliasesPath]?.aliases ?? {} : {};
    log.verbose(`expanding approvers and reviewers for ${ownersPath} using ${aliasesPath ?? 'no aliases'}`);

    store.owners[ownersPath] = expandRecord(record, aliases, (alias) => {
      const message = `${ownersPath} uses empty alias ${alias} defined in ${aliasesPath ?? 'unknown'}`;
      warnings.push({ code: OwnersErrorCode.OWNERS_MALFORMED_DATA, file: ownersPath, message });
      log.warn(message);
    });
    count++;
  }

  return count;
}

/**
 * Parse all OWNERS and OWNERS_ALIASES files below the roots into the store
 *
 * Paths already in the previous store are not parsed again. The previous
 * store is not modified.
 */
export function loadAllOwners(previous: OwnersStore, options: LoadOwnersOptions): LoadOwnersResult {
  const { source, config, log } = options;
  const store: OwnersStore = {
    owners: { ...previous.owners },
    aliases: { ...previous.aliases },
  };
  const warnings: ReportWarning[] = [];
  let parsed = 0;

  for (const root of options.roots) {
    log.info(`Finding all ${config.ownersFile} files in ${root}`);
    const discovery = source.discover(root);

    for (const err of discovery.errors) {
      const message = `${err.path}: ${err.error}`;
      warnings.push({ code: OwnersErrorCode.OWNERS_WALK_ERROR, file: err.path, message });
      log.warn(message);
    }
    for (const skipped of discovery.skipped) {
      log.verbose(`skipped ${skipped.path}: ${skipped.reason}`);
    }

    for (const file of discovery.files) {
      const table = file.kind === 'owners' ? store.owners : store.aliases;
      if (file.path in table) {
        continue;
      }
      log.verbose(file.path);
      loadDeclaration(file, store, source, warnings, log);
      parsed++;
    }
  }

  const expanded = expandStoreAliases(store, config, warnings, log);

  return { store, warnings, parsed, expanded };
}
