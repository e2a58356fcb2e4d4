/**
 * Remote verification of subproject owners
 *
 * Fetches every OWNERS file a subproject declares, along with the
 * OWNERS_ALIASES of its repository, records the expanded contents under the
 * subproject's `paths`, and adds the union and intersection of all of them
 * as `union` and `common`.
 *
 * Contents already recorded under `paths` are not fetched again.
 */

import type { AliasTable, OwnersConfig, OwnersRecord, ReportLogger, ReportWarning, SigsDataset } from './types.js';
import type { RemoteFileCache } from './remote-cache.js';
import type { ConsensusFinding } from './consensus.js';
import { analyzeConsensus, findingCode } from './consensus.js';
import { groupsIn, subprojectsOf } from './dataset.js';
import { expandRecord } from './loader.js';
import { parseAliasesFile, parseOwnersFile } from './parse.js';
import { pruneRecord } from './prune.js';
import { aliasesPathFor, monorepoPathFromUri, uriFromMonorepoPath } from './paths.js';
import { MalformedDataError, OwnersErrorCode } from './errors.js';

/**
 * Options for verifySubprojectOwners
 */
export interface VerifyOptions {
  config: OwnersConfig;
  cache: RemoteFileCache;
  log: ReportLogger;
}

/**
 * Result of verifySubprojectOwners
 */
export interface VerifyResult {
  warnings: ReportWarning[];
  findings: ConsensusFinding[];
  /** OWNERS files recorded in this run */
  recorded: number;
  subprojects: number;
}

async function fetchRecord(
  ownersPath: string,
  uri: string,
  options: VerifyOptions,
  warnings: ReportWarning[]
): Promise<OwnersRecord> {
  const { config, cache, log } = options;
  const warn = (code: string, message: string, file: string): void => {
    warnings.push({ code, file, message });
    log.warn(message);
  };

  let content: string | null;
  try {
    content = await cache.getOrFetch(ownersPath, uri);
  } catch (error) {
    if (!(error instanceof MalformedDataError)) throw error;
    warn(error.code, error.message, ownersPath);
    return { approvers: [], reviewers: [], present: false, expanded: true };
  }
  if (content === null) {
    // reported by the analysis pass
    log.verbose(`${ownersPath} could not be fetched from ${uri}`);
    return { approvers: [], reviewers: [], present: false, expanded: true };
  }

  let record: OwnersRecord;
  try {
    record = parseOwnersFile(content, ownersPath);
  } catch (error) {
    if (!(error instanceof MalformedDataError)) throw error;
    warn(error.code, error.message, ownersPath);
    record = { approvers: [], reviewers: [], present: true, expanded: false };
  }

  const aliasesPath = aliasesPathFor(ownersPath, config.aliasesFile);
  let aliases: AliasTable = {};
  if (aliasesPath !== null) {
    let aliasesContent: string | null = null;
    try {
      aliasesContent = await cache.getOrFetch(aliasesPath, uriFromMonorepoPath(aliasesPath, config));
    } catch (error) {
      if (!(error instanceof MalformedDataError)) throw error;
      warn(error.code, error.message, aliasesPath);
    }
    if (aliasesContent !== null) {
      try {
        aliases = parseAliasesFile(aliasesContent, aliasesPath).aliases;
      } catch (error) {
        if (!(error instanceof MalformedDataError)) throw error;
        warn(error.code, `${aliasesPath} is an invalid ${config.aliasesFile} file: ${error.message}`, aliasesPath);
      }
    }
  }

  const expanded = expandRecord(record, aliases, (alias) => {
    warn(
      OwnersErrorCode.OWNERS_MALFORMED_DATA,
      `${ownersPath} using empty alias ${alias} defined in ${aliasesPath ?? 'unknown'}`,
      ownersPath
    );
  });
  return pruneRecord(expanded);
}

/**
 * Record OWNERS contents for every subproject and analyze consensus
 *
 * Mutates the dataset: sets `paths`, `common` and `union` on each subproject.
 */
export async function verifySubprojectOwners(dataset: SigsDataset, options: VerifyOptions): Promise<VerifyResult> {
  const { config, log } = options;
  const warnings: ReportWarning[] = [];
  const findings: ConsensusFinding[] = [];
  let recorded = 0;
  let subprojects = 0;

  log.info('LOADING....');
  for (const group of groupsIn(dataset, config.owningCategories)) {
    if (group.subprojects === undefined) {
      const message = `${group.dir} has no subprojects, why are they a ${group.dir.split('-')[0]}?`;
      warnings.push({ code: OwnersErrorCode.OWNERS_NO_SUBPROJECTS, message });
      log.warn(message);
    } else if (group.subprojects === null) {
      const message = `${group.dir} has an empty subprojects: field`;
      warnings.push({ code: OwnersErrorCode.OWNERS_NO_SUBPROJECTS, message });
      log.warn(message);
    }

    for (const subproject of subprojectsOf(group)) {
      log.info(`${group.dir}/${subproject.name}`);
      const paths = subproject.paths ?? {};

      for (const uri of subproject.owners) {
        const ownersPath = monorepoPathFromUri(uri, config);
        if (ownersPath in paths) {
          continue;
        }
        const fetchUri = uri === ownersPath ? uriFromMonorepoPath(ownersPath, config) : uri;
        paths[ownersPath] = await fetchRecord(ownersPath, fetchUri, options, warnings);
        recorded++;
      }

      subproject.paths = paths;
    }
  }

  log.info('ANALYSIS....');
  for (const group of groupsIn(dataset, config.owningCategories)) {
    for (const subproject of subprojectsOf(group)) {
      const id = `${group.dir}/${subproject.name}`;
      const result = analyzeConsensus(id, subproject.paths ?? {});
      subproject.common = result.common;
      subproject.union = result.union;
      subprojects++;

      for (const finding of result.findings) {
        findings.push(finding);
        const code = findingCode(finding.kind);
        if (code !== null) {
          warnings.push({ code, file: finding.path, message: finding.message });
          log.warn(finding.message);
        } else {
          log.info(finding.message);
        }
      }
    }
  }

  return { warnings, findings, recorded, subprojects };
}
