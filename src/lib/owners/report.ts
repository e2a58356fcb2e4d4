/**
 * Owners report - main orchestration module
 *
 * - load owners.yaml (the parsed OWNERS cache)
 * - refresh it from the OWNERS files below the given org directories
 * - remove approvers from reviewers and save the cache
 * - assign each OWNERS file to a subproject: declared, longest prefix, or
 *   the catch-all `unknown` subproject
 * - add common/union consensus for every subproject with OWNERS files;
 *   declared files that were not found count as absent
 * - render sigs.yaml with every OWNERS file assigned, commented with the
 *   reason for each guess
 */

import type {
  OwnersConfig,
  OwnersRecord,
  ReportLogger,
  ReportWarning,
  ResolutionState,
  SigsDataset,
} from './types.js';
import type { DeclarationSource } from './discovery.js';
import type { ConsensusFinding } from './consensus.js';
import { loadOwnersStore, saveOwnersStore } from './store.js';
import { loadAllOwners } from './loader.js';
import { pruneDuplicateReviewers } from './prune.js';
import { loadDataset, renderDataset } from './dataset.js';
import { loadGroupsAndSubprojects } from './groups.js';
import { applyResolution, resolveOwnership } from './resolver.js';
import { analyzeConsensus, findingCode } from './consensus.js';
import { MissingDataError, OwnersErrorCode, OwnersReportError, errorMessage } from './errors.js';

/**
 * Owners report options
 */
export interface OwnersReportOptions {
  /** Path to sigs.yaml */
  sigsYaml: string;
  /** Path to read/write the parsed OWNERS cache */
  ownersYaml: string;
  /** Org directories to search for OWNERS files */
  roots: string[];
  /** Walk the roots; otherwise use owners.yaml as is */
  refreshOwners: boolean;
  /** Write owners as raw URIs instead of monorepo paths */
  emitUris: boolean;
  config: OwnersConfig;
  source: DeclarationSource;
  log: ReportLogger;
}

/**
 * Owners report statistics
 */
export interface OwnersReportStats {
  owners_files: number;
  aliases_files: number;
  parsed_files: number;
  subprojects: number;
  assignments: Record<ResolutionState, number>;
  report_time_ms: number;
}

/**
 * Owners report result
 */
export interface OwnersReportResult {
  success: boolean;
  error?: {
    code: OwnersErrorCode;
    message: string;
    path?: string;
  };
  stats?: OwnersReportStats;
  dataset?: SigsDataset;
  /** Rendered sigs.yaml with reasons as comments */
  document?: string;
  findings: ConsensusFinding[];
  warnings: ReportWarning[];
}

function failure(error: unknown, warnings: ReportWarning[], findings: ConsensusFinding[]): OwnersReportResult {
  if (error instanceof OwnersReportError) {
    return {
      success: false,
      error: { code: error.code, message: error.message, path: error.path },
      findings,
      warnings,
    };
  }
  throw error;
}

/**
 * Build the owners report
 */
export function generateOwnersReport(options: OwnersReportOptions): OwnersReportResult {
  const startTime = Date.now();
  const { config, log } = options;
  const warnings: ReportWarning[] = [];
  const findings: ConsensusFinding[] = [];

  try {
    const loaded = loadOwnersStore(options.ownersYaml);
    if (loaded.error) {
      warnings.push({ code: loaded.error.code, file: options.ownersYaml, message: loaded.error.message });
      log.warn(`Ignoring ${options.ownersYaml}: ${loaded.error.message}`);
    }

    let store = loaded.store;
    let parsedFiles = 0;

    if (options.refreshOwners) {
      log.info(`refreshing ${options.ownersYaml} from ${options.roots.length} paths`);
      const result = loadAllOwners(store, {
        roots: options.roots,
        source: options.source,
        config,
        log,
      });
      store = result.store;
      parsedFiles = result.parsed;
      warnings.push(...result.warnings);
    }

    store = pruneDuplicateReviewers(store);
    saveOwnersStore(options.ownersYaml, store);

    const dataset = loadDataset(options.sigsYaml);
    const table = loadGroupsAndSubprojects(dataset, config, log);
    const resolution = resolveOwnership(table, Object.keys(store.owners), config.ownersFile, log);

    const assignments: Record<ResolutionState, number> = { declared: 0, prefix: 0, unknown: 0 };
    for (const assignment of resolution.assignments.values()) {
      assignments[assignment.state]++;
    }

    for (const [name, entry] of table.subprojects) {
      const records: Record<string, OwnersRecord> = {};
      for (const ownersPath of resolution.owners.get(name) ?? []) {
        const record = store.owners[ownersPath];
        if (record) {
          records[ownersPath] = record;
          continue;
        }
        // declared in sigs.yaml but not found below the roots
        const missing = new MissingDataError(ownersPath);
        warnings.push({ code: missing.code, file: ownersPath, message: missing.message });
        log.verbose(missing.message);
        records[ownersPath] = { approvers: [], reviewers: [], present: false, expanded: true };
      }
      if (Object.keys(records).length === 0) {
        continue;
      }

      const consensus = analyzeConsensus(entry.fullName, records);
      entry.subproject.common = consensus.common;
      entry.subproject.union = consensus.union;
      for (const finding of consensus.findings) {
        findings.push(finding);
        const code = findingCode(finding.kind);
        if (code !== null) {
          warnings.push({ code, file: finding.path, message: finding.message });
          log.warn(finding.message);
        } else {
          log.verbose(finding.message);
        }
      }
    }

    const annotations = applyResolution(dataset, resolution, { config, emitUris: options.emitUris });
    const document = renderDataset(dataset, annotations);

    return {
      success: true,
      stats: {
        owners_files: Object.keys(store.owners).length,
        aliases_files: Object.keys(store.aliases).length,
        parsed_files: parsedFiles,
        subprojects: table.subprojects.size,
        assignments,
        report_time_ms: Date.now() - startTime,
      },
      dataset,
      document,
      findings,
      warnings,
    };
  } catch (error) {
    log.verbose(`owners report failed: ${errorMessage(error)}`);
    return failure(error, warnings, findings);
  }
}
