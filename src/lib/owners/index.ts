/**
 * sigs-owners
 *
 * Main entry point for the owners library.
 */

// Pipelines
export {
  generateOwnersReport,
  type OwnersReportOptions,
  type OwnersReportResult,
  type OwnersReportStats,
} from './report.js';
export { verifySubprojectOwners, type VerifyOptions, type VerifyResult } from './verify.js';

// Core algorithm
export { expandAliases } from './aliases.js';
export {
  loadAllOwners,
  expandStoreAliases,
  expandRecord,
  emptyOwnersStore,
  type LoadOwnersOptions,
  type LoadOwnersResult,
} from './loader.js';
export { pruneDuplicateReviewers, pruneRecord } from './prune.js';
export { PrefixTrie, stripDeclarationFile, type PrefixMatch } from './prefix-trie.js';
export { loadGroupsAndSubprojects, UNKNOWN_SUBPROJECT, type SubprojectTable } from './groups.js';
export { resolveOwnership, applyResolution, buildOwnershipTrie } from './resolver.js';
export { analyzeConsensus, findingCode, type ConsensusFinding, type ConsensusResult } from './consensus.js';
export { findMultiOwnedRepos, formatMultiOwnedRepo, reposFromGroup, type MultiOwnedRepo } from './multi-owner.js';
export { renderRepoGroupsSql } from './repo-groups.js';

// I/O
export { loadDataset, parseDataset, renderDataset, groupDisplayName, groupTypeOf } from './dataset.js';
export { loadOwnersStore, saveOwnersStore, parseOwnersStore, formatOwnersStore } from './store.js';
export { parseOwnersFile, parseAliasesFile } from './parse.js';
export {
  RipgrepDeclarationSource,
  isRipgrepAvailable,
  classifyDeclarationPaths,
  type DeclarationSource,
  type DeclarationFile,
  type DiscoveryResult,
} from './discovery.js';
export {
  DirectoryFileCache,
  MemoryFileCache,
  createHttpFetcher,
  type RemoteFileCache,
  type Fetcher,
} from './remote-cache.js';
export { writeTextAtomic, writeOutput } from './writer.js';
export { monorepoPathFromUri, uriFromMonorepoPath, repoOfPath } from './paths.js';

// Errors
export {
  OwnersErrorCode,
  OwnersReportError,
  MissingDataError,
  MalformedDataError,
  ConsistencyError,
  ConfigError,
  errorMessage,
} from './errors.js';

// Types
export type {
  Group,
  GroupType,
  Subproject,
  SigsDataset,
  SubprojectEntry,
  OwnersRecord,
  OwnersStore,
  AliasTable,
  AliasesRecord,
  AttributeSets,
  OwnersAttribute,
  OwnersConfig,
  PathAssignment,
  Resolution,
  ResolutionState,
  ReportLogger,
  ReportWarning,
} from './types.js';
