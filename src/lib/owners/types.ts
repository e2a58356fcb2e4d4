/**
 * sigs-owners Type Definitions
 *
 * Types for the governance dataset (sigs.yaml), the parsed OWNERS cache
 * (owners.yaml) and the reports derived from them.
 */

/**
 * Dataset category keys that hold groups (e.g. `sigs`, `committees`)
 */
export type GroupCategory = string;

/**
 * Group type, derived from the category a group is listed under
 */
export type GroupType = 'sig' | 'committee' | 'working-group' | 'other';

/**
 * Attribute classes compared across OWNERS files
 */
export type OwnersAttribute = 'approvers' | 'reviewers' | 'labels';

export const OWNERS_ATTRIBUTES: readonly OwnersAttribute[] = ['approvers', 'reviewers', 'labels'];

/**
 * Per-attribute sets (as sorted lists) stored on a subproject
 */
export type AttributeSets = Record<OwnersAttribute, string[]>;

/**
 * A parsed OWNERS file
 *
 * Invariant after pruning: approvers and reviewers are disjoint.
 */
export interface OwnersRecord {
  approvers: string[];
  reviewers: string[];
  labels?: string[];
  /** False when the file could not be read or fetched */
  present: boolean;
  /** Aliases have been expanded; expansion runs at most once */
  expanded: boolean;
}

/**
 * Alias name -> members. A null value means "no members".
 */
export type AliasTable = Record<string, string[] | null>;

/**
 * Parsed OWNERS_ALIASES file
 */
export interface AliasesRecord {
  aliases: AliasTable;
}

/**
 * Cache of every parsed OWNERS / OWNERS_ALIASES file (owners.yaml)
 *
 * Keys are monorepo paths: org/repo/path/to/OWNERS
 */
export interface OwnersStore {
  owners: Record<string, OwnersRecord>;
  aliases: Record<string, AliasesRecord>;
}

/**
 * Subproject entry in sigs.yaml
 *
 * Unknown keys (description, contact, ...) are carried through untouched.
 */
export interface Subproject {
  name: string;
  /** OWNERS references: raw URIs or monorepo paths */
  owners: string[];
  /** Per-OWNERS-file contents recorded by remote verification */
  paths?: Record<string, OwnersRecord>;
  common?: AttributeSets;
  union?: AttributeSets;
  [key: string]: unknown;
}

/**
 * Group entry in sigs.yaml (SIG, committee, working group, ...)
 */
export interface Group {
  dir: string;
  name: string;
  subprojects?: Subproject[] | null;
  [key: string]: unknown;
}

/**
 * The whole sigs.yaml document: category -> groups
 */
export type SigsDataset = Record<GroupCategory, Group[]>;

/**
 * Subproject plus the group it belongs to
 *
 * Kept beside the dataset so the parent back-reference never lands in the
 * written document.
 */
export interface SubprojectEntry {
  subproject: Subproject;
  /** Parent group dir, e.g. sig-foo */
  parent: string;
  /** parent/name, e.g. sig-foo/core */
  fullName: string;
  /** Owners as monorepo paths */
  ownersPaths: string[];
}

/**
 * How a path came to be owned by its subproject
 */
export type ResolutionState = 'declared' | 'prefix' | 'unknown';

/**
 * Ownership assigned to one OWNERS path
 */
export interface PathAssignment {
  path: string;
  subproject: string;
  state: ResolutionState;
  /** Justification, absent for declared paths */
  reason?: string;
}

/**
 * Outcome of ownership resolution
 */
export interface Resolution {
  /** Subproject name -> owners paths, sorted */
  owners: Map<string, string[]>;
  /** Path -> assignment */
  assignments: Map<string, PathAssignment>;
  /** Path -> justification (side channel for rendering) */
  annotations: Map<string, string>;
}

/**
 * Warning entry collected by the pipelines
 */
export interface ReportWarning {
  code: string;
  file?: string;
  message: string;
}

/**
 * Logger interface passed into library code
 */
export interface ReportLogger {
  info(message: string): void;
  warn(message: string): void;
  verbose(message: string): void;
}

/**
 * Project settings, see cli/config.ts for the file format
 */
export interface OwnersConfig {
  /** Prefix of raw OWNERS URIs, e.g. https://raw.githubusercontent.com/ */
  rawUriPrefix: string;
  /** Branch segment of raw OWNERS URIs */
  branch: string;
  ownersFile: string;
  aliasesFile: string;
  /** Dataset categories whose groups may own code */
  owningCategories: string[];
  /** Group that receives the catch-all `unknown` subproject */
  catchAllGroup: string;
  /** Repository left out of the repo groups SQL */
  primaryRepo: string;
  /** Repositories expected to be claimed by several groups */
  sharedRepos: string[];
  /** Monorepo whose staging directory publishes other repositories */
  stagingMonorepo: string;
  /** Staging directory inside the monorepo */
  stagingDir: string;
}
