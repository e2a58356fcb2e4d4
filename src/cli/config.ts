import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { ConfigError, type OwnersConfig } from '../lib/owners/index.js';

export const DEFAULT_CONFIG_FILE = 'sigs-owners.yaml';

export const DEFAULT_OWNERS_CONFIG: OwnersConfig = {
  rawUriPrefix: 'https://raw.githubusercontent.com/',
  branch: 'master',
  ownersFile: 'OWNERS',
  aliasesFile: 'OWNERS_ALIASES',
  owningCategories: ['sigs', 'committees'],
  catchAllGroup: 'committee-steering',
  primaryRepo: 'kubernetes/kubernetes',
  sharedRepos: ['kubernetes/kubernetes', 'kubernetes/api', 'kubernetes/client-go'],
  stagingMonorepo: 'kubernetes/kubernetes',
  stagingDir: 'staging/src/k8s.io',
};

/**
 * sigs-owners.yaml, `owners` section
 */
interface OwnersYamlShape {
  raw_uri_prefix?: unknown;
  branch?: unknown;
  owners_file?: unknown;
  aliases_file?: unknown;
  owning_categories?: unknown;
  catch_all_group?: unknown;
  primary_repo?: unknown;
  shared_repos?: unknown;
  staging_monorepo?: unknown;
  staging_dir?: unknown;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asStringArray(value: unknown, field: string, file: string): string[] {
  if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
    throw new ConfigError(`Invalid ${field}: expected array of strings`, file);
  }
  return value;
}

function asNonEmptyString(value: unknown, field: string, file: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`Invalid ${field}: expected non-empty string`, file);
  }
  return value;
}

/**
 * Like asNonEmptyString, but '' switches the feature off
 */
function asString(value: unknown, field: string, file: string): string {
  if (typeof value !== 'string') {
    throw new ConfigError(`Invalid ${field}: expected string`, file);
  }
  return value;
}

function resolveConfigPath(cwd: string, explicitConfigPath?: string): string | null {
  if (explicitConfigPath) {
    const resolved = path.resolve(cwd, explicitConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Configuration file not found: ${resolved}`, resolved);
    }
    if (fs.statSync(resolved).isDirectory()) {
      throw new ConfigError(`Expected file, got directory: ${resolved}`, resolved);
    }
    return resolved;
  }

  const defaultConfig = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(defaultConfig) && !fs.statSync(defaultConfig).isDirectory()
    ? defaultConfig
    : null;
}

/**
 * Merge the `owners` section of a parsed config over the defaults
 */
export function mergeOwnersConfig(parsed: unknown, configPath: string): OwnersConfig {
  const merged: OwnersConfig = { ...DEFAULT_OWNERS_CONFIG };

  if (parsed === undefined || parsed === null) {
    return merged;
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Invalid configuration in ${configPath}: expected YAML object`, configPath);
  }

  const section = parsed.owners;
  if (section === undefined || section === null) {
    return merged;
  }
  if (!isPlainObject(section)) {
    throw new ConfigError(`Invalid owners in ${configPath}: expected YAML object`, configPath);
  }

  const owners: OwnersYamlShape = section;

  if (owners.raw_uri_prefix !== undefined) {
    merged.rawUriPrefix = asNonEmptyString(owners.raw_uri_prefix, 'owners.raw_uri_prefix', configPath);
  }
  if (owners.branch !== undefined) {
    merged.branch = asNonEmptyString(owners.branch, 'owners.branch', configPath);
  }
  if (owners.owners_file !== undefined) {
    merged.ownersFile = asNonEmptyString(owners.owners_file, 'owners.owners_file', configPath);
  }
  if (owners.aliases_file !== undefined) {
    merged.aliasesFile = asNonEmptyString(owners.aliases_file, 'owners.aliases_file', configPath);
  }
  if (owners.owning_categories !== undefined) {
    merged.owningCategories = asStringArray(owners.owning_categories, 'owners.owning_categories', configPath);
  }
  if (owners.catch_all_group !== undefined) {
    merged.catchAllGroup = asNonEmptyString(owners.catch_all_group, 'owners.catch_all_group', configPath);
  }
  if (owners.primary_repo !== undefined) {
    merged.primaryRepo = asString(owners.primary_repo, 'owners.primary_repo', configPath);
  }
  if (owners.shared_repos !== undefined) {
    merged.sharedRepos = asStringArray(owners.shared_repos, 'owners.shared_repos', configPath);
  }
  if (owners.staging_monorepo !== undefined) {
    merged.stagingMonorepo = asString(owners.staging_monorepo, 'owners.staging_monorepo', configPath);
  }
  if (owners.staging_dir !== undefined) {
    merged.stagingDir = asString(owners.staging_dir, 'owners.staging_dir', configPath);
  }

  return merged;
}

export function loadOwnersConfig(cwd: string, explicitConfigPath?: string): OwnersConfig {
  const configPath = resolveConfigPath(cwd, explicitConfigPath);

  if (!configPath) {
    return { ...DEFAULT_OWNERS_CONFIG };
  }

  const source = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.load(source, { filename: configPath });
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`, configPath);
  }

  return mergeOwnersConfig(parsed, configPath);
}
