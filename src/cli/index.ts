import { Command } from 'commander';
import * as path from 'node:path';
import {
  DirectoryFileCache,
  OwnersReportError,
  RipgrepDeclarationSource,
  createHttpFetcher,
  errorMessage,
  findMultiOwnedRepos,
  formatMultiOwnedRepo,
  generateOwnersReport,
  loadDataset,
  renderDataset,
  renderRepoGroupsSql,
  verifySubprojectOwners,
  writeOutput,
  type OwnersConfig,
} from '../lib/owners/index.js';
import { checkWalkPrereqs, resolveRoots, resolveWorkdir } from './prereqs.js';
import { loadOwnersConfig } from './config.js';
import { log, setVerbosity, Verbosity } from './logger.js';

const VERSION = '0.1.0';

// type aliases, so they satisfy commander's OptionValues
type GlobalOptions = {
  json?: boolean;
  verbose?: number;
  quiet?: boolean;
  config?: string;
};

type RepoGroupsOptions = GlobalOptions & {
  sigsYaml: string;
  repoGroupsSql?: string;
  validateSigs?: boolean;
};

type GenerateOptions = GlobalOptions & {
  sigsYaml: string;
  ownersYaml: string;
  refreshOwnersYaml: boolean;
  output?: string;
  emitUris?: boolean;
};

type VerifyCliOptions = GlobalOptions & {
  sigsYaml: string;
  workdir?: string;
  output?: string;
};

function outputJson(payload: unknown): void {
  console.log(JSON.stringify(payload, null, 2));
}

function reportFailure(jsonMode: boolean, prefix: string, error: unknown): number {
  const payload =
    error instanceof OwnersReportError
      ? { error: { code: error.code, message: error.message, path: error.path } }
      : { error: { message: errorMessage(error) } };
  if (jsonMode) {
    outputJson(payload);
  } else {
    log.error(`${prefix}: ${errorMessage(error)}`);
  }
  return 1;
}

function applyVerbosity(options: GlobalOptions): void {
  if (options.quiet) {
    setVerbosity(Verbosity.Quiet);
  } else if ((options.verbose ?? 0) > 0) {
    setVerbosity(Verbosity.Verbose);
  } else {
    setVerbosity(Verbosity.Normal);
  }
}

/**
 * Shared prologue: verbosity, then the config file
 */
function setup(options: GlobalOptions): OwnersConfig {
  applyVerbosity(options);
  return loadOwnersConfig(process.cwd(), options.config);
}

function runRepoGroups(options: RepoGroupsOptions): number {
  const jsonMode = options.json === true;
  let config: OwnersConfig;
  try {
    config = setup(options);
  } catch (error) {
    return reportFailure(jsonMode, 'Config error', error);
  }

  try {
    const dataset = loadDataset(path.resolve(options.sigsYaml));
    const multiOwned = options.validateSigs ? findMultiOwnedRepos(dataset, config) : [];

    if (options.repoGroupsSql) {
      writeOutput(options.repoGroupsSql, renderRepoGroupsSql(dataset, config));
      if (options.repoGroupsSql !== '-') {
        log.info(`Wrote ${options.repoGroupsSql}`);
      }
    }

    if (jsonMode) {
      outputJson({ multi_owned_repos: multiOwned });
      return 0;
    }
    for (const entry of multiOwned) {
      console.log(formatMultiOwnedRepo(entry));
    }
    return 0;
  } catch (error) {
    return reportFailure(jsonMode, 'repo-groups failed', error);
  }
}

function runGenerate(roots: string[], options: GenerateOptions): number {
  const jsonMode = options.json === true;
  let config: OwnersConfig;
  try {
    config = setup(options);
  } catch (error) {
    return reportFailure(jsonMode, 'Config error', error);
  }

  const cwd = process.cwd();
  const resolved = resolveRoots(cwd, roots);
  if (options.refreshOwnersYaml) {
    const missingTool = checkWalkPrereqs();
    if (missingTool) {
      return reportFailure(jsonMode, 'generate failed', new Error(missingTool));
    }
    if (resolved.missing.length > 0) {
      return reportFailure(jsonMode, 'generate failed', new Error(`Not a directory: ${resolved.missing.join(', ')}`));
    }
  }

  const result = generateOwnersReport({
    sigsYaml: path.resolve(cwd, options.sigsYaml),
    ownersYaml: path.resolve(cwd, options.ownersYaml),
    roots: resolved.roots,
    refreshOwners: options.refreshOwnersYaml,
    emitUris: options.emitUris === true,
    config,
    source: new RipgrepDeclarationSource(config),
    log,
  });

  if (!result.success || result.document === undefined) {
    if (jsonMode) {
      outputJson({ error: result.error, warnings: result.warnings });
    } else {
      log.error(`generate failed: ${result.error?.message ?? 'Unknown error'}`);
    }
    return 1;
  }

  try {
    if (options.output) {
      writeOutput(options.output, result.document);
    }
  } catch (error) {
    return reportFailure(jsonMode, 'generate failed', error);
  }

  if (jsonMode) {
    outputJson({ stats: result.stats, findings: result.findings, warnings: result.warnings });
    return 0;
  }

  const stats = result.stats;
  if (stats) {
    log.info(
      `${stats.owners_files} OWNERS files: ${stats.assignments.declared} declared, ` +
        `${stats.assignments.prefix} by prefix, ${stats.assignments.unknown} unknown`
    );
    log.verbose(`${stats.parsed_files} parsed, ${stats.aliases_files} alias files, ${stats.report_time_ms}ms`);
  }
  if (result.warnings.length > 0) {
    log.warn(`${result.warnings.length} warnings`);
  }
  return 0;
}

async function runVerify(options: VerifyCliOptions): Promise<number> {
  const jsonMode = options.json === true;
  let config: OwnersConfig;
  try {
    config = setup(options);
  } catch (error) {
    return reportFailure(jsonMode, 'Config error', error);
  }

  try {
    const dataset = loadDataset(path.resolve(options.sigsYaml));
    const workdir = resolveWorkdir(process.cwd(), options.workdir);
    log.info(`Using ${workdir.workdir} as workdir`);

    const cache = new DirectoryFileCache(workdir.workdir, createHttpFetcher(log), log);
    const result = await verifySubprojectOwners(dataset, { config, cache, log });

    if (options.output) {
      writeOutput(options.output, renderDataset(dataset));
    }

    if (jsonMode) {
      outputJson({
        workdir: workdir.workdir,
        subprojects: result.subprojects,
        recorded: result.recorded,
        findings: result.findings,
        warnings: result.warnings,
      });
    }
    return 0;
  } catch (error) {
    return reportFailure(jsonMode, 'verify failed', error);
  }
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('sigs-owners')
    .description('Assign OWNERS files to sigs.yaml subprojects and report on ownership')
    .version(VERSION, '-V, --version', 'Display version number')
    .option('--json', 'Output JSON instead of human-readable text')
    .option('-v, --verbose', 'Enable verbose logging', (_: unknown, prev: number) => prev + 1, 0)
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--config <path>', 'Override sigs-owners.yaml location');

  program
    .command('repo-groups')
    .description('Write repo_groups.sql and list repositories owned by several groups')
    .option('--sigs-yaml <path>', 'Path to sigs.yaml', 'sigs.yaml')
    .option('--repo-groups-sql <path>', 'Write repo group updates to path (- for stdout)')
    .option('--validate-sigs', 'List repositories owned by more than one group')
    .allowExcessArguments(false)
    .action((_opts: unknown, command: Command) => {
      process.exit(runRepoGroups(command.optsWithGlobals<RepoGroupsOptions>()));
    });

  program
    .command('generate')
    .description('Assign every OWNERS file below the org directories to a subproject')
    .argument('[roots...]', 'Org directories to search for OWNERS files', [])
    .option('--sigs-yaml <path>', 'Path to sigs.yaml', 'sigs.yaml')
    .option('--owners-yaml <path>', 'Path to read/write parsed OWNERS files', 'owners.yaml')
    .option('--no-refresh-owners-yaml', 'Use owners.yaml as is instead of walking the org directories')
    .option('--output <path>', 'Write the annotated sigs.yaml to path (- for stdout)')
    .option('--emit-uris', 'Write owners as raw URIs instead of paths')
    .action((roots: string[], _opts: unknown, command: Command) => {
      process.exit(runGenerate(roots, command.optsWithGlobals<GenerateOptions>()));
    });

  program
    .command('verify')
    .description('Fetch the OWNERS files of every subproject and record their common owners')
    .option('--sigs-yaml <path>', 'Path to sigs.yaml', 'sigs.yaml')
    .option('--workdir <dir>', 'Directory caching fetched files (default: a new temp dir)')
    .option('--output <path>', 'Write the updated sigs.yaml to path (- for stdout)')
    .allowExcessArguments(false)
    .action(async (_opts: unknown, command: Command) => {
      const code = await runVerify(command.optsWithGlobals<VerifyCliOptions>());
      process.exit(code);
    });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(errorMessage(error));
    process.exit(1);
  }
}

void main();
