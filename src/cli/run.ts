/**
 * hub-cache-verify command runner
 *
 * Parses arguments, dispatches to a command and returns the exit code:
 * 0 success, 1 verification or comparison failures, 2 usage errors and
 * faults (an unreadable cache root, a malformed identifier).
 */

import { readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CacheInspectionError } from '../api/errors.js';
import {
  findPackageRoot,
  initializeConfig,
  resolveCacheLocation,
} from '../config/loader.js';
import { CacheInspector } from '../core/cache-inspector.js';
import { InvariantChecker } from '../core/invariant-checker.js';
import { CrossImplementationComparator } from '../core/comparator.js';
import { findBrokenSymlinks } from '../core/symlink-resolver.js';
import { listCachedRepos } from '../core/cache-listing.js';
import { repoIdOf } from '../core/path-scheme.js';
import { createLogger } from '../utils/logger-helpers.js';
import { CacheFingerprintSchema } from '../types/schemas/fingerprint.js';
import { RepoKindSchema } from '../types/schemas/common.js';
import type { RuntimeConfig } from '../types/schemas/config.js';
import type { CacheFingerprint, RepoKind } from '../types/cache.js';
import type { MatchMode } from '../types/comparison.js';
import {
  describeViolation,
  formatComparison,
  formatFailures,
  formatListTable,
  formatSize,
} from './format.js';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_FAULT = 2;

/**
 * Output sinks and overrides, replaceable in tests.
 */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export const processIO: CliIO = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

/** Flags that never take a value */
const BOOLEAN_FLAGS = new Set(['json', 'strict', 'verbose', 'help', 'version', 'skip-links']);

interface CLIArgs {
  _: string[];
  flags: Map<string, string | true>;
}

/**
 * Usage error (bad or missing arguments).
 */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [], flags: new Map() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq !== -1) {
        result.flags.set(arg.slice(2, eq), arg.slice(eq + 1));
        continue;
      }

      const key = arg.slice(2);
      const nextArg = args[i + 1];

      if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !nextArg.startsWith('--')) {
        result.flags.set(key, nextArg);
        i++;
      } else {
        result.flags.set(key, true);
      }
    } else {
      result._.push(arg);
    }
  }

  return result;
}

function flag(args: CLIArgs, name: string): boolean {
  return args.flags.get(name) === true;
}

function stringFlag(args: CLIArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  if (value === true) {
    throw new UsageError(`--${name} requires a value`);
  }
  return value;
}

function integerFlag(args: CLIArgs, name: string): number | undefined {
  const raw = stringFlag(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

const HELP = `
hub-cache-verify - Inspect, verify and compare hub-layout model caches

USAGE:
  hub-cache-verify <command> [options]

COMMANDS:
  verify                                Check every repository and alias
    --repo <query>                      Only repositories matching query
    --ref <name>                        Ref to check (default: main)
    --strict                            Fail on warnings too
    --skip-links                        Skip live symlink walks
    --timeout <ms>                      Walk deadline
    --json                              Output the report as JSON

  inspect                               Print the cache fingerprint as JSON
    --timeout <ms>                      Walk deadline

  compare <a> <b>                       Compare two caches or fingerprint files
    --match <key>                       Repository key for both sides
    --match-b <key>                     Repository key for side B
    --canonical <owner/name>            Exact repository id
    --mode <auto|exact|substring>       Name matching mode
    --ref <name>                        Ref whose format is compared
    --json                              Output the report as JSON

  links <dir>                           Report broken symlinks under dir

  list                                  List cached repositories
    --type <model|dataset>              Filter by kind
    --sort <name|size>                  Sort order (size: largest first)
    --json                              Output as JSON

OPTIONS:
  --cache-dir <path>                    Cache root (default: HF_HOME or ~/.cache/huggingface)
  --config <path>                       runtime.yaml to load
  --verbose                             Debug logging on stderr
  --help                                Show this help message
  --version                             Show version

ENVIRONMENT VARIABLES:
  HF_HOME                               Cache root
  HF_HUB_CACHE                          Hub directory
  HUB_CACHE_LOG_LEVEL                   Log level override
`;

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(findPackageRoot(), 'package.json'), 'utf8'));
  const parsed = z.object({ version: z.string() }).safeParse(raw);
  return parsed.success ? parsed.data.version : 'unknown';
}

interface CommandContext {
  args: CLIArgs;
  config: RuntimeConfig;
  io: CliIO;
  logger: Logger;
}

/**
 * Run the CLI with `argv` (arguments after the executable) and return the
 * exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const args = parseArgs(argv);

  if (flag(args, 'help')) {
    io.stdout(HELP);
    return EXIT_OK;
  }

  if (flag(args, 'version')) {
    io.stdout(`hub-cache-verify v${readVersion()}`);
    return EXIT_OK;
  }

  const command = args._[0];
  if (!command) {
    io.stderr('❌ Error: No command specified\n');
    io.stderr(HELP);
    return EXIT_FAULT;
  }

  try {
    const config = initializeConfig(stringFlag(args, 'config'));
    const verbose = flag(args, 'verbose');
    const logger = io.logger ?? createLogger(verbose ? 'debug' : config.logging.level, verbose);
    const context: CommandContext = { args, config, io, logger };

    switch (command) {
      case 'verify':
        return await verifyCommand(context);
      case 'inspect':
        return await inspectCommand(context);
      case 'compare':
        return await compareCommand(context);
      case 'links':
        return await linksCommand(context);
      case 'list':
        return await listCommand(context);
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof CacheInspectionError) {
      if (flag(args, 'json')) {
        io.stdout(JSON.stringify({ error: error.toObject() }, null, 2));
      }
      io.stderr(`❌ Error: ${error.message}`);
      io.stderr(`   Code: ${error.code}`);
      if (error.path) {
        io.stderr(`   Path: ${error.path}`);
      }
      return EXIT_FAULT;
    }
    if (error instanceof UsageError) {
      io.stderr(`❌ Error: ${error.message}`);
      io.stderr('   Run with --help for usage');
      return EXIT_FAULT;
    }
    throw error;
  }
}

function location(context: CommandContext): { cacheRoot: string; hubDir: string } {
  return resolveCacheLocation(stringFlag(context.args, 'cache-dir'), context.config, context.io.env);
}

async function verifyCommand(context: CommandContext): Promise<number> {
  const { args, config, io, logger } = context;
  const { cacheRoot, hubDir } = location(context);
  const ref = stringFlag(args, 'ref') ?? config.inspection.default_ref;
  const checker = new InvariantChecker({ concurrency: config.inspection.concurrency, logger });

  const report = await checker.verifyCache(cacheRoot, {
    hubDir,
    ref,
    repoFilter: stringFlag(args, 'repo'),
    skipLinks: flag(args, 'skip-links'),
    timeoutMs: integerFlag(args, 'timeout') ?? config.inspection.timeout_ms,
    maxSymlinkDepth: config.inspection.max_symlink_depth,
  });

  const strict = flag(args, 'strict');
  const failed = report.errorCount > 0 || (strict && report.warningCount > 0);

  if (flag(args, 'json')) {
    io.stdout(JSON.stringify(report, null, 2));
    return failed ? EXIT_FAILURES : EXIT_OK;
  }

  for (const repo of report.repos) {
    for (const line of formatFailures(`${repo.repo} (ref ${ref})`, repo.results)) {
      io.stderr(line);
    }
  }
  for (const alias of report.aliases) {
    for (const line of formatFailures(`alias ${alias.alias.kind}:${repoIdOf(alias.alias)}`, alias.results)) {
      io.stderr(line);
    }
  }

  if (!report.complete) {
    io.stderr('⚠️  Inspection deadline elapsed; unfinished repositories were reported as degraded');
  }

  const summary =
    `${report.repos.length} repositories, ${report.aliases.length} aliases: ` +
    `${report.errorCount} errors, ${report.warningCount} warnings`;
  io.stdout(failed ? `❌ ${summary}` : `✅ ${summary}`);

  return failed ? EXIT_FAILURES : EXIT_OK;
}

async function inspectCommand(context: CommandContext): Promise<number> {
  const { args, config, io, logger } = context;
  const { cacheRoot, hubDir } = location(context);
  const inspector = new CacheInspector({ concurrency: config.inspection.concurrency, logger });
  const fingerprint = await inspector.inspect(cacheRoot, {
    hubDir,
    timeoutMs: integerFlag(args, 'timeout') ?? config.inspection.timeout_ms,
  });
  io.stdout(JSON.stringify(fingerprint, null, 2));
  return EXIT_OK;
}

/**
 * A fingerprint from a JSON file, or by inspecting a cache root.
 */
async function loadFingerprint(source: string, context: CommandContext): Promise<CacheFingerprint> {
  let isFile = false;
  try {
    isFile = statSync(source).isFile();
  } catch (error) {
    throw new CacheInspectionError('AccessFault', `Cannot read ${source}`, { path: source, cause: error });
  }

  if (isFile) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(source, 'utf8'));
    } catch (error) {
      throw new UsageError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    const parsed = CacheFingerprintSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'} ${issue.message}`);
      throw new UsageError(`${source} is not a cache fingerprint:\n${issues.join('\n')}`);
    }
    return parsed.data;
  }

  const inspector = new CacheInspector({
    concurrency: context.config.inspection.concurrency,
    logger: context.logger,
  });
  return inspector.inspect(source, { timeoutMs: context.config.inspection.timeout_ms });
}

function matchModeFlag(args: CLIArgs, fallback: MatchMode): MatchMode {
  const raw = stringFlag(args, 'mode');
  if (raw === undefined) return fallback;
  if (raw === 'auto' || raw === 'exact' || raw === 'substring') return raw;
  throw new UsageError(`--mode must be auto, exact or substring, got "${raw}"`);
}

async function compareCommand(context: CommandContext): Promise<number> {
  const { args, config, io, logger } = context;
  const [, sourceA, sourceB] = args._;
  if (sourceA === undefined || sourceB === undefined) {
    throw new UsageError('compare needs two cache roots or fingerprint files');
  }

  const canonicalId = stringFlag(args, 'canonical');
  const matchA = stringFlag(args, 'match') ?? '';
  const matchB = stringFlag(args, 'match-b') ?? matchA;
  if (matchA === '' && canonicalId === undefined) {
    throw new UsageError('compare needs --match <key> or --canonical <owner/name>');
  }

  const [fingerprintA, fingerprintB] = await Promise.all([
    loadFingerprint(sourceA, context),
    loadFingerprint(sourceB, context),
  ]);

  const comparator = new CrossImplementationComparator({ logger });
  const report = comparator.compare(
    fingerprintA,
    fingerprintB,
    { a: matchA, b: matchB },
    {
      canonicalId,
      ref: stringFlag(args, 'ref') ?? config.inspection.default_ref,
      mode: matchModeFlag(args, config.comparison.match_mode),
    }
  );

  if (flag(args, 'json')) {
    io.stdout(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatComparison(report)) {
      io.stdout(line);
    }
    for (const match of [report.matchA, report.matchB]) {
      if (match?.ambiguous) {
        io.stderr(`⚠️  Ambiguous ${match.strategy} match; chose ${match.name} from ${match.candidates.join(', ')}`);
      }
    }
  }

  return report.allPassed ? EXIT_OK : EXIT_FAILURES;
}

async function linksCommand({ args, config, io, logger }: CommandContext): Promise<number> {
  const dir = args._[1];
  if (dir === undefined) {
    throw new UsageError('links needs a directory');
  }

  const broken = await findBrokenSymlinks(dir, {
    maxDepth: config.inspection.max_symlink_depth,
    logger,
  });
  for (const link of broken) {
    io.stderr(`✗ ${describeViolation({ reason: 'BrokenSymlink', ...link })}`);
  }

  if (flag(args, 'json')) {
    io.stdout(JSON.stringify(broken, null, 2));
  } else {
    io.stdout(broken.length === 0 ? `✅ All links resolve under ${dir}` : `❌ ${broken.length} broken links`);
  }
  return broken.length === 0 ? EXIT_OK : EXIT_FAILURES;
}

async function listCommand(context: CommandContext): Promise<number> {
  const { args, io, logger } = context;
  const { cacheRoot, hubDir } = location(context);

  const rawKind = stringFlag(args, 'type');
  let kind: RepoKind | undefined;
  if (rawKind !== undefined) {
    const parsed = RepoKindSchema.safeParse(rawKind);
    if (!parsed.success) {
      throw new UsageError(`--type must be model or dataset, got "${rawKind}"`);
    }
    kind = parsed.data;
  }

  const rawSort = stringFlag(args, 'sort') ?? 'name';
  if (rawSort !== 'name' && rawSort !== 'size') {
    throw new UsageError(`--sort must be name or size, got "${rawSort}"`);
  }

  const entries = await listCachedRepos(cacheRoot, {
    hubDir,
    kind,
    sort: rawSort,
    logger,
  });

  if (flag(args, 'json')) {
    io.stdout(JSON.stringify(entries, null, 2));
    return EXIT_OK;
  }

  if (entries.length === 0) {
    io.stdout('📭 No cached repositories');
    io.stdout(`Cache directory: ${cacheRoot}`);
    return EXIT_OK;
  }

  for (const line of formatListTable(entries)) {
    io.stdout(line);
  }
  const totalSize = entries.reduce((sum, entry) => sum + entry.size_bytes, 0);
  io.stdout('');
  io.stdout(`Total: ${entries.length} repos, ${formatSize(totalSize)}`);
  return EXIT_OK;
}
