#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point of the image finder.
 * Parses arguments, obtains the catalog and prints the query result.
 */

import { Command, CommanderError, Option } from 'commander';

import * as log from './actions/core-wrapper';
import { CacheManager } from './cache-manager';
import { getCatalog } from './catalog-provider';
import { getImageDirectory, loadConfig } from './config';
import { formatTimeBetween } from './date-utils';
import { getErrorMessage } from './errors';
import { openListingSource } from './listing-source';
import { queryCatalog } from './query-engine';
import { OutputFormat, writeQueryResult } from './query-outputs';
import { SelectionMode, SortMode } from './types';

/**
 * Options accepted on the command line.
 */
export type CliOptions = {
  readonly versionFilter?: string;
  readonly all?: boolean;
  readonly latest?: boolean;
  readonly modified?: boolean;
  readonly size?: boolean;
  readonly refresh?: boolean;
  readonly quiet?: boolean;
  readonly long?: boolean;
  readonly json?: boolean;
  readonly config?: string;
};

const MILLISECONDS_PER_SECOND = 1000;

export function getSelectionMode(options: CliOptions): SelectionMode {
  if (options.all) return 'all';
  if (options.latest) return 'latest';
  return 'default';
}

export function getSortMode(options: CliOptions): SortMode {
  if (options.modified) return 'modified';
  if (options.size) return 'size';
  return 'version';
}

export function getOutputFormat(options: CliOptions): OutputFormat {
  if (options.json) return 'json';
  if (options.long) return 'long';
  return 'paths';
}

/**
 * Looks up images matching the patterns and writes them to standard output.
 *
 * @param namePatterns - Tool name patterns from the command line
 * @param options - Parsed command-line options
 */
export async function findImages(namePatterns: ReadonlyArray<string>, options: CliOptions): Promise<void> {
  const config = loadConfig(options.config);
  const imageDirectory = getImageDirectory(config);
  // JSON output must stay machine-readable
  const quiet = Boolean(options.quiet || options.json);

  const cacheManager = new CacheManager({
    cachePath: config.cachePath,
    maxAgeMs: config.maxCacheAgeSeconds * MILLISECONDS_PER_SECOND,
  });

  const { catalog } = await getCatalog({
    cacheManager,
    openListing: () => openListingSource({ imageDirectory, listUrl: config.listUrl }),
    refresh: Boolean(options.refresh),
    quiet,
  });

  const queryResult = queryCatalog(catalog, {
    namePatterns,
    versionFilter: options.versionFilter,
    selection: getSelectionMode(options),
    sortMode: getSortMode(options),
    imageDirectory,
  });

  writeQueryResult(queryResult, getOutputFormat(options), quiet);
}

/**
 * Builds the command-line parser.
 */
export function createProgram(): Command {
  return new Command()
    .name('image-finder')
    .description('Find container images by tool name, version and build')
    .argument('[patterns...]', 'tool name patterns, * matches any text', ['*'])
    .option('-v, --version-filter <version>', 'only versions equal to <version> or extending it after a dot')
    .addOption(new Option('-a, --all', 'list every version and build').conflicts('latest'))
    .addOption(new Option('-l, --latest', 'list only the newest build of each tool'))
    .addOption(new Option('-m, --modified', 'sort by modification time').conflicts('size'))
    .addOption(new Option('-s, --size', 'sort by size'))
    .option('-r, --refresh', 'rebuild the catalog even if the cache is fresh')
    .option('-q, --quiet', 'print only the matching images')
    .addOption(new Option('--long', 'print modification time and size with each image').conflicts('json'))
    .addOption(new Option('--json', 'print the matching images as JSON'))
    .option('-c, --config <path>', 'YAML configuration file')
    .exitOverride()
    .action(async (namePatterns: string[], options: CliOptions) => {
      await findImages(namePatterns, options);
    });
}

/**
 * Runs the command line. Never rejects: failures are reported and set the exit code.
 *
 * @param argv - Full argument vector, including the node executable and script path
 */
export async function run(argv: ReadonlyArray<string> = process.argv): Promise<void> {
  const runStartTime = performance.now();

  try {
    await createProgram().parseAsync([...argv]);
  } catch (executionError) {
    if (executionError instanceof CommanderError) {
      // commander has already printed usage or help
      process.exitCode = executionError.exitCode;
      return;
    }
    log.setFailed(getErrorMessage(executionError));
    return;
  }

  log.debug(`Completed in ${formatTimeBetween(runStartTime, performance.now()) || 'less than a second'}`);
}

if (require.main === module) {
  void run();
}
