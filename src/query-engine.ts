/**
 * @fileoverview Query engine over the image catalog.
 * Filters tools by name pattern and version, selects the latest or all builds, and orders the result.
 */

import { chain, escapeRegExp, last } from 'lodash';
import * as path from 'path';

import { ArtifactRecord, Catalog, SelectionMode, SortMode, VersionMap } from './types';
import {
  compareVersions,
  getLatestVersionLabel,
  matchesVersionPrefix,
  parseVariantString,
} from './version-comparator';

/**
 * Parameters of a catalog query.
 */
export type QueryOptions = {
  /** Tool name patterns; `*` matches any substring. An empty list means every tool. */
  readonly namePatterns: ReadonlyArray<string>;
  /** Keep only versions equal to this value or starting with `<value>.`. */
  readonly versionFilter?: string;
  readonly selection: SelectionMode;
  readonly sortMode: SortMode;
  /** Directory that image paths are resolved against. */
  readonly imageDirectory: string;
};

/**
 * Outcome of a query: the records to present and the latest version label detected for each matched tool.
 */
export type QueryResult = {
  readonly records: ReadonlyArray<ArtifactRecord>;
  readonly latestVersions: ReadonlyMap<string, string>;
};

type RecordComparator = (recordA: ArtifactRecord, recordB: ArtifactRecord) => number;

const DEFAULT_NAME_PATTERNS: ReadonlyArray<string> = ['*'];

/**
 * Orders records by version, then build number.
 */
export const compareByVersionAndBuild: RecordComparator = (recordA, recordB) =>
  compareVersions(recordA.versionString, recordB.versionString) || recordA.buildNumber - recordB.buildNumber;

const RECORD_COMPARATORS: Readonly<Record<SortMode, RecordComparator>> = {
  version: compareByVersionAndBuild,
  modified: (recordA, recordB) => recordA.modifiedAt.getTime() - recordB.modifiedAt.getTime(),
  size: (recordA, recordB) => recordA.sizeBytes - recordB.sizeBytes,
};

function compareToolNames(recordA: ArtifactRecord, recordB: ArtifactRecord): number {
  if (recordA.toolName < recordB.toolName) return -1;
  if (recordA.toolName > recordB.toolName) return 1;
  return 0;
}

/**
 * Compiles name patterns into one case-insensitive, fully anchored alternation.
 * `*` matches any substring; every other character is literal.
 *
 * @param namePatterns - Patterns such as `samtools` or `*rna*`
 * @returns Regular expression matching any of the patterns
 */
export function compileNamePatterns(namePatterns: ReadonlyArray<string>): RegExp {
  const patterns = namePatterns.length > 0 ? namePatterns : DEFAULT_NAME_PATTERNS;
  const alternatives = patterns.map((pattern) => pattern.split('*').map(escapeRegExp).join('.*'));
  return new RegExp(`^(?:${alternatives.join('|')})$`, 'i');
}

/**
 * Expands one tool's catalog entries into artifact records, applying the version filter.
 */
function expandToolRecords(
  toolName: string,
  versions: VersionMap,
  versionFilter: string | undefined,
  imageDirectory: string
): ArtifactRecord[] {
  const records: ArtifactRecord[] = [];
  for (const [versionString, variants] of versions) {
    if (versionFilter !== undefined && !matchesVersionPrefix(versionString, versionFilter)) {
      continue;
    }
    for (const [variantString, entry] of variants) {
      records.push({
        toolName,
        versionString,
        variantString,
        ...parseVariantString(variantString),
        sizeBytes: entry.sizeBytes,
        modifiedAt: entry.modifiedAt,
        path: path.join(imageDirectory, entry.filename),
      });
    }
  }
  return records;
}

/**
 * Applies the selection mode to one tool's records, already sorted for output.
 */
function selectToolRecords(
  sortedRecords: ReadonlyArray<ArtifactRecord>,
  selection: SelectionMode,
  latestVersion: string
): ArtifactRecord[] {
  switch (selection) {
    case 'all':
      return [...sortedRecords];
    case 'latest': {
      const lastRecord = last(sortedRecords);
      return lastRecord ? [lastRecord] : [];
    }
    case 'default': {
      const latestLabel = getLatestVersionLabel(latestVersion);
      return sortedRecords.filter((record) =>
        latestLabel === ''
          ? record.versionString === latestVersion
          : matchesVersionPrefix(record.versionString, latestLabel)
      );
    }
  }
}

/**
 * Sorts records for display: by tool name, then by the sort mode. Stable.
 */
export function sortRecords(records: ReadonlyArray<ArtifactRecord>, sortMode: SortMode): ArtifactRecord[] {
  const compareWithinTool = RECORD_COMPARATORS[sortMode];
  return [...records].sort(
    (recordA, recordB) => compareToolNames(recordA, recordB) || compareWithinTool(recordA, recordB)
  );
}

/**
 * Runs a query against the catalog.
 *
 * For each tool whose name matches a pattern, its records are ordered by version and build to find the
 * latest version, re-sorted by the sort mode, and reduced by the selection mode. The combined list is
 * ordered by tool name, then by the sort mode. Tools left without records contribute nothing.
 *
 * @param catalog - Catalog to query; not modified
 * @param options - Query parameters
 * @returns Ordered records and the latest version label per contributing tool
 */
export function queryCatalog(catalog: Catalog, options: QueryOptions): QueryResult {
  const namePattern = compileNamePatterns(options.namePatterns);
  const latestVersions = new Map<string, string>();

  const selectedRecords = chain([...catalog])
    .filter(([toolName]) => namePattern.test(toolName))
    .flatMap(([toolName, versions]) => {
      const toolRecords = expandToolRecords(toolName, versions, options.versionFilter, options.imageDirectory);
      const versionOrdered = [...toolRecords].sort(compareByVersionAndBuild);
      const latestRecord = last(versionOrdered);
      if (!latestRecord) {
        return [];
      }
      latestVersions.set(toolName, getLatestVersionLabel(latestRecord.versionString));

      const outputOrdered = versionOrdered.sort(RECORD_COMPARATORS[options.sortMode]);
      return selectToolRecords(outputOrdered, options.selection, latestRecord.versionString);
    })
    .value();

  return {
    records: sortRecords(selectedRecords, options.sortMode),
    latestVersions,
  };
}
