/**
 * @fileoverview Presentation of query results.
 * Renders artifact records as paths, a long listing, or JSON, and reports query statistics.
 */

import * as log from './actions/core-wrapper';
import { formatListingTimestamp, formatSnapshotTimestamp } from './date-utils';
import { formatFileSize } from './file-utils';
import { QueryResult } from './query-engine';
import { ArtifactRecord } from './types';

/**
 * How records are rendered on standard output.
 */
export type OutputFormat = 'paths' | 'long' | 'json';

/**
 * JSON form of an artifact record.
 */
export type SerializedArtifactRecord = {
  readonly path: string;
  readonly tool: string;
  readonly version: string;
  readonly variant: string;
  readonly build: number;
  readonly variantLabel: string;
  readonly sizeBytes: number;
  readonly modified: string;
};

/**
 * Converts a record into its JSON output form.
 */
export function serializeRecord(record: ArtifactRecord): SerializedArtifactRecord {
  return {
    path: record.path,
    tool: record.toolName,
    version: record.versionString,
    variant: record.variantString,
    build: record.buildNumber,
    variantLabel: record.variantLabel,
    sizeBytes: record.sizeBytes,
    modified: formatSnapshotTimestamp(record.modifiedAt),
  };
}

/**
 * Renders records as output lines.
 *
 * - paths: one path per line
 * - long: modification time, human-readable size and path, tab separated
 * - json: a single pretty-printed JSON array
 */
export function renderRecords(records: ReadonlyArray<ArtifactRecord>, outputFormat: OutputFormat): string[] {
  switch (outputFormat) {
    case 'paths':
      return records.map((record) => record.path);
    case 'long':
      return records.map(
        (record) => `${formatListingTimestamp(record.modifiedAt)}\t${formatFileSize(record.sizeBytes)}\t${record.path}`
      );
    case 'json':
      return [JSON.stringify(records.map(serializeRecord), null, 2)];
  }
}

/**
 * Logs the latest version detected for every tool that contributed records, in tool name order.
 */
export function logLatestVersions(latestVersions: QueryResult['latestVersions']): void {
  const toolNames = [...latestVersions.keys()].sort();
  for (const toolName of toolNames) {
    const latestVersion = latestVersions.get(toolName) || 'unknown';
    log.info(`Latest version of ${toolName}: ${latestVersion}`);
  }
}

/**
 * Writes the query result to standard output.
 * Informational lines are suppressed when quiet; the records themselves always are written.
 */
export function writeQueryResult(result: QueryResult, outputFormat: OutputFormat, quiet: boolean): void {
  if (!quiet) {
    logLatestVersions(result.latestVersions);
    if (result.records.length === 0) {
      log.info('No images matched the query');
    } else {
      log.info(`${result.records.length} images found`);
    }
  }

  for (const outputLine of renderRecords(result.records, outputFormat)) {
    log.info(outputLine);
  }
}
