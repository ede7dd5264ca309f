/**
 * @fileoverview Cache snapshot of the image catalog on local disk.
 * The snapshot is a JSON object `tool → version → variant → [filename, bytes, timestamp]`.
 */

import { differenceInMilliseconds } from 'date-fns';
import * as fs from 'fs/promises';
import * as path from 'path';

import * as log from './actions/core-wrapper';
import { addCatalogEntry } from './catalog-builder';
import { formatSnapshotTimestamp, parseSnapshotTimestamp } from './date-utils';
import { CatalogCacheError, getErrorMessage } from './errors';
import { Catalog } from './types';

/**
 * On-disk form of one catalog entry: filename, size in bytes, ISO-8601 local timestamp.
 */
type SnapshotEntry = [filename: string, sizeBytes: number, modifiedAt: string];

type CatalogSnapshot = Record<string, Record<string, Record<string, SnapshotEntry>>>;

/**
 * Location and freshness policy of the snapshot file.
 */
export type CacheSettings = {
  readonly cachePath: string;
  readonly maxAgeMs: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSnapshotEntry(value: unknown): value is SnapshotEntry {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'number' &&
    Number.isSafeInteger(value[1]) &&
    value[1] >= 0 &&
    typeof value[2] === 'string'
  );
}

/**
 * Serializes a catalog into its snapshot form.
 */
export function catalogToSnapshot(catalog: Catalog): CatalogSnapshot {
  const snapshot: CatalogSnapshot = {};
  for (const [toolName, versions] of catalog) {
    const snapshotVersions: CatalogSnapshot[string] = {};
    for (const [versionString, variants] of versions) {
      const snapshotVariants: Record<string, SnapshotEntry> = {};
      for (const [variantString, entry] of variants) {
        snapshotVariants[variantString] = [entry.filename, entry.sizeBytes, formatSnapshotTimestamp(entry.modifiedAt)];
      }
      snapshotVersions[versionString] = snapshotVariants;
    }
    snapshot[toolName] = snapshotVersions;
  }
  return snapshot;
}

/**
 * Rebuilds a catalog from parsed snapshot JSON, validating every level.
 *
 * @throws {CatalogCacheError} If the value is not a well-formed snapshot
 */
export function snapshotToCatalog(snapshot: unknown): Catalog {
  if (!isRecord(snapshot)) {
    throw new CatalogCacheError('Cache snapshot is not a JSON object');
  }

  const catalog: Catalog = new Map();
  for (const [toolName, versions] of Object.entries(snapshot)) {
    if (!isRecord(versions)) {
      throw new CatalogCacheError(`Invalid versions for tool '${toolName}' in cache snapshot`);
    }
    for (const [versionString, variants] of Object.entries(versions)) {
      if (!isRecord(variants)) {
        throw new CatalogCacheError(`Invalid variants for ${toolName}:${versionString} in cache snapshot`);
      }
      for (const [variantString, snapshotEntry] of Object.entries(variants)) {
        if (!isSnapshotEntry(snapshotEntry)) {
          throw new CatalogCacheError(
            `Invalid entry for ${toolName}:${versionString} variant '${variantString}' in cache snapshot`
          );
        }
        const [filename, sizeBytes, storedTimestamp] = snapshotEntry;
        const modifiedAt = parseSnapshotTimestamp(storedTimestamp);
        if (!modifiedAt) {
          throw new CatalogCacheError(`Invalid timestamp '${storedTimestamp}' for ${filename} in cache snapshot`);
        }
        addCatalogEntry(catalog, toolName, versionString, variantString, { filename, sizeBytes, modifiedAt });
      }
    }
  }
  return catalog;
}

export class CacheManager {
  constructor(private readonly settings: CacheSettings) {}

  get cachePath(): string {
    return this.settings.cachePath;
  }

  /**
   * Tells whether a snapshot exists and was written less than the maximum age before `now`.
   *
   * @param now - Reference time for the age check
   * @returns Promise resolving to false when the snapshot is missing or stale
   */
  async isFresh(now: Date = new Date()): Promise<boolean> {
    try {
      const snapshotStats = await fs.stat(this.settings.cachePath);
      return differenceInMilliseconds(now, snapshotStats.mtime) < this.settings.maxAgeMs;
    } catch (error) {
      log.debug(`No usable cache snapshot at ${this.settings.cachePath}: ${getErrorMessage(error)}`);
      return false;
    }
  }

  /**
   * Loads the catalog from the snapshot file.
   *
   * @returns Promise resolving to the catalog, or undefined if no snapshot exists
   * @throws {CatalogCacheError} If the snapshot cannot be read or is not a valid catalog
   */
  async restore(): Promise<Catalog | undefined> {
    let snapshotJson: string;
    try {
      snapshotJson = await fs.readFile(this.settings.cachePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw new CatalogCacheError(`Failed to read cache ${this.settings.cachePath}: ${getErrorMessage(error)}`);
    }

    let snapshot: unknown;
    try {
      snapshot = JSON.parse(snapshotJson);
    } catch (error) {
      throw new CatalogCacheError(`Cache ${this.settings.cachePath} is not valid JSON: ${getErrorMessage(error)}`);
    }
    return snapshotToCatalog(snapshot);
  }

  /**
   * Writes the catalog to the snapshot file, creating its directory when needed.
   * Failures are logged rather than thrown so the current catalog stays usable.
   *
   * @returns Promise resolving to true if the snapshot was written
   */
  async save(catalog: Catalog): Promise<boolean> {
    try {
      await fs.mkdir(path.dirname(this.settings.cachePath), { recursive: true });
      await fs.writeFile(this.settings.cachePath, JSON.stringify(catalogToSnapshot(catalog)));
      log.debug(`Cache saved to ${this.settings.cachePath}`);
      return true;
    } catch (error) {
      log.warning(`Failed to save cache to ${this.settings.cachePath}: ${getErrorMessage(error)}`);
      return false;
    }
  }
}

// fs errors may come from another realm, so match on shape rather than `instanceof Error`
function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
