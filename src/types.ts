/**
 * @fileoverview Shared data model for the image catalog.
 */

/**
 * Metadata kept for one image file in the catalog.
 */
export type CatalogEntry = {
  readonly filename: string;
  readonly sizeBytes: number;
  readonly modifiedAt: Date;
};

/**
 * Variants of one tool version, keyed by the raw variant string.
 */
export type VariantMap = Map<string, CatalogEntry>;

/**
 * Versions of one tool, keyed by the raw version string.
 */
export type VersionMap = Map<string, VariantMap>;

/**
 * Three-level index of every known image: tool → version → variant → entry.
 * Iteration order carries no meaning; ordering is applied at query time.
 */
export type Catalog = Map<string, VersionMap>;

/**
 * One concrete image file as presented to the user.
 */
export type ArtifactRecord = {
  readonly toolName: string;
  readonly versionString: string;
  readonly variantString: string;
  readonly buildNumber: number;
  readonly variantLabel: string;
  readonly sizeBytes: number;
  readonly modifiedAt: Date;
  readonly path: string;
};

/**
 * Which records of a tool a query returns.
 * - default: every record of the tool's latest version
 * - latest: the single last record after sorting
 * - all: every record
 */
export type SelectionMode = 'default' | 'latest' | 'all';

/**
 * Ordering applied to query results.
 */
export type SortMode = 'version' | 'modified' | 'size';

/**
 * Counts every image entry in a catalog.
 */
export function countCatalogEntries(catalog: Catalog): number {
  let entryCount = 0;
  for (const versions of catalog.values()) {
    for (const variants of versions.values()) {
      entryCount += variants.size;
    }
  }
  return entryCount;
}
