/**
 * @fileoverview Builds the image catalog from listing lines.
 * Lines that cannot be parsed are dropped; the scan always runs to the end of the listing.
 */

import { parseListingTimestamp } from './date-utils';
import { parseImageFilename } from './filename-grammar';
import { Catalog, CatalogEntry } from './types';

/**
 * Minimum number of whitespace-separated fields in a listing line.
 */
const MIN_LISTING_FIELDS = 4;

const NON_NEGATIVE_INTEGER = /^\d+$/;

/**
 * One listing line resolved into catalog keys and metadata.
 */
export type ParsedListingLine = {
  readonly toolName: string;
  readonly versionString: string;
  readonly variantString: string;
  readonly entry: CatalogEntry;
};

/**
 * Parses a listing line of the form `<filename> <bytes> <YYYY-MM-DD> <HH:MM:SS[.fraction]>`.
 *
 * @param line - Raw listing line
 * @returns The parsed line, or undefined if any field is malformed or the filename matches no grammar rule
 */
export function parseListingLine(line: string): ParsedListingLine | undefined {
  const fields = line.trim().split(/\s+/);
  if (fields.length < MIN_LISTING_FIELDS) {
    return undefined;
  }

  const [filename, sizeField, dateField, timeField] = fields;
  if (!NON_NEGATIVE_INTEGER.test(sizeField)) {
    return undefined;
  }
  const sizeBytes = Number.parseInt(sizeField, 10);
  if (!Number.isSafeInteger(sizeBytes)) {
    return undefined;
  }

  const modifiedAt = parseListingTimestamp(dateField, timeField);
  if (!modifiedAt) {
    return undefined;
  }

  const filenameMatch = parseImageFilename(filename);
  if (!filenameMatch.matched) {
    return undefined;
  }

  return {
    toolName: filenameMatch.toolName,
    versionString: filenameMatch.versionString,
    variantString: filenameMatch.variantString,
    entry: { filename, sizeBytes, modifiedAt },
  };
}

/**
 * Inserts an entry at `catalog[tool][version][variant]`, replacing any entry already there.
 */
export function addCatalogEntry(
  catalog: Catalog,
  toolName: string,
  versionString: string,
  variantString: string,
  entry: CatalogEntry
): void {
  let versions = catalog.get(toolName);
  if (!versions) {
    versions = new Map();
    catalog.set(toolName, versions);
  }
  let variants = versions.get(versionString);
  if (!variants) {
    variants = new Map();
    versions.set(versionString, variants);
  }
  variants.set(variantString, entry);
}

/**
 * Consumes a full listing and builds the catalog from it.
 * When two lines resolve to the same tool, version and variant, the later line wins.
 *
 * @param lines - Listing lines, read once
 * @returns The completed catalog
 */
export async function buildCatalog(lines: AsyncIterable<string> | Iterable<string>): Promise<Catalog> {
  const catalog: Catalog = new Map();
  for await (const line of lines) {
    const parsedLine = parseListingLine(line);
    if (parsedLine) {
      addCatalogEntry(catalog, parsedLine.toolName, parsedLine.versionString, parsedLine.variantString, parsedLine.entry);
    }
  }
  return catalog;
}
