/**
 * @fileoverview Sources of listing lines for the catalog builder.
 * A repository mounted locally is scanned directly; otherwise the published listing file is downloaded.
 */

import * as fs from 'fs';
import * as fsPromises from 'fs/promises';
import * as path from 'path';

import * as log from './actions/core-wrapper';
import { formatListingTimestamp } from './date-utils';
import { getErrorMessage, ListingError } from './errors';

/**
 * A finite sequence of raw listing lines, `<filename> <bytes> <date> <time>`. Read once.
 */
export type ListingLines = AsyncIterable<string>;

/**
 * Where listing lines can be obtained from.
 */
export type ListingSourceOptions = {
  /** Directory holding the image files, if mounted locally. */
  readonly imageDirectory: string;
  /** URL of the published listing file, used when the directory is absent. */
  readonly listUrl?: string;
  /** HTTP client, replaceable for tests. */
  readonly fetchListing?: typeof fetch;
};

/**
 * Describes the source a listing was read from, for informational output.
 */
export type ListingSource = {
  readonly description: string;
  readonly lines: ListingLines;
};

/**
 * Scans a directory and yields one listing line per regular file, including symlinks to regular files.
 * Broken links and links to directories are skipped.
 *
 * @param imageDirectory - Directory to scan
 * @returns Listing lines in the format produced for the published listing file
 * @throws {ListingError} If the directory cannot be read
 */
export async function* readDirectoryListing(imageDirectory: string): ListingLines {
  let directoryEntries: fs.Dirent[];
  try {
    directoryEntries = await fsPromises.readdir(imageDirectory, { withFileTypes: true });
  } catch (error) {
    throw new ListingError(`Failed to read image directory ${imageDirectory}: ${getErrorMessage(error)}`);
  }

  for (const directoryEntry of directoryEntries) {
    if (!directoryEntry.isFile() && !directoryEntry.isSymbolicLink()) {
      continue;
    }
    const entryPath = path.join(imageDirectory, directoryEntry.name);
    // stat follows symlinks, so linked images report their target's size and time
    let entryStats: fs.Stats;
    try {
      entryStats = await fsPromises.stat(entryPath);
    } catch (error) {
      log.debug(`Skipping ${entryPath}: ${getErrorMessage(error)}`);
      continue;
    }
    if (entryStats.isFile()) {
      yield `${directoryEntry.name} ${entryStats.size} ${formatListingTimestamp(entryStats.mtime)}`;
    }
  }
}

/**
 * Downloads a listing file and yields its lines.
 *
 * @param listUrl - URL of the listing file
 * @param fetchListing - HTTP client to use
 * @throws {ListingError} If the request fails or returns a non-success status
 */
export async function* readRemoteListing(listUrl: string, fetchListing: typeof fetch = fetch): ListingLines {
  let listingText: string;
  try {
    const response = await fetchListing(listUrl);
    if (!response.ok) {
      throw new Error(`${response.status} ${response.statusText}`);
    }
    listingText = await response.text();
  } catch (error) {
    throw new ListingError(`Failed to download listing from ${listUrl}: ${getErrorMessage(error)}`);
  }

  yield* listingText.split(/\r?\n/);
}

/**
 * Picks the listing source: the local directory when it exists, otherwise the listing URL.
 *
 * @throws {ListingError} If neither is available
 */
export function openListingSource(options: ListingSourceOptions): ListingSource {
  if (fs.existsSync(options.imageDirectory)) {
    return {
      description: `directory ${options.imageDirectory}`,
      lines: readDirectoryListing(options.imageDirectory),
    };
  }

  if (options.listUrl) {
    return {
      description: options.listUrl,
      lines: readRemoteListing(options.listUrl, options.fetchListing),
    };
  }

  throw new ListingError(
    `Image directory ${options.imageDirectory} does not exist and no listing URL is configured`
  );
}
