/**
 * @fileoverview Supplies the catalog for one invocation: from a fresh cache snapshot when possible,
 * otherwise by rebuilding it from the listing and writing a new snapshot.
 */

import * as log from './actions/core-wrapper';
import { CacheManager } from './cache-manager';
import { buildCatalog } from './catalog-builder';
import { formatTimeBetween } from './date-utils';
import { CatalogCacheError } from './errors';
import { ListingSource } from './listing-source';
import { Catalog, countCatalogEntries } from './types';

export type CatalogRequest = {
  readonly cacheManager: CacheManager;
  /** Opens the listing; only called when a rebuild is needed. */
  readonly openListing: () => ListingSource;
  /** Skip the freshness check and always rebuild. */
  readonly refresh: boolean;
  readonly quiet: boolean;
  readonly now?: Date;
};

/**
 * Where the returned catalog came from.
 */
export type CatalogOrigin = 'cache' | 'listing';

export type CatalogResult = {
  readonly catalog: Catalog;
  readonly origin: CatalogOrigin;
};

async function restoreFreshCatalog(request: CatalogRequest): Promise<Catalog | undefined> {
  if (request.refresh || !(await request.cacheManager.isFresh(request.now))) {
    return undefined;
  }
  try {
    return await request.cacheManager.restore();
  } catch (error) {
    if (error instanceof CatalogCacheError) {
      log.warning(`${error.message}; rebuilding catalog`);
      return undefined;
    }
    throw error;
  }
}

/**
 * Loads the catalog from cache if fresh, else rebuilds it from the listing and saves it.
 * A failed save is logged and does not affect the returned catalog.
 *
 * @throws {ListingError} If a rebuild is needed and the listing cannot be read
 */
export async function getCatalog(request: CatalogRequest): Promise<CatalogResult> {
  const cachedCatalog = await restoreFreshCatalog(request);
  if (cachedCatalog) {
    log.debug(`Catalog loaded from ${request.cacheManager.cachePath}`);
    return { catalog: cachedCatalog, origin: 'cache' };
  }

  const listingSource = request.openListing();
  if (!request.quiet) {
    log.info(`Building image catalog from ${listingSource.description}`);
  }

  const buildStartTime = performance.now();
  const catalog = await buildCatalog(listingSource.lines);
  const buildEndTime = performance.now();

  if (!request.quiet) {
    const buildDuration = formatTimeBetween(buildStartTime, buildEndTime) || 'less than a second';
    log.info(`Catalogued ${countCatalogEntries(catalog)} images of ${catalog.size} tools in ${buildDuration}`);
  }

  await request.cacheManager.save(catalog);
  return { catalog, origin: 'listing' };
}
