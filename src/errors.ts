/**
 * @fileoverview Error types raised at the boundaries of the image finder.
 * Malformed listing lines never raise; only whole-source failures do.
 */

/**
 * Error codes for image finder failures.
 */
export type ErrorCode =
  | 'LISTING_UNAVAILABLE' // neither a local directory nor a listing URL could be read
  | 'CACHE_INVALID' // cache snapshot unreadable or not a catalog
  | 'CONFIG_INVALID'; // configuration file or variable missing or malformed

/**
 * Base class for image finder errors. Enables typed handling via `error.code`.
 */
export class ImageFinderError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ImageFinderError';
  }
}

export class ListingError extends ImageFinderError {
  constructor(message: string) {
    super('LISTING_UNAVAILABLE', message);
    this.name = 'ListingError';
  }
}

export class CatalogCacheError extends ImageFinderError {
  constructor(message: string) {
    super('CACHE_INVALID', message);
    this.name = 'CatalogCacheError';
  }
}

export class ConfigError extends ImageFinderError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

/**
 * Safely extracts an error message from an unknown type.
 * @param error - The error object or value caught.
 * @returns A string representation of the error message.
 */
export function getErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error ?? 'Unknown error');
}
