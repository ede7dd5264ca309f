/**
 * @fileoverview File size formatting for image listings.
 */

/**
 * File size formatting units.
 */
const FILE_SIZE_UNITS = ['Bytes', 'KB', 'MB', 'GB', 'TB', 'PB'] as const;

/**
 * File size calculation base.
 */
const FILE_SIZE_BASE = 1024;

/**
 * Formats a file size in bytes to a human-readable string.
 *
 * @param fileSizeBytes - Size in bytes.
 * @returns Human-readable size string (e.g. "10.5 MB").
 */
export function formatFileSize(fileSizeBytes: number): string {
  if (fileSizeBytes === 0) {
    return '0 Bytes';
  }

  const rawUnitIndex = Math.floor(Math.log(fileSizeBytes) / Math.log(FILE_SIZE_BASE));
  const safeUnitIndex = Math.min(rawUnitIndex, FILE_SIZE_UNITS.length - 1);
  const sizeUnit = FILE_SIZE_UNITS[safeUnitIndex] ?? FILE_SIZE_UNITS[0];

  const scaledSize = fileSizeBytes / Math.pow(FILE_SIZE_BASE, safeUnitIndex);
  return `${scaledSize.toFixed(2).replace(/\.0+$|(\.[0-9]*[1-9])0+$/, '$1')} ${sizeUnit}`;
}
