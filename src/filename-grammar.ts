/**
 * @fileoverview Filename grammar for published image files.
 * Splits names such as `samtools:1.2--h87a2e9c_2` into tool, version and variant.
 */

/**
 * Outcome of matching one filename against the grammar.
 */
export type FilenameMatch =
  | {
      readonly matched: true;
      readonly toolName: string;
      readonly versionString: string;
      readonly variantString: string;
    }
  | { readonly matched: false };

/**
 * A single grammar rule. Returns a match or `{ matched: false }` so rules can be chained.
 */
type FilenameMatcher = (filename: string) => FilenameMatch;

const NO_MATCH: FilenameMatch = { matched: false };

/**
 * Builds a matcher from a pattern whose groups are tool, version and (optionally) variant.
 */
function patternMatcher(pattern: RegExp): FilenameMatcher {
  return (filename) => {
    const groups = pattern.exec(filename);
    if (!groups) {
      return NO_MATCH;
    }
    const [, toolName = '', versionString = '', variantString = ''] = groups;
    return { matched: true, toolName, versionString, variantString };
  };
}

/**
 * Grammar rules, most specific first. The tool name capture is greedy.
 */
const FILENAME_MATCHERS: ReadonlyArray<FilenameMatcher> = [
  // tool:version--variant
  patternMatcher(/^(.+):(.+?)--(.+)$/i),
  // tool:version-build
  patternMatcher(/^(.+):(.+)-(\d+)$/i),
  // tool:version
  patternMatcher(/^(.+):(.+)$/i),
];

/**
 * Parses an image filename into its tool name, version and variant.
 * The first rule that matches wins.
 *
 * @param filename - Bare filename as it appears in the listing.
 * @returns The captured fields, or `{ matched: false }` when no rule applies.
 */
export function parseImageFilename(filename: string): FilenameMatch {
  for (const matchFilename of FILENAME_MATCHERS) {
    const result = matchFilename(filename);
    if (result.matched) {
      return result;
    }
  }
  return NO_MATCH;
}
