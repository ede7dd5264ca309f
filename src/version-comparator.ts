/**
 * @fileoverview Version ordering for image filenames.
 * Numeric version components compare numerically (`1.9` < `1.10`), all others lexically.
 */

/**
 * Width numeric version components are padded to, so that lexical order equals numeric order.
 */
const NUMERIC_COMPONENT_WIDTH = 10;

/**
 * Maximum number of numeric components kept in a latest-version label.
 */
const LATEST_LABEL_COMPONENTS = 3;

const DIGITS_ONLY = /^\d+$/;
const LEADING_DIGITS = /^\d+/;
const LEADING_ZEROS = /^0+(?=\d)/;

/**
 * Build number and label carried by a variant suffix such as `h87a2e9c_2`.
 */
export type VariantInfo = {
  readonly buildNumber: number;
  readonly variantLabel: string;
};

function toSortableComponent(component: string): string {
  if (!DIGITS_ONLY.test(component)) {
    return component;
  }
  const significantDigits = component.replace(LEADING_ZEROS, '');
  return significantDigits.padStart(NUMERIC_COMPONENT_WIDTH, '0');
}

/**
 * Converts a dotted version string into a key whose element-wise order is the version order.
 * Purely numeric components lose their leading zeros and are zero-padded to at least ten digits;
 * other components are kept as they are.
 *
 * @param versionString - Raw version, e.g. `1.10.rc1`
 * @returns Sortable key, e.g. `['0000000001', '0000000010', 'rc1']`
 */
export function getSortableVersionKey(versionString: string): string[] {
  return versionString.split('.').map(toSortableComponent);
}

/**
 * Compares two sortable version keys element by element.
 * Numeric components wider than the padding compare by digit count first.
 * A key that is a prefix of a longer key sorts first.
 */
export function compareVersionKeys(keyA: ReadonlyArray<string>, keyB: ReadonlyArray<string>): number {
  const sharedLength = Math.min(keyA.length, keyB.length);
  for (let index = 0; index < sharedLength; index++) {
    const componentA = keyA[index];
    const componentB = keyB[index];
    if (DIGITS_ONLY.test(componentA) && DIGITS_ONLY.test(componentB) && componentA.length !== componentB.length) {
      return componentA.length - componentB.length;
    }
    if (componentA < componentB) return -1;
    if (componentA > componentB) return 1;
  }
  return keyA.length - keyB.length;
}

/**
 * Compares two raw version strings. Keys are derived fresh on every call.
 */
export function compareVersions(versionA: string, versionB: string): number {
  return compareVersionKeys(getSortableVersionKey(versionA), getSortableVersionKey(versionB));
}

function leadingBuildNumber(value: string): number {
  const digits = LEADING_DIGITS.exec(value);
  return digits ? Number.parseInt(digits[0], 10) : 0;
}

/**
 * Extracts the build number and variant label from a variant suffix.
 *
 * - `label_12` → label `label`, build 12
 * - `12` → build 12, no label
 * - `label` → label `label`, build 0
 * - `a_b_3` → label `a_b`, build 3
 *
 * The build number is always the leading digit run of its part; 0 when there is none.
 */
export function parseVariantString(variantString: string): VariantInfo {
  if (variantString === '') {
    return { buildNumber: 0, variantLabel: '' };
  }

  const parts = variantString.split('_');
  if (parts.length === 1) {
    return LEADING_DIGITS.test(variantString)
      ? { buildNumber: leadingBuildNumber(variantString), variantLabel: '' }
      : { buildNumber: 0, variantLabel: variantString };
  }

  const buildPart = parts[parts.length - 1];
  return {
    buildNumber: leadingBuildNumber(buildPart),
    variantLabel: parts.slice(0, -1).join('_'),
  };
}

/**
 * Reduces a version to the label reported as a tool's latest version:
 * its leading purely-numeric components, at most three of them.
 *
 * @param versionString - Raw version, e.g. `1.2.rglab` or `2.0.1.4`
 * @returns Label, e.g. `1.2` or `2.0.1`; empty when the version does not start with a number
 */
export function getLatestVersionLabel(versionString: string): string {
  const numericComponents: string[] = [];
  for (const component of versionString.split('.')) {
    if (!DIGITS_ONLY.test(component) || numericComponents.length === LATEST_LABEL_COMPONENTS) {
      break;
    }
    numericComponents.push(component);
  }
  return numericComponents.join('.');
}

/**
 * Tells whether a version equals a prefix or extends it after a dot (`1.2` covers `1.2.1` but not `1.20`).
 */
export function matchesVersionPrefix(versionString: string, prefix: string): boolean {
  return versionString === prefix || versionString.startsWith(`${prefix}.`);
}
