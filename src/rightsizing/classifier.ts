/**
 * SKU name classification.
 *
 * Names follow `Standard_<Family><Subfamily><vCPUs><Features>[_<Accelerator>]_v<N>`,
 * with older series omitting the version suffix and some newer ones writing it
 * inline (`Standard_Dpsv5`). Every function here is total and pure.
 */

const SKU_PREFIX = 'Standard_';

const GENERATION_PATTERNS: RegExp[] = [
  /_v(\d+)$/,          // Standard_D4s_v5
  /_v(\d+)_/,          // Standard_NC4as_T4_v3_Promo
  /[a-z]v(\d+)$/i,     // Standard_Dpsv5, Standard_B2psv2
];

/** Series that predate the version suffix */
const LEGACY_NAME = /^Standard_(DS|D[1-9]|A\d|B\d+[ms]*|F\d+s?)$/i;

const ANY_VERSION = /v(\d+)/i;

const TWO_LETTER_FAMILIES = new Set(['DC', 'EC', 'NC', 'ND', 'NV', 'HB', 'HC', 'HX', 'FX', 'EB']);

/**
 * Hardware generation label of a SKU name, e.g. `"v5"`. Unversioned names are `"v1"`.
 */
export function extractGeneration(name: string): string {
  for (const pattern of GENERATION_PATTERNS) {
    const match = pattern.exec(name);
    if (match) return `v${match[1]}`;
  }

  if (LEGACY_NAME.test(name)) return 'v1';

  const loose = ANY_VERSION.exec(name);
  if (loose) return `v${loose[1]}`;

  return 'v1';
}

/**
 * Family code of a SKU name: a known two-letter subfamily (`DC`, `NC`, ...)
 * or the first letter. Empty for names that do not start with `Standard_<A-Z>`.
 */
export function extractFamily(name: string): string {
  const match = /^Standard_([A-Z]+)/.exec(name);
  if (!match) return '';

  const letters = match[1];
  if (letters.length >= 2 && TWO_LETTER_FAMILIES.has(letters.slice(0, 2))) {
    return letters.slice(0, 2);
  }
  return letters[0];
}

/**
 * Numeric version of either a generation label (`"v5"`, `"V1,V2"`) or a raw
 * SKU name. Multi-value labels yield their maximum; unknown input yields 1.
 */
export function extractVersionNumber(input: string): number {
  if (input.startsWith(SKU_PREFIX)) {
    return getSkuVersion(input);
  }

  const versions = [...input.matchAll(/v(\d+)/gi)].map(m => parseInt(m[1], 10));
  return versions.length > 0 ? Math.max(...versions) : 1;
}

/**
 * Hardware revision of a SKU name. Not the hypervisor generation (V1/V2 boot type).
 */
export function getSkuVersion(name: string): number {
  const match = ANY_VERSION.exec(extractGeneration(name));
  return match ? parseInt(match[1], 10) : 1;
}

export function isBurstable(name: string): boolean {
  return name.startsWith(`${SKU_PREFIX}B`);
}
