/**
 * Content hashing for every generated identifier.
 *
 * MurmurHash2 (32-bit, the `murmurhash2_32_gc` variant with seed 1) over the
 * UTF-8 bytes of the input, rendered in lower-case base 36. Identical inputs
 * always give identical names across builds and machines.
 */

const MURMUR_M = 0x5bd1e995;
const SEED = 1;

const encoder = new TextEncoder();

function multiply(x: number): number {
  return (x & 0xffff) * MURMUR_M + ((((x >>> 16) * MURMUR_M) & 0xffff) << 16);
}

export function murmurhash2(input: string, seed: number = SEED): number {
  const bytes = encoder.encode(input);
  let remaining = bytes.length;
  let h = seed ^ remaining;
  let i = 0;

  while (remaining >= 4) {
    let k =
      (bytes[i] & 0xff) |
      ((bytes[i + 1] & 0xff) << 8) |
      ((bytes[i + 2] & 0xff) << 16) |
      ((bytes[i + 3] & 0xff) << 24);
    k = multiply(k);
    k ^= k >>> 24;
    k = multiply(k);
    h = multiply(h) ^ k;
    remaining -= 4;
    i += 4;
  }

  if (remaining === 3) {
    h ^= (bytes[i + 2] & 0xff) << 16;
  }
  if (remaining >= 2) {
    h ^= (bytes[i + 1] & 0xff) << 8;
  }
  if (remaining >= 1) {
    h ^= bytes[i] & 0xff;
    h = multiply(h);
  }

  h ^= h >>> 13;
  h = multiply(h);
  h ^= h >>> 15;
  return h >>> 0;
}

export function createHash(input: string): string {
  return murmurhash2(input).toString(36);
}

// ────────────────────────────────────────────────────────────────────────────
// Identifier builders
// ────────────────────────────────────────────────────────────────────────────

export interface NamingOptions {
  classNamePrefix: string;
  debugClassNames?: boolean;
}

/**
 * Atomic class name for one declaration.
 *
 * The hash input is `"<>" + property + value + modifier`, where the modifier is
 * the sorted pseudos followed by the sorted at-rules, or `"null"` when the
 * declaration is unconditional.
 */
export function atomicClassName(
  property: string,
  value: string,
  sortedPseudos: readonly string[],
  sortedAtRules: readonly string[],
  options: NamingOptions,
): string {
  const modifier = sortedPseudos.join("") + sortedAtRules.join("");
  const hash = createHash(`<>${property}${value}${modifier || "null"}`);
  if (options.debugClassNames) {
    return `${property}-${options.classNamePrefix}${hash}`;
  }
  return `${options.classNamePrefix}${hash}`;
}

export function varName(
  moduleId: string,
  namespace: string,
  name: string,
  options: NamingOptions,
): string {
  return `--${options.classNamePrefix}${createHash(`${moduleId}//${namespace}.${name}`)}`;
}

export function themeName(moduleId: string, name: string): string {
  return `t${createHash(`${moduleId}//${name}`)}`;
}

export function markerName(name: string, options: NamingOptions): string {
  return `${options.classNamePrefix}${createHash(`marker:${name}`)}`;
}

export function keyframesName(serializedFrames: string, options: NamingOptions): string {
  return `${options.classNamePrefix}${createHash(`<>${serializedFrames}`)}-B`;
}

export function positionTryName(serializedDeclarations: string, options: NamingOptions): string {
  return `--${options.classNamePrefix}${createHash(serializedDeclarations)}`;
}

export function viewTransitionName(serializedStyles: string, options: NamingOptions): string {
  return `${options.classNamePrefix}${createHash(serializedStyles)}`;
}

export function dynamicVarName(property: string, options: NamingOptions): string {
  return `--${options.classNamePrefix}-${property}`;
}
