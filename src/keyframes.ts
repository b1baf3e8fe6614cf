import { CompileError, describeValue } from "./errors.js";
import { keyframesName, type NamingOptions } from "./hash.js";
import { ltrDeclaration, type Declaration } from "./rtl.js";
import { isConditionMap, isScalar, toCssProperty, type Scalar } from "./types.js";
import { compareStrings } from "./utils.js";
import { toCssValue, type ValueOptions } from "./value/normalize.js";

/**
 * `@keyframes` animations. The name is a hash of the frames, so identical
 * animations declared in different modules share one rule.
 */

export type KeyframeDeclarations = { readonly [property: string]: Scalar };
export type Frames = { readonly [frame: string]: KeyframeDeclarations };

export interface KeyframesEntry {
  readonly cssName: string;
  readonly ltr: string;
  readonly priority: 0;
  /** Frames in playback order with their declarations sorted by property */
  readonly frames: ReadonlyArray<readonly [frame: string, declarations: readonly Declaration[]]>;
}

const FRAME_SELECTOR = /^(?:from|to|\d+(?:\.\d+)?%)$/;

function invalidFrameKey(frame: string): CompileError {
  return new CompileError(
    `Invalid keyframe key: ${JSON.stringify(frame)}. Expected 'from', 'to', or a percentage like '50%'`,
  );
}

/** Position of a frame on the timeline; `"0%, 50%"` sorts by its first offset. */
export function frameOffset(frame: string): number {
  const parts = frame.split(",").map((part) => part.trim());
  if (parts.some((part) => !FRAME_SELECTOR.test(part))) {
    throw invalidFrameKey(frame);
  }
  const [first] = parts;
  if (first === "from") {
    return 0;
  }
  if (first === "to") {
    return 100;
  }
  return Number.parseFloat(first);
}

function frameDeclarations(
  frame: string,
  declarations: unknown,
  options: ValueOptions,
): Declaration[] {
  if (!isConditionMap(declarations)) {
    throw new CompileError(
      `Keyframe \`${frame}\` must be an object of declarations, received ${describeValue(declarations)}`,
    );
  }
  const out: Declaration[] = [];
  for (const [declared, value] of Object.entries(declarations)) {
    const property = toCssProperty(declared);
    if (!isScalar(value)) {
      throw new CompileError(
        `Keyframe \`${frame}\`: \`${property}\` must be a string or number, received ${describeValue(value)}`,
        { property },
      );
    }
    out.push({ property, value: toCssValue(value, property, options) });
  }
  return out.sort((a, b) => compareStrings(a.property, b.property));
}

function serialize(frames: ReadonlyArray<readonly [string, readonly Declaration[]]>): string {
  return frames
    .map(
      ([frame, declarations]) =>
        `${frame}{${declarations.map(({ property, value }) => `${property}:${value};`).join("")}}`,
    )
    .join("");
}

export function compileKeyframes(
  frames: Frames,
  options: NamingOptions & ValueOptions,
): KeyframesEntry {
  const compiled = Object.entries(frames).map(
    ([frame, declarations]) => [frame, frameDeclarations(frame, declarations, options)] as const,
  );
  const playback = [...compiled].sort(
    ([a], [b]) => frameOffset(a) - frameOffset(b) || compareStrings(a, b),
  );

  // The name hashes frames in key order, the rule lists them in playback order.
  const cssName = keyframesName(
    serialize([...compiled].sort(([a], [b]) => compareStrings(a, b))),
    options,
  );
  const ltrFrames = playback.map(
    ([frame, declarations]) =>
      [frame, declarations.map(({ property, value }) => ltrDeclaration(property, value))] as const,
  );
  return {
    cssName,
    ltr: `@keyframes ${cssName}{${serialize(ltrFrames)}}`,
    priority: 0,
    frames: playback,
  };
}
