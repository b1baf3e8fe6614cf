import { isConditionMap, type ConditionMap, type StyleValue } from "../types.js";

/**
 * Range-bounding of sibling `min-width` / `max-width` media queries so that at
 * most one of them matches at a time and source order never decides the winner.
 *
 * ```
 * { "@media (min-width: 1000px)": a, "@media (min-width: 2000px)": b }
 * → { "@media (min-width: 1000px) and (max-width: 1999.99px)": a,
 *     "@media (min-width: 2000px)": b }
 * ```
 */

const MIN_WIDTH = /@media\s*\(min-width:\s*(\d+(?:\.\d+)?)(px|em|rem)\)/;
const MAX_WIDTH = /@media\s*\(max-width:\s*(\d+(?:\.\d+)?)(px|em|rem)\)/;

interface WidthQuery {
  key: string;
  value: number;
  unit: string;
}

function formatBound(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return value.toFixed(2).replace(/0+$/, "").replace(/\.$/, "");
}

function parseWidthQuery(key: string, pattern: RegExp): WidthQuery | null {
  const match = pattern.exec(key);
  if (!match) {
    return null;
  }
  return { key, value: Number(match[1]), unit: match[2] };
}

function minWidthRenames(queries: WidthQuery[]): Map<string, string> {
  const renames = new Map<string, string>();
  if (queries.length < 2) {
    return renames;
  }
  const sorted = [...queries].sort((a, b) => a.value - b.value);
  for (let i = 0; i < sorted.length - 1; i++) {
    const { key, value, unit } = sorted[i];
    const upper = sorted[i + 1].value - 0.01;
    renames.set(
      key,
      `@media (min-width: ${formatBound(value)}${unit}) and (max-width: ${formatBound(upper)}${unit})`,
    );
  }
  return renames;
}

function maxWidthRenames(queries: WidthQuery[]): Map<string, string> {
  const renames = new Map<string, string>();
  if (queries.length < 2) {
    return renames;
  }
  const sorted = [...queries].sort((a, b) => b.value - a.value);
  for (let i = 0; i < sorted.length - 1; i++) {
    const { key, value, unit } = sorted[i];
    const lower = sorted[i + 1].value + 0.01;
    renames.set(
      key,
      `@media (min-width: ${formatBound(lower)}${unit}) and (max-width: ${formatBound(value)}${unit})`,
    );
  }
  return renames;
}

export function lastMediaQueryWins(conditions: ConditionMap): ConditionMap {
  const mediaKeys = Object.keys(conditions).filter((key) => key.startsWith("@media "));
  const renames = new Map<string, string>();
  if (mediaKeys.length >= 2) {
    const mins: WidthQuery[] = [];
    const maxes: WidthQuery[] = [];
    for (const key of mediaKeys) {
      const min = parseWidthQuery(key, MIN_WIDTH);
      if (min) {
        mins.push(min);
        continue;
      }
      const max = parseWidthQuery(key, MAX_WIDTH);
      if (max) {
        maxes.push(max);
      }
    }
    for (const [from, to] of [...minWidthRenames(mins), ...maxWidthRenames(maxes)]) {
      renames.set(from, to);
    }
  }

  const out: Record<string, StyleValue | undefined> = {};
  for (const [key, value] of Object.entries(conditions)) {
    out[renames.get(key) ?? key] = isConditionMap(value) ? lastMediaQueryWins(value) : value;
  }
  return out;
}
