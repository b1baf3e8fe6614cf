import { readFileSync } from "node:fs";

/**
 * Loaders for the static CSS tables under `data/`.
 *
 * The directory sits next to `src/` and `dist/`, so the same relative URL works
 * from sources and from the build output.
 */

const DATA_DIR = new URL("../data/", import.meta.url);

const cache = new Map<string, unknown>();

function readJson(file: string): unknown {
  const cached = cache.get(file);
  if (cached !== undefined) {
    return cached;
  }
  const parsed: unknown = JSON.parse(readFileSync(new URL(file, DATA_DIR), "utf-8"));
  cache.set(file, parsed);
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new Error(`Invalid data table ${where}: expected a list of strings`);
  }
  return value.map(String);
}

function expectRecord(file: string): Record<string, unknown> {
  const value = readJson(file);
  if (!isRecord(value)) {
    throw new Error(`Invalid data table ${file}: expected an object`);
  }
  return value;
}

export function loadNumberMap(file: string): ReadonlyMap<string, number> {
  const table = expectRecord(file);
  const map = new Map<string, number>();
  for (const [key, value] of Object.entries(table)) {
    if (typeof value !== "number") {
      throw new Error(`Invalid data table ${file}#${key}: expected a number`);
    }
    map.set(key, value);
  }
  return map;
}

export function loadStringMap(file: string): ReadonlyMap<string, string> {
  const table = expectRecord(file);
  const map = new Map<string, string>();
  for (const [key, value] of Object.entries(table)) {
    if (typeof value !== "string") {
      throw new Error(`Invalid data table ${file}#${key}: expected a string`);
    }
    map.set(key, value);
  }
  return map;
}

export function loadStringListMap(file: string): ReadonlyMap<string, readonly string[]> {
  const table = expectRecord(file);
  const map = new Map<string, readonly string[]>();
  for (const [key, value] of Object.entries(table)) {
    map.set(key, expectStringList(value, `${file}#${key}`));
  }
  return map;
}

export function loadStringList(file: string): readonly string[] {
  return expectStringList(readJson(file), file);
}

export function loadStringSet(file: string, key: string): ReadonlySet<string> {
  const table = expectRecord(file);
  return new Set(expectStringList(table[key], `${file}#${key}`));
}
