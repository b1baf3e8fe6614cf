import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Logger } from "../internal/logger.js";

export const CSS_PLACEHOLDER = '@import "atomcss";';

export type WriteResult = "written" | "unchanged";

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Writes the stylesheet unless the file already holds exactly this content,
 * so watchers downstream are not woken by no-op builds.
 */
export async function writeCss(path: string, css: string): Promise<WriteResult> {
  const content = css.endsWith("\n") ? css : `${css}\n`;
  if ((await readIfExists(path)) === content) {
    return "unchanged";
  }
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf8");
  return "written";
}

/**
 * Replaces the `@import "atomcss";` placeholder of a host stylesheet with the
 * generated CSS. Without a placeholder the CSS is appended.
 */
export function injectCss(input: string, css: string, source: string | null = null): string {
  const index = input.indexOf(CSS_PLACEHOLDER);
  if (index === -1) {
    Logger.logWarnings([
      {
        severity: "warning",
        type: 'Stylesheet placeholder `@import "atomcss";` not found, appending generated CSS',
        source,
      },
    ]);
    const separator = input === "" || input.endsWith("\n") ? "" : "\n";
    return `${input}${separator}${input === "" ? "" : "\n"}${css}`;
  }
  return `${input.slice(0, index)}${css}${input.slice(index + CSS_PLACEHOLDER.length)}`;
}
