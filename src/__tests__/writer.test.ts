import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CSS_PLACEHOLDER, injectCss, writeCss } from "../css/writer.js";
import { Logger } from "../internal/logger.js";

describe("injectCss", () => {
  beforeEach(() => {
    Logger._clearCollected();
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  it("replaces the placeholder", () => {
    const input = `body{margin:0}\n${CSS_PLACEHOLDER}\nmain{padding:0}\n`;
    expect(injectCss(input, ".x1{color:red}")).toBe("body{margin:0}\n.x1{color:red}\nmain{padding:0}\n");
    expect(Logger.createReport().getWarnings()).toEqual([]);
  });

  it("replaces only the first placeholder", () => {
    expect(injectCss(`${CSS_PLACEHOLDER}${CSS_PLACEHOLDER}`, ".x1{}")).toBe(`.x1{}${CSS_PLACEHOLDER}`);
  });

  it("appends after a blank line and warns without a placeholder", () => {
    expect(injectCss("body{margin:0}", ".x1{}", "src/app.css")).toBe("body{margin:0}\n\n.x1{}");
    expect(injectCss("body{margin:0}\n", ".x1{}")).toBe("body{margin:0}\n\n.x1{}");
    expect(injectCss("", ".x1{}")).toBe(".x1{}");
    expect(Logger.createReport().getWarnings()[0]).toEqual({
      severity: "warning",
      type: 'Stylesheet placeholder `@import "atomcss";` not found, appending generated CSS',
      source: "src/app.css",
    });
  });
});

describe("writeCss", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "atomcss-writer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates missing directories and ends the file with a newline", async () => {
    const path = join(dir, "dist", "css", "app.css");
    expect(await writeCss(path, ".x1{color:red}")).toBe("written");
    expect(await readFile(path, "utf8")).toBe(".x1{color:red}\n");
  });

  it("leaves an identical file alone", async () => {
    const path = join(dir, "app.css");
    await writeCss(path, ".x1{color:red}");
    expect(await writeCss(path, ".x1{color:red}\n")).toBe("unchanged");
    expect(await writeCss(path, ".x1{color:blue}")).toBe("written");
    expect(await readFile(path, "utf8")).toBe(".x1{color:blue}\n");
  });
});
