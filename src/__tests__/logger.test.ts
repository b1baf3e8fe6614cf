import { describe, it, expect, beforeEach, vi, type MockInstance } from "vitest";
import { Logger } from "../internal/logger.js";

describe("Logger", () => {
  let writeSpy: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    Logger._clearCollected();
    vi.restoreAllMocks();
    // Suppress stdout during tests
    writeSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  describe("createReport().toString()", () => {
    it("returns empty string when no warnings", () => {
      expect(Logger.createReport().toString()).toBe("");
    });

    it("groups warnings by type, most frequent first", () => {
      Logger.logWarnings([
        { severity: "warning", type: "Definitions module registered no styles", source: "defs/a.js" },
      ]);
      Logger.logWarnings([
        { severity: "warning", type: "Manifest entry replaced by a different definition", source: "app.button" },
        { severity: "warning", type: "Manifest entry replaced by a different definition", source: "app.card" },
      ]);

      expect(Logger.createReport().toString()).toBe(
        [
          "",
          "─".repeat(60),
          "Warning Summary: 3 warning(s) in 2 category(s)",
          "─".repeat(60),
          "",
          "▸ Manifest entry replaced by a different definition (2)",
          "",
          "  app.button",
          "  app.card",
          "",
          "▸ Definitions module registered no styles (1)",
          "",
          "  defs/a.js",
        ].join("\n"),
      );
    });

    it("deduplicates sources within a category", () => {
      Logger.logWarnings([
        { severity: "warning", type: "Manifest entry replaced by a different definition", source: "app.button" },
        { severity: "warning", type: "Manifest entry replaced by a different definition", source: "app.button" },
      ]);

      const lines = Logger.createReport().toString().split("\n");
      expect(lines.filter((line) => line === "  app.button")).toHaveLength(1);
      expect(lines).toContain("▸ Manifest entry replaced by a different definition (2)");
    });

    it("labels warnings without a source as build warnings", () => {
      Logger.logWarnings([{ severity: "warning", type: "Definitions module registered no styles", source: null }]);
      expect(Logger.createReport().toString().split("\n").at(-1)).toBe("  (build)");
    });

    it("truncates long source lists", () => {
      for (let i = 0; i < 12; i++) {
        Logger.logWarnings([
          {
            severity: "warning",
            type: "Manifest entry replaced by a different definition",
            source: `app.rule${String(i).padStart(2, "0")}`,
          },
        ]);
      }
      const lines = Logger.createReport().toString().split("\n");
      expect(lines.at(-2)).toBe("  app.rule09");
      expect(lines.at(-1)).toBe("  ... and 2 more");
    });
  });

  describe("output", () => {
    it("writes warnings with their source and context", () => {
      Logger.logWarnings([
        {
          severity: "warning",
          type: "Manifest entry replaced by a different definition",
          source: "app.button",
          context: { category: "classes" },
        },
      ]);
      expect(writeSpy).toHaveBeenCalledWith(
        'Warning app.button\nManifest entry replaced by a different definition\n{\n  "category": "classes"\n}\n\n',
      );
    });

    it("writes errors prefixed with their source", () => {
      Logger.logError("Unknown option: --watch", "atomcss build");
      expect(writeSpy).toHaveBeenCalledWith("Error atomcss build\nUnknown option: --watch\n\n");
    });

    it("does not collect errors or info messages", () => {
      Logger.logError("boom", "defs.js");
      Logger.info("Wrote dist/app.css");
      expect(Logger.createReport().getWarnings()).toEqual([]);
    });

    it("prints nothing when there is nothing to report", () => {
      Logger.createReport().print();
      expect(writeSpy).not.toHaveBeenCalled();
    });
  });
});
