import { describe, it, expect } from "vitest";
import { resolveConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { expandToLonghands, keepShorthands } from "../shorthand/index.js";

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    expect(resolveConfig()).toEqual({
      classNamePrefix: "x",
      shorthandStrategy: keepShorthands,
      shorthandOptions: {},
      autoprefixer: false,
      useCssLayers: false,
      debugClassNames: false,
      fontSizePxToRem: false,
      fontSizeRootPx: 16,
      validateProperties: true,
      unknownPropertyLevel: "warn",
      vendorPrefixLevel: "warn",
      deprecatedPropertyLevel: "warn",
    });
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(resolveConfig({ useCssLayers: true }))).toBe(true);
  });

  it("resolves the shorthand strategy setting", () => {
    const config = resolveConfig({ shorthandStrategy: ["expand-to-longhands", { exclude: ["border-radius"] }] });
    expect(config.shorthandStrategy).toBe(expandToLonghands);
    expect(config.shorthandOptions).toEqual({ exclude: ["border-radius"] });
  });

  it("rejects prefixes that are not identifiers", () => {
    expect(() => resolveConfig({ classNamePrefix: "1x" })).toThrow(ConfigError);
    expect(() => resolveConfig({ classNamePrefix: "1x" })).toThrow(
      [
        'Invalid `classNamePrefix`: "1x".',
        "The prefix must start with a letter and contain only letters, digits and hyphens.",
      ].join("\n"),
    );
  });

  it("rejects a non-positive root font size", () => {
    expect(() => resolveConfig({ fontSizeRootPx: 0 })).toThrow(
      "Invalid `fontSizeRootPx`: expected a positive number, received 0",
    );
  });

  it("rejects non-boolean flags read from JSON", () => {
    expect(() => resolveConfig(JSON.parse('{"autoprefixer":"yes"}'))).toThrow(
      'Invalid `autoprefixer`: expected a boolean, received "yes"',
    );
  });

  it("rejects unknown validation levels", () => {
    expect(resolveConfig({ unknownPropertyLevel: "error" }).unknownPropertyLevel).toBe("error");
    expect(() => resolveConfig(JSON.parse('{"unknownPropertyLevel":"fatal"}'))).toThrow(
      'Invalid `unknownPropertyLevel`: expected one of "error", "warn", "ignore", received "fatal"',
    );
    expect(() => resolveConfig(JSON.parse('{"vendorPrefixLevel":"error"}'))).toThrow(
      'Invalid `vendorPrefixLevel`: expected one of "warn", "ignore", received "error"',
    );
  });
});
