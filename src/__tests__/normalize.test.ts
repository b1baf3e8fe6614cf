import { describe, it, expect } from "vitest";
import { CompileError } from "../errors.js";
import { firstThatWorks } from "../types.js";
import { firstThatWorksValues, resolveLeafValue, variableFallbacks } from "../value/fallback.js";
import { formatNumber, normalizeValue, toCssValue, unitSuffix } from "../value/normalize.js";

describe("normalizeValue", () => {
  it("drops whitespace around commas and inside parentheses", () => {
    expect(normalizeValue("rgba(0, 0, 0, 0.5)")).toBe("rgba(0,0,0,.5)");
    expect(normalizeValue("calc( 100% - 10px )")).toBe("calc(100% - 10px)");
  });

  it("collapses repeated spaces", () => {
    expect(normalizeValue("  1px   solid  red ")).toBe("1px solid red");
  });

  it("strips units from zero lengths", () => {
    expect(normalizeValue("0px")).toBe("0");
    expect(normalizeValue("0px 10px")).toBe("0 10px");
  });

  it("converts long millisecond timings to seconds", () => {
    expect(normalizeValue("500ms")).toBe(".5s");
    expect(normalizeValue("5ms")).toBe("5ms");
  });

  it("drops leading zeros", () => {
    expect(normalizeValue("-0.5em")).toBe("-.5em");
  });

  it("spells zero angles in degrees", () => {
    expect(normalizeValue("rotate(0turn)")).toBe("rotate(0deg)");
  });

  it("tightens !important", () => {
    expect(normalizeValue("red !important")).toBe("red!important");
  });
});

describe("formatNumber", () => {
  it("rounds to four decimals", () => {
    expect(formatNumber(1 / 3)).toBe("0.3333");
    expect(formatNumber(2)).toBe("2");
    expect(formatNumber(-0)).toBe("0");
  });
});

describe("toCssValue", () => {
  it("adds the property's default unit to numbers", () => {
    expect(unitSuffix("width")).toBe("px");
    expect(toCssValue(10, "width")).toBe("10px");
    expect(toCssValue(0, "width")).toBe("0");
    expect(toCssValue(1, "opacity")).toBe("1");
    expect(toCssValue(10, "--gap")).toBe("10");
  });

  it("treats numeric durations as milliseconds", () => {
    expect(toCssValue(500, "transition-duration")).toBe(".5s");
  });

  it("converts pixel font sizes to rem when enabled", () => {
    expect(toCssValue(24, "font-size", { fontSizePxToRem: true })).toBe("1.5rem");
    expect(toCssValue(24, "font-size", { fontSizePxToRem: true, fontSizeRootPx: 12 })).toBe("2rem");
    expect(toCssValue(24, "font-size")).toBe("24px");
  });

  it("quotes content strings", () => {
    expect(toCssValue("hello", "content")).toBe('"hello"');
    expect(toCssValue("none", "content")).toBe("none");
    expect(toCssValue('"*"', "content")).toBe('"*"');
    expect(toCssValue("attr(title)", "content")).toBe("attr(title)");
  });

  it("dashes snake-case idents in will-change", () => {
    expect(toCssValue("scroll_position, --my_var", "will-change")).toBe("scroll-position,--my_var");
  });

  it("rejects booleans", () => {
    expect(() => toCssValue(true, "color")).toThrow(
      "Invalid property value: boolean `true` is not a valid CSS value for `color`",
    );
  });

  it("rejects non-finite numbers", () => {
    expect(() => toCssValue(Number.NaN, "width")).toThrow(CompileError);
  });
});

describe("fallback values", () => {
  it("hashes fallback arrays as a comma-separated list", () => {
    expect(resolveLeafValue(["sticky", "fixed"], "position")).toEqual({
      hashValue: "sticky, fixed",
      values: ["sticky", "fixed"],
    });
  });

  it("nests plain values before a variable as its fallback", () => {
    expect(variableFallbacks(["red", "var(--c)"])).toEqual(["var(--c,red)"]);
  });

  it("keeps values after the last variable as separate declarations", () => {
    expect(variableFallbacks(["var(--c)", "red"])).toEqual(["var(--c)", "red"]);
  });

  it("reverses firstThatWorks candidates without variables", () => {
    expect(firstThatWorksValues(["sticky", "fixed"])).toEqual(["fixed", "sticky"]);
  });

  it("nests firstThatWorks variables in preference order", () => {
    expect(resolveLeafValue(firstThatWorks("var(--a)", "var(--b)", "red"), "color")).toEqual({
      hashValue: "var(--a), var(--b), red",
      values: ["var(--a,var(--b,red))"],
    });
  });

  it("normalizes each array entry for the property", () => {
    expect(resolveLeafValue([10, "1rem"], "width").values).toEqual(["10px", "1rem"]);
  });
});
