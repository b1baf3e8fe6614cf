import { describe, it, expect } from "vitest";
import { prefixSelector, withVendorPrefixes } from "../prefixer.js";

describe("prefixSelector", () => {
  it("leaves selectors without vendor variants alone", () => {
    expect(prefixSelector(".x1:hover")).toBe(".x1:hover");
    expect(prefixSelector(".x1")).toBe(".x1");
  });

  it("lists every variant of a pseudo-element", () => {
    expect(prefixSelector(".x1::placeholder")).toBe(
      ".x1::-webkit-input-placeholder,.x1::-moz-placeholder,.x1:-ms-input-placeholder,.x1::placeholder",
    );
    expect(prefixSelector(".x1::thumb")).toBe(".x1::-webkit-slider-thumb,.x1::-moz-range-thumb,.x1::-ms-thumb");
  });

  it("tells :placeholder-shown apart from ::placeholder", () => {
    expect(prefixSelector(".x1:placeholder-shown")).toBe(".x1:-moz-placeholder-shown,.x1:placeholder-shown");
  });

  it("keeps the rest of the selector on every variant", () => {
    expect(prefixSelector(".x1.x1:fullscreen:hover")).toBe(
      ".x1.x1:-webkit-full-screen:hover,.x1.x1:-moz-full-screen:hover,.x1.x1:fullscreen:hover",
    );
  });

  it("matches whole pseudo names only", () => {
    expect(prefixSelector(".x1:autofill-like")).toBe(".x1:autofill-like");
  });
});

describe("withVendorPrefixes", () => {
  it("puts prefixed declarations before the standard one", () => {
    expect(withVendorPrefixes({ property: "appearance", value: "none" }, true)).toEqual([
      { property: "-webkit-appearance", value: "none" },
      { property: "-moz-appearance", value: "none" },
      { property: "appearance", value: "none" },
    ]);
    expect(withVendorPrefixes({ property: "appearance", value: "none" }, false)).toEqual([
      { property: "appearance", value: "none" },
    ]);
  });
});
