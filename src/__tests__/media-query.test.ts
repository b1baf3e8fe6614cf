import { describe, it, expect } from "vitest";
import { lastMediaQueryWins } from "../condition/media-query.js";

describe("lastMediaQueryWins", () => {
  it("bounds each min-width query by the next one", () => {
    const result = lastMediaQueryWins({
      default: "red",
      "@media (min-width: 1000px)": "blue",
      "@media (min-width: 2000px)": "purple",
    });
    expect(result).toEqual({
      default: "red",
      "@media (min-width: 1000px) and (max-width: 1999.99px)": "blue",
      "@media (min-width: 2000px)": "purple",
    });
  });

  it("bounds max-width queries from below", () => {
    const result = lastMediaQueryWins({
      "@media (max-width: 900px)": "a",
      "@media (max-width: 500px)": "b",
    });
    expect(Object.keys(result)).toEqual([
      "@media (min-width: 500.01px) and (max-width: 900px)",
      "@media (max-width: 500px)",
    ]);
  });

  it("leaves a single query alone", () => {
    const conditions = { default: "red", "@media (min-width: 800px)": "blue" };
    expect(lastMediaQueryWins(conditions)).toEqual(conditions);
  });

  it("leaves other media features alone", () => {
    const conditions = {
      "@media (prefers-color-scheme: dark)": "white",
      "@media (min-width: 800px)": "blue",
    };
    expect(lastMediaQueryWins(conditions)).toEqual(conditions);
  });

  it("applies to nested condition maps", () => {
    const result = lastMediaQueryWins({
      ":hover": { "@media (min-width: 10em)": "a", "@media (min-width: 20em)": "b" },
    });
    expect(result).toEqual({
      ":hover": {
        "@media (min-width: 10em) and (max-width: 19.99em)": "a",
        "@media (min-width: 20em)": "b",
      },
    });
  });
});
