import { describe, it, expect } from "vitest";
import { compileRule } from "../class/compile.js";
import { metaClasses } from "../class/meta.js";
import { resolveConfig } from "../config.js";
import { SelectorError } from "../errors.js";
import { defaultMarker, defineMarker, isMarker, Marker } from "../marker.js";
import { createWhen, validatePseudo } from "../when.js";

const config = resolveConfig();
const when = createWhen(defaultMarker(config));

describe("markers", () => {
  it("derives the default marker from the prefix", () => {
    expect(defaultMarker(config).class).toBe("x-default-marker");
    expect(defaultMarker(resolveConfig({ classNamePrefix: "app" })).class).toBe("app-default-marker");
  });

  it("gives each name its own stable class", () => {
    const card = defineMarker("card", config);
    expect(card.class).toMatch(/^x[0-9a-z]+$/);
    expect(card.equals(defineMarker("card", config))).toBe(true);
    expect(card.equals(defineMarker("row", config))).toBe(false);
    expect(String(card)).toBe(card.class);
  });

  it("recognizes markers", () => {
    expect(isMarker(new Marker("x1"))).toBe(true);
    expect(isMarker("x1")).toBe(false);
  });
});

describe("when", () => {
  it("builds relational selectors around the default marker", () => {
    expect(when.ancestor(":hover")).toBe(":where(.x-default-marker:hover *)");
    expect(when.descendant(":focus")).toBe(":where(:has(.x-default-marker:focus))");
    expect(when.siblingBefore(":hover")).toBe(":where(.x-default-marker:hover ~ *)");
    expect(when.siblingAfter(":hover")).toBe(":where(:has(~ .x-default-marker:hover))");
    expect(when.anySibling(":hover")).toBe(
      ":where(.x-default-marker:hover ~ *, :has(~ .x-default-marker:hover))",
    );
  });

  it("uses a custom marker when given", () => {
    const marker = new Marker("xcard");
    expect(when.ancestor(":focus-visible", marker)).toBe(":where(.xcard:focus-visible *)");
  });

  it("accepts pseudo-class chains", () => {
    expect(when.ancestor(":nth-child(2n):hover")).toBe(":where(.x-default-marker:nth-child(2n):hover *)");
  });

  it("rejects pseudo-elements", () => {
    expect(() => validatePseudo("::before")).toThrow(
      "Pseudo-elements (::) are not supported in contextual selectors",
    );
  });

  it("rejects selectors without a leading colon", () => {
    expect(() => validatePseudo("hover")).toThrow(`Pseudo selector must start with ':' (got "hover")`);
  });

  it("rejects selector lists and combinators", () => {
    expect(() => validatePseudo(":hover, :focus")).toThrow(
      'Contextual selectors take a single pseudo-class chain, got ":hover, :focus"',
    );
    expect(() => validatePseudo(":hover .child")).toThrow(SelectorError);
    expect(() => validatePseudo(":hover .child")).toThrow(
      'Contextual selectors accept pseudo-classes only, got ":hover .child".',
    );
  });

  it("compiles contextual conditions with a doubled class", () => {
    const rule = compileRule({ opacity: { default: 1, [when.ancestor(":hover")]: 0.5 } }, config);
    const [[, meta]] = rule.atomicClasses;
    const [base, contextual] = metaClasses(meta);
    expect(base.ltr).toBe(`.${base.class}{opacity:1}`);
    expect(contextual.ltr).toBe(
      `.${contextual.class}.${contextual.class}:where(.x-default-marker:hover *){opacity:.5}`,
    );
    expect(contextual.priority).toBe(3040);
  });
});
