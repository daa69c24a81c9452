import { describe, it, expect } from "vitest";
import * as path from "path";
import { createLayout, isInsideRoot, resolveReference } from "./layout.js";
import { SecurityViolationError } from "../errors.js";

const root = path.resolve("/srv/prompts");
const layout = createLayout(root);
const nothingExists = () => false;
const everythingExists = () => true;

describe("isInsideRoot", () => {
  it("accepts the root and its descendants", () => {
    expect(isInsideRoot(root, root)).toBe(true);
    expect(isInsideRoot(root, path.join(root, "a", "b.mdc"))).toBe(true);
  });

  it("rejects parents, siblings and lookalike prefixes", () => {
    expect(isInsideRoot(root, path.dirname(root))).toBe(false);
    expect(isInsideRoot(root, path.resolve("/srv/prompts-evil/x.mdc"))).toBe(false);
  });

  it("accepts names that merely start with two dots", () => {
    expect(isInsideRoot(root, path.join(root, "..hidden.mdc"))).toBe(true);
  });
});

describe("resolveReference", () => {
  it("maps the library directory under the root", () => {
    expect(resolveReference("@.cursor/skills/x.mdc", layout, nothingExists))
      .toBe(path.join(root, ".cursor", "skills", "x.mdc"));
  });

  it("maps the agents area under the library directory", () => {
    expect(resolveReference("@agents/common/p.mdc", layout, nothingExists))
      .toBe(path.join(root, ".cursor", "agents", "common", "p.mdc"));
  });

  it("prefers the library copy when it exists", () => {
    expect(resolveReference("@skills/x.mdc", layout, everythingExists))
      .toBe(path.join(root, ".cursor", "skills", "x.mdc"));
  });

  it("falls back to the root when the library copy is missing", () => {
    expect(resolveReference("@docs/x.mdc", layout, nothingExists)).toBe(path.join(root, "docs", "x.mdc"));
  });

  it("maps unsigiled references under the root", () => {
    expect(resolveReference("docs/x.mdc", layout, nothingExists)).toBe(path.join(root, "docs", "x.mdc"));
  });

  it("rejects escapes", () => {
    expect(() => resolveReference("@../../etc/passwd.mdc", layout, everythingExists))
      .toThrow(SecurityViolationError);
    expect(() => resolveReference("@.cursor/../../x.mdc", layout, nothingExists))
      .toThrow("Access denied for path '@.cursor/../../x.mdc'. Cannot access outside the prompt root.");
  });

  it("never probes outside the root", () => {
    const probed: string[] = [];
    const exists = (p: string) => {
      probed.push(p);
      return false;
    };
    expect(() => resolveReference("@../../../outside.mdc", layout, exists)).toThrow(SecurityViolationError);
    expect(probed).toEqual([]);
  });

  it("honours a custom library directory", () => {
    const custom = createLayout(root, { libraryDir: ".prompts" });
    expect(resolveReference("@.prompts/a.mdc", custom, nothingExists)).toBe(path.join(root, ".prompts", "a.mdc"));
    expect(resolveReference("@agents/a.mdc", custom, nothingExists)).toBe(path.join(root, ".prompts", "agents", "a.mdc"));
  });
});
