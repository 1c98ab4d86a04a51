import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import {
  compileSignatureSet,
  DEFAULT_SIGNATURES,
  PYTEST_SIGNATURE_SOURCES,
  resolveSignatureSet,
} from "./signatures.js";

describe("resolveSignatureSet", () => {
  it("returns the defaults when nothing is overridden", () => {
    expect(resolveSignatureSet()).toBe(DEFAULT_SIGNATURES);
    expect(resolveSignatureSet({ summary: undefined })).toBe(DEFAULT_SIGNATURES);
  });

  it("replaces only the overridden lists", () => {
    const set = resolveSignatureSet({ warning: ["^WARN "] });

    expect(set.warning.map((pattern) => pattern.source)).toEqual(["^WARN "]);
    expect(set.summary.map((pattern) => pattern.source)).toEqual(PYTEST_SIGNATURE_SOURCES.summary);
  });

  it("matches missing modules case-insensitively", () => {
    const [pattern] = DEFAULT_SIGNATURES.moduleMissing;

    expect(pattern?.exec("modulenotfounderror: no module named 'foo'")?.groups?.module).toBe("foo");
  });
});

describe("compileSignatureSet", () => {
  it("rejects patterns that do not compile", () => {
    expect(() =>
      compileSignatureSet({ ...PYTEST_SIGNATURE_SOURCES, warning: ["(unclosed"] }),
    ).toThrow(ConfigError);
  });

  it("rejects patterns missing their named group", () => {
    expect(() =>
      compileSignatureSet({ ...PYTEST_SIGNATURE_SOURCES, moduleMissing: ["No module named (\\w+)"] }),
    ).toThrow('must define a named group "module"');
  });
});
