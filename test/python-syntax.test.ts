import { describe, it, expect } from "vitest";
import {
  escapePythonString,
  pyDocstring,
  pyFloat,
  pyLiteral,
  pyString,
  pyTypeName,
} from "../src/python-syntax.js";

describe("pyFloat", () => {
  it("emits integers as floats", () => {
    expect(pyFloat(1800)).toBe("1800.0");
    expect(pyFloat(-3)).toBe("-3.0");
    expect(pyFloat(0)).toBe("0.0");
  });

  it("keeps fractional values as written by JavaScript", () => {
    expect(pyFloat(0.95)).toBe("0.95");
    expect(pyFloat(0.00001)).toBe("0.00001");
  });

  it("rejects non-finite numbers", () => {
    expect(() => pyFloat(Number.POSITIVE_INFINITY)).toThrow(RangeError);
    expect(() => pyFloat(Number.NaN)).toThrow(RangeError);
  });
});

describe("pyLiteral / pyTypeName", () => {
  it("maps each scalar kind to its Python literal and type", () => {
    expect(pyLiteral(12)).toBe("12.0");
    expect(pyLiteral(true)).toBe("True");
    expect(pyLiteral(false)).toBe("False");
    expect(pyLiteral("hot")).toBe('"hot"');
    expect(pyTypeName(12)).toBe("float");
    expect(pyTypeName(false)).toBe("bool");
    expect(pyTypeName("x")).toBe("str");
  });
});

describe("escapePythonString", () => {
  it("escapes quotes, backslashes and line breaks", () => {
    expect(escapePythonString('say "hi"\n')).toBe('say \\"hi\\"\\n');
    expect(escapePythonString("a\\b")).toBe("a\\\\b");
    expect(escapePythonString("it's\r\t")).toBe("it\\'s\\r\\t");
  });

  it("escapes control and line-separator characters", () => {
    expect(escapePythonString("\u0001")).toBe("\\x01");
    expect(escapePythonString("\u007f")).toBe("\\x7f");
    expect(escapePythonString("\u2028")).toBe("\\u2028");
  });

  it("leaves other unicode alone", () => {
    expect(escapePythonString("Kühler °C")).toBe("Kühler °C");
  });
});

describe("pyString / pyDocstring", () => {
  it("cannot be broken out of with triple quotes", () => {
    expect(pyDocstring('x"""y')).toBe('"""x\\"\\"\\"y"""');
    expect(pyString('"); import os; ("')).toBe('"\\"); import os; (\\""');
  });

  it("keeps a multi-line description on one line", () => {
    expect(pyDocstring("line one\nline two").includes("\n")).toBe(false);
  });
});
