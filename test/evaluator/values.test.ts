import { assert, expect } from "chai";
import { describe, it } from "mocha";

import { Environment } from "../../lib/evaluator/environment.js";
import {
  display,
  mkBuiltin,
  mkClosure,
  mkListValue,
  mkNumber,
  mkString,
  NONE,
  typeName,
  valuesEqual,
} from "../../lib/evaluator/values.js";
import { mkVar } from "../../lib/terms/expression.js";

const identity = mkClosure("x", mkVar("x"), new Environment());
const noop = mkBuiltin("noop", 1, () => NONE);

describe("display", () => {
  it("prints numbers in shortest decimal form", () => {
    expect(display(mkNumber(120))).to.equal("120");
    expect(display(mkNumber(3.4))).to.equal("3.4");
    expect(display(mkNumber(-0.5))).to.equal("-0.5");
    expect(display(mkNumber(-0))).to.equal("0");
  });

  it("prints strings raw at the top level", () => {
    expect(display(mkString('say "hi"'))).to.equal('say "hi"');
  });

  it("quotes strings inside lists", () => {
    const list = mkListValue([
      mkNumber(1),
      mkString("a\"b"),
      mkListValue([mkString("c")]),
      NONE,
    ]);
    expect(display(list)).to.equal('[1, "a\\"b", ["c"], ()]');
  });

  it("prints opaque markers for functions", () => {
    expect(display(NONE)).to.equal("()");
    expect(display(identity)).to.equal("<function>");
    expect(display(noop)).to.equal("<builtin noop>");
    expect(display(mkListValue([identity]))).to.equal("[<function>]");
  });
});

describe("typeName", () => {
  it("names the five kinds", () => {
    expect([
      mkNumber(1),
      mkString(""),
      mkListValue([]),
      identity,
      noop,
      NONE,
    ].map(typeName)).to.deep.equal([
      "number",
      "string",
      "list",
      "function",
      "function",
      "none",
    ]);
  });
});

describe("valuesEqual", () => {
  it("compares primitives by value", () => {
    assert.isTrue(valuesEqual(mkNumber(2), mkNumber(2)));
    assert.isFalse(valuesEqual(mkNumber(2), mkNumber(3)));
    assert.isTrue(valuesEqual(mkString("a"), mkString("a")));
    assert.isTrue(valuesEqual(NONE, NONE));
  });

  it("never equates different kinds", () => {
    assert.isFalse(valuesEqual(mkNumber(1), mkString("1")));
    assert.isFalse(valuesEqual(NONE, mkListValue([])));
    assert.isFalse(valuesEqual(mkString(""), NONE));
  });

  it("compares lists element-wise", () => {
    const a = mkListValue([mkNumber(1), mkListValue([mkString("x")])]);
    const b = mkListValue([mkNumber(1), mkListValue([mkString("x")])]);
    assert.isTrue(valuesEqual(a, b));
    assert.isFalse(valuesEqual(a, mkListValue([mkNumber(1)])));
  });

  it("compares functions by identity", () => {
    assert.isTrue(valuesEqual(identity, identity));
    assert.isFalse(
      valuesEqual(identity, mkClosure("x", mkVar("x"), new Environment())),
    );
    assert.isTrue(valuesEqual(noop, noop));
  });
});
