import { assert, expect } from "chai";
import { describe, it } from "mocha";

import { Thunk } from "../../lib/evaluator/thunk.js";
import { mkNumber, NONE } from "../../lib/evaluator/values.js";
import { mkVar } from "../../lib/terms/expression.js";
import { Harness } from "../util/harness.js";

describe("Evaluator", () => {
  describe("literals", () => {
    it("evaluates numbers, strings and none to themselves", () => {
      const h = new Harness();
      expect(h.eval("2.5")).to.deep.equal(mkNumber(2.5));
      expect(h.eval('"lime"')).to.deep.equal({ kind: "string", value: "lime" });
      assert.strictEqual(h.eval("()"), NONE);
    });

    it("evaluates list elements eagerly, in order", () => {
      const h = new Harness();
      expect(h.eval("[+ 1 1, [3]]")).to.deep.equal({
        kind: "list",
        elements: [mkNumber(2), { kind: "list", elements: [mkNumber(3)] }],
      });
      h.eval('[print "a", print "b"]');
      expect(h.output.lines).to.deep.equal(["a", "b"]);
      h.evalError("[1, / 1 0]", "DivisionByZero");
    });
  });

  describe("closures", () => {
    it("selects the first of two curried arguments", () => {
      expect(new Harness().eval("(\\a.\\b.a) 5 4")).to.deep.equal(mkNumber(5));
    });

    it("captures the defining environment", () => {
      const h = new Harness().bind("const := \\x.\\y.x", "k := const 1");
      expect(h.eval("k 2")).to.deep.equal(mkNumber(1));
      expect(h.eval("(\\x.k 3) 9")).to.deep.equal(mkNumber(1));
    });

    it("resolves the innermost binding of a shadowed name", () => {
      const h = new Harness();
      expect(h.eval("(\\x.(\\x.x) 2) 1")).to.deep.equal(mkNumber(2));
      expect(h.eval("(\\x.\\y.(\\x.y) x) 1 2")).to.deep.equal(mkNumber(2));
    });

    it("does not let an argument see the callee's parameters", () => {
      const h = new Harness().bind("x := 10", "f := \\x.\\y.y");
      expect(h.eval("f 1 x")).to.deep.equal(mkNumber(10));
    });

    it("returns a closure from a partial application", () => {
      const h = new Harness().bind("f := \\x.+ x 1", "g := 41");
      const partial = h.eval("(\\a.\\b.a b) f");
      assert.equal(partial.kind, "closure");
      if (partial.kind === "closure") {
        assert.equal(partial.param, "b");
      }
      expect(h.eval("(\\a.\\b.a b) f g")).to.deep.equal(h.eval("f g"));
      expect(h.eval("f g")).to.deep.equal(mkNumber(42));
    });

    it("ignores the argument of a parameterless lambda", () => {
      const h = new Harness();
      expect(h.eval("(\\.7) (/ 1 0)")).to.deep.equal(mkNumber(7));
    });
  });

  describe("laziness", () => {
    it("never evaluates an unused argument", () => {
      const h = new Harness();
      expect(h.eval("(\\x.1) (/ 1 0)")).to.deep.equal(mkNumber(1));
      expect(h.eval('(\\x.2) (print "hidden")')).to.deep.equal(mkNumber(2));
      expect(h.output.lines).to.deep.equal([]);
    });

    it("evaluates a shared argument once", () => {
      const h = new Harness();
      assert.strictEqual(h.eval('(\\a.do a a) (print "hi")'), NONE);
      expect(h.output.lines).to.deep.equal(["hi"]);
    });

    it("keeps separate thunks for separate arguments", () => {
      const h = new Harness();
      h.eval('(\\a.\\b.do a b) (print "x") (print "x")');
      expect(h.output.lines).to.deep.equal(["x", "x"]);
    });

    it("binds top-level names without evaluating them", () => {
      const h = new Harness().bind("x := y");
      assert.isTrue(h.globals.has("x"));
      h.evalError("x", "UnboundIdentifier");
      h.bind("y := 3");
      expect(h.eval("x")).to.deep.equal(mkNumber(3));
    });

    it("lets bindings refer to names bound later", () => {
      const h = new Harness().bind("f := \\x.g x", "g := \\x.* x 2");
      expect(h.eval("f 4")).to.deep.equal(mkNumber(8));
    });
  });

  describe("recursion", () => {
    it("computes factorial through self-application", () => {
      const h = new Harness().bind(
        "fact_rec := \\f.\\n.= n 1 n (* n (f f (- n 1)))",
        "fact := fact_rec fact_rec",
      );
      expect(h.eval("fact 5")).to.deep.equal(mkNumber(120));
      expect(h.eval("fact 1")).to.deep.equal(mkNumber(1));
    });

    it("fails once maxDepth is exceeded and stays usable", () => {
      const h = new Harness({ maxDepth: 50 });
      const err = h.evalError("(\\f.f f) (\\f.f f)", "RecursionLimitExceeded");
      expect(err.message).to.equal("maximum recursion depth of 50 exceeded");
      expect(h.eval("+ 1 2")).to.deep.equal(mkNumber(3));
    });

    it("lets a rebinding refer to the previous value", () => {
      const h = new Harness().bind("x := 1", "x := + x 1", "x := * x 10");
      expect(h.eval("x")).to.deep.equal(mkNumber(20));
    });

    it("resolves other names of a rebinding in the live frame", () => {
      const h = new Harness().bind("f := 1", "f := \\n.+ n later", "later := 5");
      expect(h.eval("f 2")).to.deep.equal(mkNumber(7));
    });

    it("reports a binding that depends on itself", () => {
      const h = new Harness().bind("x := x");
      const err = h.evalError("x", "RecursionLimitExceeded");
      expect(err.message).to.equal("value depends on itself");
    });
  });

  describe("errors", () => {
    it("reports unbound identifiers by name", () => {
      const err = new Harness().evalError("nope 1", "UnboundIdentifier");
      expect(err.message).to.equal("`nope` is not defined");
    });

    it("refuses to call non-functions", () => {
      const h = new Harness();
      const err = h.evalError("5 3", "NotCallable");
      expect(err.message).to.equal("unable to call a value of type number");
      h.evalError('"s" 1', "NotCallable");
      h.evalError("[] 1", "NotCallable");
      h.evalError("() ()", "NotCallable");
    });
  });

  describe("apply", () => {
    it("collects builtin arguments until the arity is reached", () => {
      const h = new Harness();
      const plus = h.eval("+");
      const partial = h.evaluator.apply(plus, Thunk.of(mkNumber(1)));
      assert.equal(partial.kind, "builtin");
      if (partial.kind === "builtin") {
        assert.lengthOf(partial.args, 1);
      }
      if (plus.kind === "builtin") {
        assert.lengthOf(plus.args, 0);
      }
      const sum = h.evaluator.apply(partial, Thunk.delay(mkVar("x"), h.bind("x := 2").globals));
      expect(sum).to.deep.equal(mkNumber(3));
    });
  });
});
