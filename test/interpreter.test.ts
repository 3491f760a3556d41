import { assert, expect } from "chai";
import { describe, it } from "mocha";

import { EvalError } from "../lib/evaluator/evalError.js";
import { mkNumber } from "../lib/evaluator/values.js";
import { Interpreter, type InterpreterOptions } from "../lib/interpreter.js";
import { LexError } from "../lib/lexer/lexError.js";
import { ParseError } from "../lib/parser/parseError.js";
import type { LimeError } from "../lib/shared/limeError.js";
import { loadInput } from "./util/fileLoader.js";
import { ArrayReader, BufferWriter } from "./util/memoryIo.js";

const setup = (options: InterpreterOptions = {}, input: string[] = []) => {
  const output = new BufferWriter();
  const interpreter = new Interpreter({
    input: new ArrayReader(input),
    output,
    ...options,
  });
  return { interpreter, output };
};

describe("Interpreter", () => {
  describe("run", () => {
    it("runs the factorial program", () => {
      const { interpreter, output } = setup();
      const result = interpreter.run(loadInput("factorial.lime"));
      expect(result.errors).to.deep.equal([]);
      expect(output.lines).to.deep.equal(["120", "1", "3628800"]);
    });

    it("runs the list program", () => {
      const { interpreter, output } = setup();
      const result = interpreter.run(loadInput("lists.lime"));
      expect(result.errors).to.deep.equal([]);
      expect(output.lines).to.deep.equal([
        "3",
        "4",
        "[1, 2, 3, 4]",
        "3.4",
        "10",
        '["a", "b"]',
      ]);
    });

    it("reads input through get once per thunk", () => {
      const { interpreter, output } = setup({}, ["world"]);
      const result = interpreter.run(loadInput("echo.lime"));
      expect(result.errors).to.deep.equal([]);
      expect(output.lines).to.deep.equal(["hello, world", "()", "world"]);
    });

    it("stops at the first error by default", () => {
      const { interpreter, output } = setup();
      const { errors, executed } = interpreter.run(loadInput("errors.lime"));
      expect(output.lines).to.deep.equal(["before", "()"]);
      assert.equal(executed, 2);
      assert.lengthOf(errors, 1);
      assert.equal(errors[0].kind, "UnboundIdentifier");
      assert.equal(errors[0].line, 3);
      assert.equal(errors[0].describe(), "UnboundIdentifier: `y` is not defined (line 3)");
    });

    it("keeps going when continueOnError is set", () => {
      const reported: LimeError[] = [];
      const { interpreter, output } = setup({
        continueOnError: true,
        onError: (e) => reported.push(e),
      });
      const { errors } = interpreter.run(loadInput("errors.lime"));
      expect(output.lines).to.deep.equal(["before", "()", "7"]);
      expect(errors.map((e) => [e.kind, e.line])).to.deep.equal([
        ["UnboundIdentifier", 3],
        ["DivisionByZero", 4],
      ]);
      expect(reported).to.deep.equal(errors);
    });

    it("reports lexer errors with line and column", () => {
      const { interpreter } = setup();
      const { errors } = interpreter.run('ok := 1\nprint "unterminated');
      assert.lengthOf(errors, 1);
      assert.instanceOf(errors[0], LexError);
      assert.equal(
        errors[0].describe(),
        "LexError: unterminated string literal (line 2, col 7)",
      );
    });

    it("reports parser errors with line and column", () => {
      const { interpreter } = setup();
      const { errors } = interpreter.run("\n\n(a b");
      assert.instanceOf(errors[0], ParseError);
      assert.equal(errors[0].describe(), "ParseError: unmatched `(` (line 3, col 1)");
    });

    it("accepts CRLF line endings", () => {
      const { interpreter, output } = setup();
      interpreter.run("a := 1\r\n+ a 1\r\n");
      expect(output.lines).to.deep.equal(["2"]);
    });

    it("prints print's output before the statement's own value", () => {
      const { interpreter, output } = setup();
      interpreter.run('= 0 2 (print "true") (print "false")');
      expect(output.lines).to.deep.equal(["false", "()"]);
    });

    it("runs an embedded print only once for a shared binding", () => {
      const { interpreter, output } = setup();
      interpreter.run('x := print "hi"\ndo x x');
      expect(output.lines).to.deep.equal(["hi", "()"]);
    });

    it("applies the configured recursion limit", () => {
      const { interpreter } = setup({ maxDepth: 100 });
      const { errors } = interpreter.run("loop := \\f.f f\nloop loop");
      assert.equal(
        errors[0].describe(),
        "RecursionLimitExceeded: maximum recursion depth of 100 exceeded (line 2)",
      );
    });

    it("turns a host stack overflow into a recursion error", () => {
      const { interpreter } = setup();
      const { errors } = interpreter.run("loop := \\f.f f\nloop loop");
      assert.lengthOf(errors, 1);
      assert.instanceOf(errors[0], EvalError);
      assert.equal(errors[0].kind, "RecursionLimitExceeded");
      assert.equal(errors[0].line, 2);
    });
  });

  describe("execute", () => {
    it("returns and writes the value of an expression", () => {
      const { interpreter, output } = setup();
      expect(interpreter.execute("* 6 7")).to.deep.equal(mkNumber(42));
      expect(output.lines).to.deep.equal(["42"]);
    });

    it("does not print bindings or blank lines", () => {
      const { interpreter, output } = setup();
      assert.isUndefined(interpreter.execute("a := 1"));
      assert.isUndefined(interpreter.execute(""));
      assert.isUndefined(interpreter.execute("   ; comment"));
      expect(output.lines).to.deep.equal([]);
    });

    it("defers an unbound reference until it is forced", () => {
      const { interpreter } = setup();
      assert.isUndefined(interpreter.execute("x := y", 1));
      expect(() => interpreter.execute("x", 2))
        .to.throw(EvalError, "`y` is not defined")
        .with.property("line", 2);
    });

    it("replaces a binding on rebinding", () => {
      const { interpreter } = setup();
      interpreter.execute("a := 1");
      interpreter.execute("a := 2");
      expect(interpreter.execute("a")).to.deep.equal(mkNumber(2));
    });

    it("builds a rebinding on the previous binding", () => {
      const { interpreter, output } = setup();
      const { errors } = interpreter.run("x := 1\nx := + x 1\nx");
      expect(errors).to.deep.equal([]);
      expect(output.lines).to.deep.equal(["2"]);
    });

    it("repeats effects when a failed binding is forced again", () => {
      const { interpreter, output } = setup({ continueOnError: true });
      const { errors } = interpreter.run('x := do (print "side") y\nx\ny := 1\nx');
      expect(output.lines).to.deep.equal(["side", "side", "1"]);
      expect(errors.map((e) => e.line)).to.deep.equal([2]);
    });

    it("keeps interpreters independent", () => {
      const first = setup().interpreter;
      const second = setup().interpreter;
      first.execute("shared := 1");
      assert.isTrue(first.globals.has("shared"));
      assert.isFalse(second.globals.has("shared"));
      expect(() => second.execute("shared")).to.throw(EvalError, "`shared` is not defined");
    });
  });
});
