import { describe, expect, it } from "vitest";
import { type EvaluationContext, Evaluator } from "../../core/evaluator";
import { ExpressionParser } from "../../core/expression-parser";
import { TokenStream, tokenize } from "../../core/lexer";
import { ExpressionTypeError, UnresolvedReferenceError } from "../../errors";
import type { Expression, Value } from "../../types";

function parse(source: string, parameters: string[] = []): Expression {
  const stream = new TokenStream(tokenize(source, 1));
  const expression = new ExpressionParser(stream, {
    parameters: new Set(parameters),
  }).parseExpression();
  stream.expectEnd();
  return expression;
}

function context(overrides: Partial<EvaluationContext> = {}): EvaluationContext {
  return {
    env: { HOME: "/home/test" },
    invocationDirectory: "/work/project",
    parameters: new Map<string, Value>(),
    variables: new Map([
      ["kind", "release"],
      ["name", "ladle"],
    ]),
    ...overrides,
  };
}

describe("Evaluator", () => {
  const evaluator = new Evaluator();

  it("evaluates literals and variables", () => {
    expect(evaluator.evaluate(parse('"text"'), context())).toBe("text");
    expect(evaluator.evaluate(parse("kind"), context())).toBe("release");
  });

  it("concatenates with + and by adjacency", () => {
    expect(evaluator.evaluate(parse('name + "-" + kind'), context())).toBe(
      "ladle-release"
    );
    expect(evaluator.evaluate(parse('"v" kind'), context())).toBe("vrelease");
  });

  it("reports unknown variables with their position", () => {
    expect(() => evaluator.evaluate(parse('"a" + missing'), context())).toThrow(
      new UnresolvedReferenceError("missing", { column: 7, line: 1 })
    );
  });

  describe("conditionals", () => {
    it("takes the matching branch of a ternary", () => {
      const expression = parse('kind == "release" ? "--release" : ""');
      expect(evaluator.evaluate(expression, context())).toBe("--release");
      expect(
        evaluator.evaluate(
          expression,
          context({ variables: new Map([["kind", "debug"]]) })
        )
      ).toBe("");
    });

    it("supports != and else-if chains", () => {
      const expression = parse(
        'if kind != "release" { "a" } else if name == "ladle" { "b" } else { "c" }'
      );
      expect(evaluator.evaluate(expression, context())).toBe("b");
    });

    it("never evaluates the branch it does not take", () => {
      const expression = parse('kind == "release" ? "ok" : missing');
      expect(evaluator.evaluate(expression, context())).toBe("ok");
    });

    it("rejects sequences as comparison operands", () => {
      const expression = parse('args == "x" ? "a" : "b"', ["args"]);
      const ctx = context({ parameters: new Map([["args", ["x", "y"]]]) });
      expect(() => evaluator.evaluate(expression, ctx)).toThrow(
        ExpressionTypeError
      );
    });
  });

  describe("variadic arguments", () => {
    const bound = context({
      parameters: new Map<string, Value>([["files", ["a.txt", "b.txt"]]]),
      variadic: "files",
    });

    it("returns the sequence for $@ and its length for $#", () => {
      expect(evaluator.evaluate(parse("$@"), bound)).toEqual([
        "a.txt",
        "b.txt",
      ]);
      expect(evaluator.evaluate(parse("$#"), bound)).toBe("2");
    });

    it("joins sequences with a space when interpolated", () => {
      expect(evaluator.evaluateString(parse("files", ["files"]), bound)).toBe(
        "a.txt b.txt"
      );
      expect(evaluator.evaluate(parse('"[" + $@ + "]"'), bound)).toBe(
        "[a.txt b.txt]"
      );
    });

    it("counts zero when the variadic is unbound", () => {
      const unbound = context({ variadic: "files" });
      expect(evaluator.evaluate(parse("$#"), unbound)).toBe("0");
      expect(
        evaluator.evaluate(parse('$# == "0" ? "none" : $@'), unbound)
      ).toBe("none");
    });

    it("counts a defaulted variadic as one value", () => {
      const defaulted = context({
        parameters: new Map<string, Value>([["files", "src"]]),
        variadic: "files",
      });
      expect(evaluator.evaluate(parse("$#"), defaulted)).toBe("1");
      expect(
        evaluator.evaluate(parse('$# == "0" ? "none" : $@'), defaulted)
      ).toBe("src");
    });

    it("rejects $@ when nothing is bound", () => {
      expect(() =>
        evaluator.evaluate(parse("$@"), context({ variadic: "files" }))
      ).toThrow("Unresolved reference `$@` at line 1, column 1");
    });
  });

  describe("functions", () => {
    it("reads the environment", () => {
      expect(evaluator.evaluate(parse('env_var("HOME")'), context())).toBe(
        "/home/test"
      );
      expect(
        evaluator.evaluate(parse('env_var_or_default("PORT", "8080")'), context())
      ).toBe("8080");
      expect(() =>
        evaluator.evaluate(parse('env_var("PORT")'), context())
      ).toThrow("Unresolved reference `env_var(PORT)`");
    });

    it("transforms strings", () => {
      expect(evaluator.evaluate(parse("uppercase(name)"), context())).toBe(
        "LADLE"
      );
      expect(evaluator.evaluate(parse('lowercase("MiXed")'), context())).toBe(
        "mixed"
      );
      expect(evaluator.evaluate(parse('trim("  x  ")'), context())).toBe("x");
      expect(
        evaluator.evaluate(parse('replace("a-b-c", "-", "_")'), context())
      ).toBe("a_b_c");
      expect(evaluator.evaluate(parse('quote("it\'s")'), context())).toBe(
        "'it'\\''s'"
      );
    });

    it("falls back on empty values", () => {
      expect(evaluator.evaluate(parse('if_empty("", "x")'), context())).toBe(
        "x"
      );
      expect(evaluator.evaluate(parse('if_empty("y", "x")'), context())).toBe(
        "y"
      );
    });

    it("joins paths and reports the invocation directory", () => {
      expect(
        evaluator.evaluate(parse('join("target", kind, "app")'), context())
      ).toBe("target/release/app");
      expect(
        evaluator.evaluate(parse("invocation_directory()"), context())
      ).toBe("/work/project");
    });

    it("rejects sequence arguments", () => {
      const bound = context({
        parameters: new Map<string, Value>([["files", ["a", "b"]]]),
        variadic: "files",
      });
      expect(() => evaluator.evaluate(parse("uppercase($@)"), bound)).toThrow(
        ExpressionTypeError
      );
    });
  });
});
