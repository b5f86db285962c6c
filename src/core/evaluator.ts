import {
  ExpressionTypeError,
  RecipeError,
  UnresolvedReferenceError,
} from "../errors";
import type { Expression, Value } from "../types";
import { builtinFunctions, type FunctionScope } from "./functions";

const SEQUENCE_SEPARATOR = " ";

export type EvaluationContext = FunctionScope & {
  variables: ReadonlyMap<string, string>;
  parameters: ReadonlyMap<string, Value>;
  // name of the current recipe's variadic parameter, the target of $@ and $#
  variadic?: string;
};

export function interpolate(value: Value): string {
  return typeof value === "string" ? value : value.join(SEQUENCE_SEPARATOR);
}

/**
 * Tree-walking evaluator. Conditionals only evaluate the branch they take,
 * so a branch that names an unbound variadic is harmless when not chosen.
 */
export class Evaluator {
  evaluate(expression: Expression, context: EvaluationContext): Value {
    switch (expression.kind) {
      case "literal":
        return expression.value;

      case "variable": {
        const value = context.variables.get(expression.name);
        if (value === undefined) {
          throw new UnresolvedReferenceError(
            expression.name,
            expression.position
          );
        }
        return value;
      }

      case "parameter": {
        const value = context.parameters.get(expression.name);
        if (value === undefined) {
          throw new UnresolvedReferenceError(
            expression.name,
            expression.position
          );
        }
        return value;
      }

      case "arguments": {
        const value = context.variadic
          ? context.parameters.get(context.variadic)
          : undefined;
        if (value === undefined) {
          throw new UnresolvedReferenceError("$@", expression.position);
        }
        return value;
      }

      // Counts what `$@` yields: a default counts as one value.
      case "argumentCount": {
        const value = context.variadic
          ? context.parameters.get(context.variadic)
          : undefined;
        if (value === undefined) {
          return "0";
        }
        return String(typeof value === "string" ? 1 : value.length);
      }

      case "concat":
        return expression.parts
          .map((part) => this.evaluateString(part, context))
          .join("");

      case "conditional": {
        const { left, operator, right } = expression.condition;
        const equal =
          this.expectString(left, context, operator) ===
          this.expectString(right, context, operator);
        const taken =
          equal === (operator === "==")
            ? expression.then
            : expression.otherwise;
        return this.evaluate(taken, context);
      }

      case "call":
        return this.call(expression, context);

      default: {
        const unreachable: never = expression;
        throw new RecipeError(
          `Unknown expression ${JSON.stringify(unreachable)}`,
          "UNKNOWN_EXPRESSION"
        );
      }
    }
  }

  /** Evaluates for interpolation: sequences are joined with a space. */
  evaluateString(expression: Expression, context: EvaluationContext): string {
    return interpolate(this.evaluate(expression, context));
  }

  private expectString(
    expression: Expression,
    context: EvaluationContext,
    usage: string
  ): string {
    const value = this.evaluate(expression, context);
    if (typeof value !== "string") {
      throw new ExpressionTypeError(
        `Expected a string operand for \`${usage}\` but got a sequence of ${value.length} argument(s)`
      );
    }
    return value;
  }

  private call(
    expression: Extract<Expression, { kind: "call" }>,
    context: EvaluationContext
  ): string {
    const builtin = builtinFunctions.get(expression.name);
    if (!builtin) {
      throw new UnresolvedReferenceError(
        `${expression.name}()`,
        expression.position
      );
    }

    return builtin.call(
      {
        count: expression.args.length,
        string: (index) => {
          const arg = expression.args[index];
          if (!arg) {
            throw new ExpressionTypeError(
              `Function \`${expression.name}\` has no argument ${index + 1}`
            );
          }
          return this.expectString(arg, context, `${expression.name}()`);
        },
      },
      context
    );
  }
}
