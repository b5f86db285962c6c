import debug from "debug";
import {
  type EvaluationContext,
  Evaluator,
  interpolate,
} from "../core/evaluator";
import type { FunctionScope } from "../core/functions";
import type { LoadedRecipeFile } from "../core/loader";
import { MissingArgumentError, TooManyArgumentsError } from "../errors";
import type {
  Expression,
  Invocation,
  Recipe,
  ResolvedLine,
  Value,
} from "../types";

const log = debug("ladle:resolver");

export function invocationKey(recipe: string, args: string[]): string {
  return JSON.stringify([recipe, ...args]);
}

/**
 * Binds caller arguments to a recipe's parameters and interpolates every
 * line of the recipe, its dependencies and the recipes it invokes. Nothing
 * is run here: any evaluation error surfaces before the first subprocess.
 */
export class InvocationResolver {
  private readonly evaluator = new Evaluator();

  constructor(
    private readonly loaded: LoadedRecipeFile,
    private readonly scope: FunctionScope
  ) {}

  /**
   * Resolves the whole invocation tree. An invocation reached twice with
   * the same arguments is resolved once and shared.
   */
  resolve(recipe: Recipe, args: string[]): Invocation {
    return this.resolveShared(recipe, args, new Map());
  }

  private resolveShared(
    recipe: Recipe,
    args: string[],
    resolved: Map<string, Invocation>
  ): Invocation {
    const key = invocationKey(recipe.name, args);
    const seen = resolved.get(key);
    if (seen) {
      return seen;
    }

    log(`Resolving ${recipe.name}`, args);
    const bindings = this.bind(recipe, args);
    const context = this.context(recipe, bindings);

    const dependencies = recipe.dependencies.map((dependency) =>
      this.resolveShared(
        this.loaded.registry.resolve(dependency.recipe),
        this.evaluateArguments(dependency.args, context),
        resolved
      )
    );

    const lines = recipe.body.map((line): ResolvedLine => {
      const quiet = line.quiet || recipe.quiet;
      if (line.kind === "invocation") {
        return {
          ignoreFailure: line.ignoreFailure,
          invocation: this.resolveShared(
            this.loaded.registry.resolve(line.recipe),
            this.evaluateArguments(line.args, context),
            resolved
          ),
          kind: "invocation",
          line: line.line,
          quiet,
        };
      }
      return {
        command: this.evaluator.evaluateString(line.template, context),
        ignoreFailure: line.ignoreFailure,
        kind: "command",
        line: line.line,
        quiet,
      };
    });

    const invocation: Invocation = {
      args,
      bindings,
      dependencies,
      env: this.exports(recipe, bindings),
      key,
      lines,
      recipe,
    };
    resolved.set(key, invocation);
    return invocation;
  }

  /**
   * Binds arguments left to right. Defaults are evaluated with the
   * parameters bound so far; a `*` variadic with nothing to take and no
   * default stays unbound.
   */
  bind(recipe: Recipe, args: string[]): Map<string, Value> {
    const fixed = recipe.parameters.filter((p) => !p.variadic);
    const variadic = recipe.parameters.find((p) => p.variadic);
    const required = recipe.parameters.filter(
      (p) => p.default === undefined && p.variadic !== "*"
    );

    const firstMissing = required[args.length];
    if (firstMissing) {
      throw new MissingArgumentError(recipe.name, firstMissing.name);
    }
    if (!variadic && args.length > fixed.length) {
      throw new TooManyArgumentsError(recipe.name, fixed.length, args.length);
    }

    const bindings = new Map<string, Value>();
    const context = this.context(recipe, bindings);

    fixed.forEach((parameter, index) => {
      const arg = args[index];
      if (arg !== undefined) {
        bindings.set(parameter.name, arg);
      } else if (parameter.default) {
        bindings.set(
          parameter.name,
          this.evaluator.evaluate(parameter.default, context)
        );
      } else {
        throw new MissingArgumentError(recipe.name, parameter.name);
      }
    });

    if (variadic) {
      const rest = args.slice(fixed.length);
      if (rest.length > 0) {
        bindings.set(variadic.name, rest);
      } else if (variadic.default) {
        bindings.set(
          variadic.name,
          this.evaluator.evaluate(variadic.default, context)
        );
      }
    }

    log(`Bound ${recipe.name}:`, Object.fromEntries(bindings));
    return bindings;
  }

  private context(
    recipe: Recipe,
    parameters: ReadonlyMap<string, Value>
  ): EvaluationContext {
    return {
      env: this.scope.env,
      invocationDirectory: this.scope.invocationDirectory,
      parameters,
      variables: this.loaded.variables.values,
      variadic: recipe.parameters.find((p) => p.variadic)?.name,
    };
  }

  /** Sequence values spread into separate arguments. */
  private evaluateArguments(
    expressions: Expression[],
    context: EvaluationContext
  ): string[] {
    return expressions.flatMap((expression) => {
      const value = this.evaluator.evaluate(expression, context);
      return typeof value === "string" ? [value] : [...value];
    });
  }

  private exports(
    recipe: Recipe,
    bindings: ReadonlyMap<string, Value>
  ): Record<string, string> {
    const env: Record<string, string> = {};
    for (const parameter of recipe.parameters) {
      const value = bindings.get(parameter.name);
      if (
        value !== undefined &&
        (parameter.exported || this.loaded.settings.export)
      ) {
        env[parameter.name] = interpolate(value);
      }
    }
    return env;
  }
}
