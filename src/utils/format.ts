import ansis from "ansis";
import type { RecipeRegistry } from "../core/registry";
import type { VariableStore } from "../core/variable-store";
import type { Expression, Parameter, Recipe } from "../types";

const LIST_INDENT = "    ";

export function formatExpression(expression: Expression): string {
  switch (expression.kind) {
    case "literal":
      return JSON.stringify(expression.value);
    case "variable":
    case "parameter":
      return expression.name;
    case "arguments":
      return "$@";
    case "argumentCount":
      return "$#";
    case "concat":
      return expression.parts.map(formatExpression).join(" + ");
    case "conditional": {
      const { left, operator, right } = expression.condition;
      return `if ${formatExpression(left)} ${operator} ${formatExpression(right)} { ${formatExpression(expression.then)} } else { ${formatExpression(expression.otherwise)} }`;
    }
    case "call":
      return `${expression.name}(${expression.args.map(formatExpression).join(", ")})`;
    default: {
      const unreachable: never = expression;
      return String(unreachable);
    }
  }
}

export function formatParameter(parameter: Parameter): string {
  const sigil = parameter.variadic ?? "";
  const exported = parameter.exported ? "$" : "";
  const defaultValue = parameter.default
    ? `=${formatDefault(parameter.default)}`
    : "";
  return `${sigil}${exported}${parameter.name}${defaultValue}`;
}

function formatDefault(expression: Expression): string {
  const formatted = formatExpression(expression);
  return expression.kind === "concat" || expression.kind === "conditional"
    ? `(${formatted})`
    : formatted;
}

export function formatSignature(recipe: Recipe): string {
  return [recipe.name, ...recipe.parameters.map(formatParameter)].join(" ");
}

/**
 * Listing of public recipes, one per line, with docs and aliases as a
 * trailing comment aligned across the listing.
 */
export function formatRecipeList(
  registry: RecipeRegistry,
  recipes: Recipe[] = registry.list()
): string {
  const visible = recipes.filter((recipe) => !recipe.private);
  const signatures = visible.map(formatSignature);
  const width = Math.max(0, ...signatures.map((s) => s.length));

  const lines = visible.map((recipe, index) => {
    const signature = signatures[index] ?? recipe.name;
    const aliases = registry.aliasesFor(recipe.name);
    const comments = [
      recipe.doc,
      aliases.length > 0 ? `[alias: ${aliases.join(", ")}]` : undefined,
    ].filter((part): part is string => part !== undefined && part !== "");

    if (comments.length === 0) {
      return `${LIST_INDENT}${signature}`;
    }
    return `${LIST_INDENT}${signature.padEnd(width)} ${ansis.blue(`# ${comments.join(" ")}`)}`;
  });

  return ["Available recipes:", ...lines].join("\n");
}

export function formatVariables(variables: VariableStore): string {
  const entries = Array.from(variables.values.entries());
  const width = Math.max(0, ...entries.map(([name]) => name.length));
  return entries
    .map(([name, value]) => `${name.padEnd(width)} := ${JSON.stringify(value)}`)
    .join("\n");
}
