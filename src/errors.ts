import type { SourcePosition } from "./types";

/** Exit status for failures detected before any subprocess runs. */
export const RESOLUTION_FAILURE_STATUS = 2;

/**
 * Base error class for everything the runner reports to the user
 */
export class RecipeError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(
    message: string,
    code: string,
    exitCode: number = RESOLUTION_FAILURE_STATUS
  ) {
    super(message);
    this.name = "RecipeError";
    this.code = code;
    this.exitCode = exitCode;
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}

/**
 * Malformed recipe file source
 */
export class RecipeSyntaxError extends RecipeError {
  readonly position: SourcePosition;
  readonly expected?: string;

  constructor(message: string, position: SourcePosition, expected?: string) {
    const detail = expected ? `${message}, expected ${expected}` : message;
    super(
      `${detail} at line ${position.line}, column ${position.column}`,
      "SYNTAX_ERROR"
    );
    this.name = "RecipeSyntaxError";
    this.position = position;
    this.expected = expected;
  }

  override toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        position: this.position,
        ...(this.expected && { expected: this.expected }),
      },
    };
  }
}

/**
 * Duplicate recipe, alias, variable or default claim
 */
export class DefinitionConflictError extends RecipeError {
  constructor(message: string) {
    super(message, "DEFINITION_CONFLICT");
    this.name = "DefinitionConflictError";
  }
}

export class DependencyCycleError extends RecipeError {
  readonly cycles: string[][];

  constructor(cycles: string[][]) {
    const described = cycles.map((cycle) => cycle.join(" -> ")).join("; ");
    super(`Circular dependency detected: ${described}`, "DEPENDENCY_CYCLE");
    this.name = "DependencyCycleError";
    this.cycles = cycles;
  }
}

export class UnknownRecipeError extends RecipeError {
  readonly recipe: string;

  constructor(recipe: string, referencedBy?: string) {
    const suffix = referencedBy ? ` (referenced by \`${referencedBy}\`)` : "";
    super(`Recipe \`${recipe}\` not found${suffix}`, "UNKNOWN_RECIPE");
    this.name = "UnknownRecipeError";
    this.recipe = recipe;
  }
}

export class NoDefaultRecipeError extends RecipeError {
  constructor() {
    super(
      "No default recipe: name one `default` or mark it with [default]",
      "NO_DEFAULT_RECIPE"
    );
    this.name = "NoDefaultRecipeError";
  }
}

export class MissingArgumentError extends RecipeError {
  readonly recipe: string;
  readonly parameter: string;

  constructor(recipe: string, parameter: string) {
    super(
      `Recipe \`${recipe}\` is missing a value for parameter \`${parameter}\``,
      "MISSING_ARGUMENT"
    );
    this.name = "MissingArgumentError";
    this.recipe = recipe;
    this.parameter = parameter;
  }
}

export class TooManyArgumentsError extends RecipeError {
  readonly recipe: string;

  constructor(recipe: string, accepted: number, received: number) {
    super(
      `Recipe \`${recipe}\` takes at most ${accepted} argument${accepted === 1 ? "" : "s"} but got ${received}`,
      "TOO_MANY_ARGUMENTS"
    );
    this.name = "TooManyArgumentsError";
    this.recipe = recipe;
  }
}

export class UnresolvedReferenceError extends RecipeError {
  readonly reference: string;

  constructor(reference: string, position?: SourcePosition) {
    const where = position
      ? ` at line ${position.line}, column ${position.column}`
      : "";
    super(
      `Unresolved reference \`${reference}\`${where}`,
      "UNRESOLVED_REFERENCE"
    );
    this.name = "UnresolvedReferenceError";
    this.reference = reference;
  }
}

/**
 * A sequence value used where a single string is required
 */
export class ExpressionTypeError extends RecipeError {
  constructor(message: string) {
    super(message, "TYPE_ERROR");
    this.name = "ExpressionTypeError";
  }
}

/**
 * A command line exited with a non-zero status
 */
export class ExecutionFailure extends RecipeError {
  readonly recipe: string;
  readonly line: number;

  constructor(recipe: string, line: number, exitCode: number) {
    super(
      `Recipe \`${recipe}\` failed on line ${line} with exit code ${exitCode}`,
      "EXECUTION_FAILURE",
      exitCode
    );
    this.name = "ExecutionFailure";
    this.recipe = recipe;
    this.line = line;
  }
}

export function isRecipeError(error: unknown): error is RecipeError {
  return error instanceof RecipeError;
}
