import debug from "debug";
import { DefinitionConflictError, UnresolvedReferenceError } from "../errors";
import type { Assignment, Settings } from "../types";
import { Evaluator } from "./evaluator";
import type { FunctionScope } from "./functions";

const log = debug("ladle:variables");

export type ResolveVariablesOptions = FunctionScope & {
  overrides?: Record<string, string>;
};

/**
 * File-level variables, evaluated once in declaration order. Each assignment
 * only sees the variables above it. The store has no way to change a value
 * after it is built.
 */
export class VariableStore {
  private constructor(
    private readonly resolved: ReadonlyMap<string, string>,
    private readonly exported: ReadonlyMap<string, string>
  ) {}

  static resolve(
    assignments: Assignment[],
    settings: Settings,
    options: ResolveVariablesOptions
  ): VariableStore {
    const evaluator = new Evaluator();
    const values = new Map<string, string>();
    const exports = new Map<string, string>();
    const overrides = options.overrides ?? {};

    for (const name of Object.keys(overrides)) {
      if (!assignments.some((a) => a.name === name)) {
        throw new UnresolvedReferenceError(name);
      }
    }

    for (const assignment of assignments) {
      if (values.has(assignment.name)) {
        throw new DefinitionConflictError(
          `Variable \`${assignment.name}\` is defined more than once (line ${assignment.position.line})`
        );
      }

      const override = overrides[assignment.name];
      const value =
        override ??
        evaluator.evaluateString(assignment.expression, {
          env: options.env,
          invocationDirectory: options.invocationDirectory,
          parameters: new Map(),
          variables: values,
        });

      log(`${assignment.name} = ${JSON.stringify(value)}`);
      values.set(assignment.name, value);
      if (assignment.exported || settings.export) {
        exports.set(assignment.name, value);
      }
    }

    return new VariableStore(values, exports);
  }

  get values(): ReadonlyMap<string, string> {
    return this.resolved;
  }

  get(name: string): string | undefined {
    return this.resolved.get(name);
  }

  has(name: string): boolean {
    return this.resolved.has(name);
  }

  /** A fresh copy of the exported variables for one subprocess. */
  exports(): Record<string, string> {
    return Object.fromEntries(this.exported);
  }
}
