export type SourcePosition = {
  line: number;
  column: number;
};

export type Expression =
  | { kind: "literal"; value: string }
  | { kind: "variable"; name: string; position: SourcePosition }
  | { kind: "parameter"; name: string; position: SourcePosition }
  | { kind: "arguments"; position: SourcePosition }
  | { kind: "argumentCount" }
  | { kind: "concat"; parts: Expression[] }
  | {
      kind: "conditional";
      condition: Condition;
      then: Expression;
      otherwise: Expression;
    }
  | {
      kind: "call";
      name: string;
      args: Expression[];
      position: SourcePosition;
    };

export type Condition = {
  operator: "==" | "!=";
  left: Expression;
  right: Expression;
};

export type Shell = {
  program: string;
  args: string[];
};

export type Settings = {
  export: boolean;
  positionalArguments: boolean;
  quiet: boolean;
  shell: Shell;
};

export type Assignment = {
  name: string;
  expression: Expression;
  exported: boolean;
  position: SourcePosition;
};

export type Parameter = {
  name: string;
  default?: Expression;
  // "*" takes zero or more trailing arguments, "+" one or more
  variadic?: "*" | "+";
  exported: boolean;
};

export type Dependency = {
  recipe: string;
  args: Expression[];
  position: SourcePosition;
};

type LineModifiers = {
  quiet: boolean;
  ignoreFailure: boolean;
  line: number;
};

export type CommandLine = LineModifiers & {
  kind: "command";
  template: Expression;
};

export type InvocationLine = LineModifiers & {
  kind: "invocation";
  recipe: string;
  args: Expression[];
  position: SourcePosition;
};

export type BodyLine = CommandLine | InvocationLine;

export type Recipe = {
  name: string;
  doc?: string;
  isDefault: boolean;
  private: boolean;
  quiet: boolean;
  parameters: Parameter[];
  dependencies: Dependency[];
  body: BodyLine[];
  position: SourcePosition;
};

export type Alias = {
  name: string;
  target: string;
  position: SourcePosition;
};

export type RecipeFile = {
  settings: Settings;
  assignments: Assignment[];
  recipes: Recipe[];
  aliases: Alias[];
};

/** A bound variadic parameter keeps its arguments as a sequence. */
export type Value = string | readonly string[];

export type ResolvedLine =
  | {
      kind: "command";
      command: string;
      quiet: boolean;
      ignoreFailure: boolean;
      line: number;
    }
  | {
      kind: "invocation";
      invocation: Invocation;
      quiet: boolean;
      ignoreFailure: boolean;
      line: number;
    };

export type Invocation = {
  // recipe name plus arguments, used to run a dependency once per run
  key: string;
  recipe: Recipe;
  args: string[];
  bindings: ReadonlyMap<string, Value>;
  env: Record<string, string>;
  dependencies: Invocation[];
  lines: ResolvedLine[];
};

export type ExitStatus = number;

export type SpawnRequest = {
  command: string;
  shell: Shell;
  positionalArgs: string[];
  env: Record<string, string>;
  cwd: string;
};

/** Runs one command line and resolves with its exit code. */
export type CommandSpawner = (request: SpawnRequest) => Promise<number>;

export type Config = {
  quiet?: boolean;
  dryRun?: boolean;
};

export interface RunOptions extends Config {
  cwd?: string;
  invocationDirectory?: string;
  env?: Record<string, string>;
  overrides?: Record<string, string>;
  spawn?: CommandSpawner;
}
