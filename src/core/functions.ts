import os from "node:os";
import path from "node:path";
import { UnresolvedReferenceError } from "../errors";

export type FunctionArguments = {
  readonly count: number;
  /** Evaluates argument `index` on demand; sequences are rejected. */
  string(index: number): string;
};

export type FunctionScope = {
  env: Readonly<Record<string, string | undefined>>;
  invocationDirectory: string;
};

export type BuiltinFunction = {
  minArgs: number;
  maxArgs: number;
  call(args: FunctionArguments, scope: FunctionScope): string;
};

const PLATFORM_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  darwin: "macos",
  win32: "windows",
};

export const builtinFunctions: ReadonlyMap<string, BuiltinFunction> = new Map<
  string,
  BuiltinFunction
>([
  [
    "env_var",
    {
      call: (args, scope) => {
        const name = args.string(0);
        const value = scope.env[name];
        if (value === undefined) {
          throw new UnresolvedReferenceError(`env_var(${name})`);
        }
        return value;
      },
      maxArgs: 1,
      minArgs: 1,
    },
  ],
  [
    "env_var_or_default",
    {
      call: (args, scope) => scope.env[args.string(0)] ?? args.string(1),
      maxArgs: 2,
      minArgs: 2,
    },
  ],
  [
    "if_empty",
    {
      call: (args) => {
        const value = args.string(0);
        return value === "" ? args.string(1) : value;
      },
      maxArgs: 2,
      minArgs: 2,
    },
  ],
  [
    "quote",
    {
      call: (args) => `'${args.string(0).replaceAll("'", "'\\''")}'`,
      maxArgs: 1,
      minArgs: 1,
    },
  ],
  [
    "uppercase",
    { call: (args) => args.string(0).toUpperCase(), maxArgs: 1, minArgs: 1 },
  ],
  [
    "lowercase",
    { call: (args) => args.string(0).toLowerCase(), maxArgs: 1, minArgs: 1 },
  ],
  ["trim", { call: (args) => args.string(0).trim(), maxArgs: 1, minArgs: 1 }],
  [
    "replace",
    {
      call: (args) =>
        args.string(0).replaceAll(args.string(1), args.string(2)),
      maxArgs: 3,
      minArgs: 3,
    },
  ],
  [
    "join",
    {
      call: (args) => {
        const parts: string[] = [];
        for (let i = 0; i < args.count; i++) {
          parts.push(args.string(i));
        }
        return path.join(...parts);
      },
      maxArgs: Number.POSITIVE_INFINITY,
      minArgs: 2,
    },
  ],
  [
    "os",
    {
      call: () => PLATFORM_NAMES[process.platform] ?? process.platform,
      maxArgs: 0,
      minArgs: 0,
    },
  ],
  ["arch", { call: () => process.arch, maxArgs: 0, minArgs: 0 }],
  [
    "num_cpus",
    { call: () => String(os.cpus().length), maxArgs: 0, minArgs: 0 },
  ],
  [
    "invocation_directory",
    { call: (_args, scope) => scope.invocationDirectory, maxArgs: 0, minArgs: 0 },
  ],
]);
