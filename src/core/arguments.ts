import type { Config } from "../types";

const OVERRIDE_PATTERN = /^([A-Za-z_][A-Za-z0-9_-]*)=(.*)$/s;

export type CliConfig = Config & {
  help?: boolean;
  list?: boolean;
  evaluate?: boolean;
  file?: string;
};

export type ParsedArguments = {
  config: CliConfig;
  overrides: Record<string, string>;
  recipe?: string;
  args: string[];
};

/**
 * Command line: `[flags] [NAME=VALUE...] [recipe] [args...]`. Everything
 * after the recipe name belongs to the recipe, flags included. With
 * `--list`, the remaining words are glob patterns and come back in `args`.
 */
export class ArgumentParser {
  parse(argv: string[]): ParsedArguments {
    const result: ParsedArguments = {
      args: [],
      config: {},
      overrides: {},
    };

    let index = 0;
    while (index < argv.length) {
      const arg = argv[index] ?? "";

      if (arg === "--") {
        this.takePositionals(argv.slice(index + 1), result);
        return result;
      }

      if (arg.startsWith("--")) {
        index += this.processLongFlag(arg.substring(2), argv[index + 1], result);
      } else if (arg.startsWith("-") && arg.length > 1) {
        index += this.processShortFlags(arg.substring(1), argv[index + 1], result);
      } else {
        const override = OVERRIDE_PATTERN.exec(arg);
        if (override?.[1] !== undefined && override[2] !== undefined) {
          result.overrides[override[1]] = override[2];
          index++;
          continue;
        }
        this.takePositionals(argv.slice(index), result);
        return result;
      }
    }

    return result;
  }

  private takePositionals(rest: string[], result: ParsedArguments): void {
    if (result.config.list) {
      result.args = rest;
      return;
    }
    const [recipe, ...args] = rest;
    result.recipe = recipe;
    result.args = args;
  }

  /** Returns how many argv entries were consumed. */
  private processLongFlag(
    flag: string,
    next: string | undefined,
    result: ParsedArguments
  ): number {
    if (flag === "help") {
      result.config.help = true;
    } else if (flag === "list") {
      result.config.list = true;
    } else if (flag === "dry-run") {
      result.config.dryRun = true;
    } else if (flag === "quiet") {
      result.config.quiet = true;
    } else if (flag === "evaluate") {
      result.config.evaluate = true;
    } else if (flag.startsWith("file=")) {
      const FILE_PREFIX_LENGTH = "file=".length;
      result.config.file = flag.substring(FILE_PREFIX_LENGTH);
    } else if (flag === "file") {
      return this.takeFile(next, result);
    } else {
      console.warn(`Unknown flag: --${flag}`);
    }
    return 1;
  }

  private processShortFlags(
    flags: string,
    next: string | undefined,
    result: ParsedArguments
  ): number {
    for (const flag of flags) {
      if (flag === "h") {
        result.config.help = true;
      } else if (flag === "l") {
        result.config.list = true;
      } else if (flag === "n") {
        result.config.dryRun = true;
      } else if (flag === "q") {
        result.config.quiet = true;
      } else if (flag === "e") {
        result.config.evaluate = true;
      } else if (flag === "f") {
        return this.takeFile(next, result);
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }
    return 1;
  }

  private takeFile(next: string | undefined, result: ParsedArguments): number {
    if (next === undefined) {
      throw new Error("--file needs a path");
    }
    result.config.file = next;
    return 2;
  }
}

export function parseArguments(argv: string[]): ParsedArguments {
  const parser = new ArgumentParser();
  return parser.parse(argv);
}
