import debug from "debug";
import type { FunctionScope } from "../core/functions";
import { type LoadedRecipeFile, loadRecipeFile } from "../core/loader";
import { PatternMatcher } from "../core/pattern-matcher";
import { isRecipeError } from "../errors";
import type { ExitStatus, RunOptions } from "../types";
import { formatRecipeList, formatVariables } from "../utils/format";
import { Logger } from "../utils/logger";
import { Executor } from "./executor";
import { InvocationResolver } from "./resolver";

const log = debug("ladle:runner");

export class Runner {
  private readonly matcher = new PatternMatcher();
  private readonly logger: Logger;
  private readonly resolver: InvocationResolver;

  constructor(
    private readonly loaded: LoadedRecipeFile,
    private readonly options: RunOptions = {}
  ) {
    this.logger = new Logger(options);
    this.resolver = new InvocationResolver(loaded, scopeFor(options));
  }

  /** Parses and checks a recipe file. Load errors are thrown, not logged. */
  static load(source: string, options: RunOptions = {}): Runner {
    const scope = scopeFor(options);
    const loaded = loadRecipeFile(source, {
      env: scope.env,
      invocationDirectory: scope.invocationDirectory,
      overrides: options.overrides,
    });
    return new Runner(loaded, options);
  }

  /**
   * Runs a recipe (the default recipe when no name is given) and returns
   * the exit status: 0, the failing line's exit code, or the status of a
   * resolution error.
   */
  async invoke(recipeName?: string, args: string[] = []): Promise<ExitStatus> {
    try {
      const { registry, settings, variables } = this.loaded;
      const recipe =
        recipeName === undefined
          ? registry.default()
          : registry.resolve(recipeName);
      log(`Invoking ${recipe.name}`, args);

      const invocation = this.resolver.resolve(recipe, args);
      const executor = new Executor(settings, variables, this.options);
      await executor.execute(invocation);
      return 0;
    } catch (error) {
      if (!isRecipeError(error)) {
        throw error;
      }
      this.logger.error(error.message);
      return error.exitCode;
    }
  }

  list(patterns: string[] = []): string {
    const { registry } = this.loaded;
    const recipes =
      patterns.length > 0
        ? this.matcher.filterRecipes(patterns, registry.list())
        : registry.list();
    return formatRecipeList(registry, recipes);
  }

  evaluate(): string {
    return formatVariables(this.loaded.variables);
  }
}

function scopeFor(options: RunOptions): FunctionScope {
  return {
    env: { ...process.env, ...options.env },
    invocationDirectory: options.invocationDirectory ?? process.cwd(),
  };
}
