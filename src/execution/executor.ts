import debug from "debug";
import { execa } from "execa";
import type { VariableStore } from "../core/variable-store";
import { ExecutionFailure } from "../errors";
import type {
  CommandSpawner,
  Invocation,
  RunOptions,
  Settings,
  SpawnRequest,
} from "../types";
import { Logger } from "../utils/logger";

const log = debug("ladle:executor");

/** Exit code reported when the shell is killed before it exits. */
const SIGNALLED_EXIT_CODE = 1;

/**
 * Runs the line through the configured shell with inherited stdio. Any
 * positional arguments follow the command, so the shell sees them as
 * `$1..$n` with `$0` set to the first entry.
 */
export const execaSpawner: CommandSpawner = async (request: SpawnRequest) => {
  const result = await execa(
    request.shell.program,
    [...request.shell.args, request.command, ...request.positionalArgs],
    {
      cwd: request.cwd,
      env: request.env,
      extendEnv: false,
      reject: false,
      stdio: "inherit",
    }
  );
  return result.exitCode ?? SIGNALLED_EXIT_CODE;
};

/**
 * Runs a resolved invocation: dependencies first, in declared order, then
 * the recipe's own lines one at a time. A dependency runs at most once per
 * call to `execute`.
 */
export class Executor {
  private readonly logger: Logger;
  private readonly spawn: CommandSpawner;
  private readonly completed = new Set<string>();

  constructor(
    private readonly settings: Settings,
    private readonly variables: VariableStore,
    private readonly options: RunOptions = {}
  ) {
    this.logger = new Logger(options);
    this.spawn = options.spawn ?? execaSpawner;
  }

  async execute(invocation: Invocation): Promise<void> {
    log("=== Starting execution ===");
    this.completed.clear();
    await this.run(invocation);
  }

  /** `quiet` is set inside an `@=>` line and silences everything it runs. */
  private async run(invocation: Invocation, quiet = false): Promise<void> {
    const { recipe } = invocation;

    for (const dependency of invocation.dependencies) {
      if (this.completed.has(dependency.key)) {
        log(`Dependency ${dependency.recipe.name} already ran, skipping`);
        continue;
      }
      await this.run(dependency, quiet);
    }

    log(`Running recipe ${recipe.name}`);

    for (const line of invocation.lines) {
      if (line.kind === "invocation") {
        log(`Line ${line.line} invokes ${line.invocation.recipe.name}`);
        try {
          await this.run(line.invocation, quiet || line.quiet);
        } catch (error) {
          if (!(line.ignoreFailure && error instanceof ExecutionFailure)) {
            throw error;
          }
          this.logger.warn(`${error.message} (ignored)`);
        }
        continue;
      }

      if (
        !(quiet || line.quiet || this.settings.quiet) ||
        this.options.dryRun
      ) {
        this.logger.command(line.command);
      }
      if (this.options.dryRun) {
        continue;
      }

      const exitCode = await this.spawn({
        command: line.command,
        cwd: this.options.cwd ?? process.cwd(),
        env: this.environment(invocation),
        positionalArgs: this.settings.positionalArguments
          ? [recipe.name, ...invocation.args]
          : [],
        shell: this.settings.shell,
      });
      log(`Line ${line.line} of ${recipe.name} exited with ${exitCode}`);

      if (exitCode !== 0) {
        const failure = new ExecutionFailure(recipe.name, line.line, exitCode);
        if (!line.ignoreFailure) {
          throw failure;
        }
        this.logger.warn(`${failure.message} (ignored)`);
      }
    }

    this.completed.add(invocation.key);
  }

  /**
   * A new object for every spawn: process environment, then file exports,
   * then recipe exports, then the caller's environment.
   */
  private environment(invocation: Invocation): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }
    return {
      ...env,
      ...this.variables.exports(),
      ...invocation.env,
      ...this.options.env,
    };
  }
}
