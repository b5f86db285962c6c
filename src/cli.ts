#!/usr/bin/env node

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import ansis from 'ansis';
import { parseArguments } from './core/arguments';
import { isRecipeError } from './errors';
import { Runner } from './execution/runner';
import { Logger } from './utils/logger';

const RECIPE_FILE_NAMES = ['Ladlefile', 'ladlefile'];

function findRecipeFile(start: string): string | undefined {
  let directory = resolve(start);
  for (;;) {
    for (const name of RECIPE_FILE_NAMES) {
      const candidate = join(directory, name);
      if (existsSync(candidate)) {
        return candidate;
      }
    }
    const parent = dirname(directory);
    if (parent === directory) {
      return undefined;
    }
    directory = parent;
  }
}

function showHelp(): void {
  console.log(`
${ansis.bold('ladle')} - run recipes from a Ladlefile

${ansis.bold('Usage:')}
  ladle [flags] [NAME=VALUE...] [recipe] [args...]

${ansis.bold('Flags:')}
  -l, --list [patterns]  List recipes, optionally filtered by globs (!x excludes)
  -n, --dry-run          Print commands without running them
  -q, --quiet            Do not echo commands
  -e, --evaluate         Print the value of every variable
  -f, --file <path>      Use this recipe file instead of searching for one
  -h, --help             Show this help

${ansis.bold('Examples:')}
  ladle                          Run the default recipe
  ladle build                    Run the build recipe
  ladle run server --port 8080   Pass arguments to a recipe
  ladle kind=release build       Override a variable
  ladle --list 'test*'           List recipes starting with test
  `);
}

async function main(): Promise<void> {
  const parsed = parseArguments(process.argv.slice(2));
  const logger = new Logger(parsed.config);

  if (parsed.config.help) {
    showHelp();
    return;
  }

  const path = parsed.config.file
    ? resolve(parsed.config.file)
    : findRecipeFile(process.cwd());
  if (!(path && existsSync(path))) {
    logger.error(`No ${RECIPE_FILE_NAMES[0]} found`);
    process.exitCode = 1;
    return;
  }

  let runner: Runner;
  try {
    runner = Runner.load(readFileSync(path, 'utf-8'), {
      ...parsed.config,
      cwd: dirname(path),
      invocationDirectory: process.cwd(),
      overrides: parsed.overrides,
    });
  } catch (error) {
    if (!isRecipeError(error)) {
      throw error;
    }
    logger.error(`${path}: ${error.message}`);
    process.exitCode = error.exitCode;
    return;
  }

  if (parsed.config.list) {
    logger.print(runner.list(parsed.args));
    return;
  }
  if (parsed.config.evaluate) {
    logger.print(runner.evaluate());
    return;
  }

  process.exitCode = await runner.invoke(parsed.recipe, parsed.args);
}

main().catch((error: unknown) => {
  console.error(ansis.red('Fatal error:'), error);
  process.exit(1);
});
