import debug from "debug";
import type { RecipeFile, Settings } from "../types";
import { GraphBuilder } from "./graph-builder";
import { parseRecipeFile } from "./parser";
import { RecipeRegistry } from "./registry";
import { VariableStore } from "./variable-store";

const log = debug("ladle:loader");

export type LoadOptions = {
  overrides?: Record<string, string>;
  env?: Readonly<Record<string, string | undefined>>;
  invocationDirectory?: string;
};

/** Everything checked and resolved before a recipe can be invoked. */
export type LoadedRecipeFile = {
  file: RecipeFile;
  settings: Settings;
  registry: RecipeRegistry;
  variables: VariableStore;
};

export function loadRecipeFile(
  source: string,
  options: LoadOptions = {}
): LoadedRecipeFile {
  const file = parseRecipeFile(source);

  const registry = new RecipeRegistry();
  for (const recipe of file.recipes) {
    registry.register(recipe);
  }
  for (const alias of file.aliases) {
    registry.registerAlias(alias);
  }

  new GraphBuilder().buildGraph(registry);

  const variables = VariableStore.resolve(file.assignments, file.settings, {
    env: options.env ?? process.env,
    invocationDirectory: options.invocationDirectory ?? process.cwd(),
    overrides: options.overrides,
  });

  log("Loaded recipe file:", {
    aliases: file.aliases.length,
    recipes: file.recipes.length,
    variables: file.assignments.length,
  });

  return { file, registry, settings: file.settings, variables };
}
