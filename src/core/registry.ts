import debug from "debug";
import {
  DefinitionConflictError,
  NoDefaultRecipeError,
  UnknownRecipeError,
} from "../errors";
import type { Alias, Recipe } from "../types";

const log = debug("ladle:registry");

const DEFAULT_RECIPE_NAME = "default";

/**
 * Exact-match lookup of recipes by name or alias. All conflicts are rejected
 * while registering, so lookups never have to choose between candidates.
 */
export class RecipeRegistry {
  private readonly recipes = new Map<string, Recipe>();
  private readonly aliases = new Map<string, Alias>();
  private defaultRecipe?: Recipe;

  register(recipe: Recipe): void {
    if (this.recipes.has(recipe.name)) {
      throw new DefinitionConflictError(
        `Recipe \`${recipe.name}\` is defined more than once (line ${recipe.position.line})`
      );
    }
    if (this.aliases.has(recipe.name)) {
      throw new DefinitionConflictError(
        `Recipe \`${recipe.name}\` conflicts with an alias of the same name`
      );
    }

    if (recipe.isDefault || recipe.name === DEFAULT_RECIPE_NAME) {
      if (this.defaultRecipe) {
        throw new DefinitionConflictError(
          `Recipes \`${this.defaultRecipe.name}\` and \`${recipe.name}\` both claim to be the default recipe`
        );
      }
      this.defaultRecipe = recipe;
    }

    log(`Registered recipe ${recipe.name}`);
    this.recipes.set(recipe.name, recipe);
  }

  registerAlias(alias: Alias): void {
    if (this.recipes.has(alias.name)) {
      throw new DefinitionConflictError(
        `Alias \`${alias.name}\` conflicts with a recipe of the same name`
      );
    }
    if (this.aliases.has(alias.name)) {
      throw new DefinitionConflictError(
        `Alias \`${alias.name}\` is defined more than once (line ${alias.position.line})`
      );
    }
    if (!this.recipes.has(alias.target)) {
      throw new UnknownRecipeError(alias.target, `alias ${alias.name}`);
    }

    log(`Registered alias ${alias.name} -> ${alias.target}`);
    this.aliases.set(alias.name, alias);
  }

  resolve(nameOrAlias: string): Recipe {
    const target = this.aliases.get(nameOrAlias)?.target ?? nameOrAlias;
    const recipe = this.recipes.get(target);
    if (!recipe) {
      throw new UnknownRecipeError(nameOrAlias);
    }
    return recipe;
  }

  has(nameOrAlias: string): boolean {
    return this.recipes.has(nameOrAlias) || this.aliases.has(nameOrAlias);
  }

  default(): Recipe {
    if (!this.defaultRecipe) {
      throw new NoDefaultRecipeError();
    }
    return this.defaultRecipe;
  }

  /** Recipes in declaration order. */
  list(): Recipe[] {
    return Array.from(this.recipes.values());
  }

  aliasesFor(recipeName: string): string[] {
    return Array.from(this.aliases.values())
      .filter((alias) => alias.target === recipeName)
      .map((alias) => alias.name);
  }
}
