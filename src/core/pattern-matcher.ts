import micromatch from "micromatch";
import type { Recipe } from "../types";

export class PatternMatcher {
  /**
   * Filters recipes by glob patterns, applied left to right. A pattern
   * starting with `!` removes matches; when the first pattern is an
   * exclusion, filtering starts from every recipe.
   */
  filterRecipes(patterns: string[], recipes: Recipe[]): Recipe[] {
    const names = recipes.map((r) => r.name);
    const first = patterns[0];
    let result: string[] =
      first === undefined || first.startsWith("!") ? names : [];

    for (const pattern of patterns) {
      if (pattern.startsWith("!")) {
        const toRemove = micromatch(result, pattern.slice(1));
        result = result.filter((name) => !toRemove.includes(name));
      } else {
        result = [...result, ...micromatch(names, pattern)];
      }
    }

    const selected = new Set(result);
    return recipes.filter((recipe) => selected.has(recipe.name));
  }
}
