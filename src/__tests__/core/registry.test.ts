import { describe, expect, it } from "vitest";
import { parseRecipeFile } from "../../core/parser";
import { RecipeRegistry } from "../../core/registry";
import {
  DefinitionConflictError,
  NoDefaultRecipeError,
  UnknownRecipeError,
} from "../../errors";

function registryFor(source: string): RecipeRegistry {
  const file = parseRecipeFile(source);
  const registry = new RecipeRegistry();
  for (const recipe of file.recipes) {
    registry.register(recipe);
  }
  for (const alias of file.aliases) {
    registry.registerAlias(alias);
  }
  return registry;
}

describe("RecipeRegistry", () => {
  it("resolves recipes by name and alias", () => {
    const registry = registryFor(
      ["alias b := build", "build:", "  cargo build", "test:", "  cargo test"].join(
        "\n"
      )
    );
    expect(registry.resolve("build").name).toBe("build");
    expect(registry.resolve("b").name).toBe("build");
    expect(registry.has("b")).toBe(true);
    expect(registry.aliasesFor("build")).toEqual(["b"]);
    expect(registry.list().map((r) => r.name)).toEqual(["build", "test"]);
  });

  it("matches names exactly", () => {
    const registry = registryFor("build:\n  cargo build");
    expect(() => registry.resolve("buil")).toThrow(
      new UnknownRecipeError("buil")
    );
    expect(() => registry.resolve("Build")).toThrow(UnknownRecipeError);
  });

  it("rejects a recipe defined twice", () => {
    expect(() => registryFor("build:\n  a\nbuild:\n  b")).toThrow(
      "Recipe `build` is defined more than once (line 3)"
    );
  });

  it("rejects an alias that shadows a recipe", () => {
    expect(() =>
      registryFor("alias test := build\nbuild:\n  a\ntest:\n  b")
    ).toThrow(DefinitionConflictError);
  });

  it("rejects an alias to an unknown recipe", () => {
    expect(() => registryFor("alias b := build")).toThrow(
      "Recipe `build` not found (referenced by `alias b`)"
    );
  });

  describe("default recipe", () => {
    it("uses the recipe named default", () => {
      const registry = registryFor("build:\n  a\ndefault:\n  b");
      expect(registry.default().name).toBe("default");
    });

    it("uses the recipe marked [default]", () => {
      const registry = registryFor("build:\n  a\n[default]\ntest:\n  b");
      expect(registry.default().name).toBe("test");
    });

    it("rejects two default claims", () => {
      expect(() =>
        registryFor("[default]\nbuild:\n  a\ndefault:\n  b")
      ).toThrow(
        "Recipes `build` and `default` both claim to be the default recipe"
      );
    });

    it("has no fallback to the first recipe", () => {
      const registry = registryFor("build:\n  a");
      expect(() => registry.default()).toThrow(NoDefaultRecipeError);
    });
  });
});
