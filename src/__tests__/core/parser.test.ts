import { describe, expect, it } from "vitest";
import { DEFAULT_SETTINGS, parseRecipeFile } from "../../core/parser";

const WORKSPACE_SOURCE = [
  'export RUST_BACKTRACE := "1"',
  'kind := "debug"',
  'profile_flag := if kind == "release" { "--release" } else { "" }',
  "",
  "alias b := build",
  "",
  "# Build the workspace",
  "build:",
  "  cargo build {{profile_flag}} --workspace",
  "",
  'run target *args="":',
  "  cargo run -p {{target}} -- {{args}}",
].join("\n");

describe("Parser", () => {
  describe("parseRecipeFile", () => {
    const file = parseRecipeFile(WORKSPACE_SOURCE);

    it("collects variables in order", () => {
      expect(file.assignments.map((a) => a.name)).toEqual([
        "RUST_BACKTRACE",
        "kind",
        "profile_flag",
      ]);
      expect(file.assignments[0]).toMatchObject({
        exported: true,
        expression: { kind: "literal", value: "1" },
      });
      expect(file.assignments[1]?.exported).toBe(false);
      expect(file.assignments[2]?.expression.kind).toBe("conditional");
    });

    it("parses aliases", () => {
      expect(file.aliases).toEqual([
        { name: "b", position: { column: 7, line: 5 }, target: "build" },
      ]);
    });

    it("attaches the comment above a recipe as its doc", () => {
      expect(file.recipes[0]?.name).toBe("build");
      expect(file.recipes[0]?.doc).toBe("Build the workspace");
      expect(file.recipes[1]?.doc).toBeUndefined();
    });

    it("parses body lines into interpolation templates", () => {
      expect(file.recipes[0]?.body).toEqual([
        {
          ignoreFailure: false,
          kind: "command",
          line: 9,
          quiet: false,
          template: {
            kind: "concat",
            parts: [
              { kind: "literal", value: "cargo build " },
              {
                kind: "variable",
                name: "profile_flag",
                position: { column: 17, line: 9 },
              },
              { kind: "literal", value: " --workspace" },
            ],
          },
        },
      ]);
    });

    it("parses parameters with defaults and variadics", () => {
      expect(file.recipes[1]?.parameters).toEqual([
        { exported: false, name: "target" },
        {
          default: { kind: "literal", value: "" },
          exported: false,
          name: "args",
          variadic: "*",
        },
      ]);
    });

    it("resolves parameter names in body lines", () => {
      expect(file.recipes[1]?.body[0]).toMatchObject({
        template: {
          kind: "concat",
          parts: [
            { kind: "literal", value: "cargo run -p " },
            { kind: "parameter", name: "target" },
            { kind: "literal", value: " -- " },
            { kind: "parameter", name: "args" },
          ],
        },
      });
    });

    it("uses default settings when none are given", () => {
      expect(file.settings).toEqual(DEFAULT_SETTINGS);
    });
  });

  it("parses settings", () => {
    const file = parseRecipeFile(
      [
        "set positional-arguments",
        'set shell := ["bash", "-euc"]',
        "set export := false",
        "set quiet = true",
      ].join("\n")
    );

    expect(file.settings).toEqual({
      export: false,
      positionalArguments: true,
      quiet: true,
      shell: { args: ["-euc"], program: "bash" },
    });
  });

  it("parses line modifiers and invocation lines", () => {
    const file = parseRecipeFile(
      [
        "build:",
        "  cargo build",
        "fix:",
        "  -cargo fix",
        "  @cargo fmt --all",
        "  -@cargo udeps",
        "  => build",
      ].join("\n")
    );

    const fix = file.recipes[1];
    expect(fix?.body).toEqual([
      {
        ignoreFailure: true,
        kind: "command",
        line: 4,
        quiet: false,
        template: { kind: "literal", value: "cargo fix" },
      },
      {
        ignoreFailure: false,
        kind: "command",
        line: 5,
        quiet: true,
        template: { kind: "literal", value: "cargo fmt --all" },
      },
      {
        ignoreFailure: true,
        kind: "command",
        line: 6,
        quiet: true,
        template: { kind: "literal", value: "cargo udeps" },
      },
      {
        args: [],
        ignoreFailure: false,
        kind: "invocation",
        line: 7,
        position: { column: 6, line: 7 },
        quiet: false,
        recipe: "build",
      },
    ]);
  });

  it("parses invocation arguments", () => {
    const file = parseRecipeFile(
      ['all *rest:', '  => run "gui" $@', "run target *args:", "  echo"].join(
        "\n"
      )
    );

    expect(file.recipes[0]?.body[0]).toMatchObject({
      args: [{ kind: "literal", value: "gui" }, { kind: "arguments" }],
      kind: "invocation",
      recipe: "run",
    });
  });

  it("parses dependencies with arguments", () => {
    const file = parseRecipeFile(
      ["test: build (run \"gui\" kind)", "  cargo test"].join("\n")
    );

    expect(file.recipes[0]?.dependencies).toEqual([
      { args: [], position: { column: 7, line: 1 }, recipe: "build" },
      {
        args: [
          { kind: "literal", value: "gui" },
          { kind: "variable", name: "kind", position: { column: 24, line: 1 } },
        ],
        position: { column: 14, line: 1 },
        recipe: "run",
      },
    ]);
  });

  it("reads attributes and recipe markers", () => {
    const file = parseRecipeFile(
      [
        "[default]",
        "[private]",
        "help:",
        "  echo help",
        "_hidden:",
        "  echo hidden",
        "@silent:",
        "  echo quiet",
      ].join("\n")
    );

    const [help, hidden, silent] = file.recipes;
    expect(help).toMatchObject({ isDefault: true, private: true });
    expect(hidden).toMatchObject({ isDefault: false, private: true });
    expect(silent).toMatchObject({ private: false, quiet: true });
  });

  it("exports parameters marked with $", () => {
    const file = parseRecipeFile("deploy $target +$hosts:\n  echo");
    expect(file.recipes[0]?.parameters).toEqual([
      { exported: true, name: "target" },
      { exported: true, name: "hosts", variadic: "+" },
    ]);
  });

  it("lets defaults refer to earlier parameters", () => {
    const file = parseRecipeFile('greet name suffix=(name + "!"):\n  echo');
    expect(file.recipes[0]?.parameters[1]?.default).toEqual({
      kind: "concat",
      parts: [
        { kind: "parameter", name: "name", position: { column: 20, line: 1 } },
        { kind: "literal", value: "!" },
      ],
    });
  });

  it("joins continued lines", () => {
    const file = parseRecipeFile(
      ["release:", "  cargo build \\", "    --release", "  echo done"].join(
        "\n"
      )
    );

    expect(file.recipes[0]?.body.map((line) => line.line)).toEqual([2, 4]);
    expect(file.recipes[0]?.body[0]).toMatchObject({
      template: { kind: "literal", value: "cargo build --release" },
    });
  });

  it("skips comments and blank lines inside a body", () => {
    const file = parseRecipeFile(
      ["build:", "  # first", "  cargo build", "", "  cargo doc", "", "next:"].join(
        "\n"
      )
    );

    expect(file.recipes[0]?.body).toHaveLength(2);
    expect(file.recipes.map((r) => r.name)).toEqual(["build", "next"]);
  });

  it("turns {{{{ into a literal {{", () => {
    const file = parseRecipeFile("braces:\n  echo '{{{{literal}}'");
    expect(file.recipes[0]?.body[0]).toMatchObject({
      template: { kind: "literal", value: "echo '{{literal}}'" },
    });
  });

  it("finds the end of an interpolation past nested braces", () => {
    const file = parseRecipeFile(
      'pick:\n  echo {{ if "a" == "a" { "x" } else { "y" }}}!'
    );
    expect(file.recipes[0]?.body[0]).toMatchObject({
      template: {
        kind: "concat",
        parts: [
          { kind: "literal", value: "echo " },
          { kind: "conditional" },
          { kind: "literal", value: "!" },
        ],
      },
    });
  });

  it("forgets a doc comment separated by a blank line", () => {
    const file = parseRecipeFile("# stray\n\nbuild:\n  cargo build");
    expect(file.recipes[0]?.doc).toBeUndefined();
  });

  it("handles an empty file", () => {
    const file = parseRecipeFile("");
    expect(file.recipes).toEqual([]);
    expect(file.assignments).toEqual([]);
    expect(file.aliases).toEqual([]);
  });
});
