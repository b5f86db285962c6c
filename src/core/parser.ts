import debug from "debug";
import { DefinitionConflictError, RecipeSyntaxError } from "../errors";
import type {
  Alias,
  Assignment,
  BodyLine,
  Dependency,
  Expression,
  Parameter,
  Recipe,
  RecipeFile,
  Settings,
  SourcePosition,
} from "../types";
import {
  EMPTY_SCOPE,
  ExpressionParser,
  type ExpressionScope,
} from "./expression-parser";
import { describe, type Token, TokenStream, tokenize } from "./lexer";

const log = debug("ladle:parser");

const LINE_BREAK = /\r?\n/;
const LEADING_WHITESPACE = /^[ \t]+/;
const INTERPOLATION_OPEN = "{{";
const INTERPOLATION_CLOSE = "}}";
const ESCAPED_OPEN = "{{{{";
const INVOCATION_MARKER = "=>";

const BOOLEAN_SETTINGS = {
  export: "export",
  "positional-arguments": "positionalArguments",
  quiet: "quiet",
} as const;

function isBooleanSetting(
  name: string
): name is keyof typeof BOOLEAN_SETTINGS {
  return Object.hasOwn(BOOLEAN_SETTINGS, name);
}

const ATTRIBUTES = new Set(["default", "private"]);

export const DEFAULT_SETTINGS: Settings = Object.freeze({
  export: false,
  positionalArguments: false,
  quiet: false,
  shell: Object.freeze({ args: ["-cu"], program: "sh" }),
});

type Annotations = {
  doc: string[];
  attributes: Set<string>;
  position?: SourcePosition;
};

/**
 * Parses recipe file source into a RecipeFile. Settings, variables, aliases
 * and recipes are only collected here; name conflicts between recipes and
 * aliases are checked by the registry when the file is loaded.
 */
export class Parser {
  private lines: string[] = [];
  private index = 0;
  private settings: Settings = { ...DEFAULT_SETTINGS };
  private readonly seenSettings = new Set<string>();
  private readonly assignments: Assignment[] = [];
  private readonly recipes: Recipe[] = [];
  private readonly aliases: Alias[] = [];
  private annotations: Annotations = { attributes: new Set(), doc: [] };

  parse(source: string): RecipeFile {
    this.lines = source.split(LINE_BREAK);

    while (this.index < this.lines.length) {
      const raw = this.lines[this.index] ?? "";
      const lineNumber = this.index + 1;
      const trimmed = raw.trim();

      if (trimmed === "") {
        this.annotations.doc = [];
        this.index++;
      } else if (trimmed.startsWith("#")) {
        if (!(raw.startsWith("#!") || LEADING_WHITESPACE.test(raw))) {
          this.annotations.doc.push(trimmed.slice(1).trim());
        }
        this.index++;
      } else if (LEADING_WHITESPACE.test(raw)) {
        throw new RecipeSyntaxError(
          "Unexpected indented line outside of a recipe",
          { column: 1, line: lineNumber }
        );
      } else if (raw.startsWith("[")) {
        this.parseAttributes(raw, lineNumber);
        this.index++;
      } else {
        this.parseItem(raw, lineNumber);
      }
    }

    if (this.annotations.attributes.size > 0 && this.annotations.position) {
      throw new RecipeSyntaxError(
        "Attributes must be followed by a recipe",
        this.annotations.position
      );
    }

    log(
      `Parsed ${this.recipes.length} recipes, ${this.assignments.length} variables, ${this.aliases.length} aliases`
    );

    return {
      aliases: this.aliases,
      assignments: this.assignments,
      recipes: this.recipes,
      settings: Object.freeze({
        ...this.settings,
        shell: Object.freeze({ ...this.settings.shell }),
      }),
    };
  }

  private parseItem(raw: string, lineNumber: number): void {
    const tokens = tokenize(raw, lineNumber);
    const [first, second, third] = tokens;
    const assigns = (token?: Token) =>
      token?.kind === "colonEquals" || token?.kind === "equals";

    if (first?.kind === "identifier" && second?.kind === "identifier") {
      if (
        first.text === "set" &&
        (assigns(third) || third?.kind === "eof")
      ) {
        this.requireNoAttributes(first);
        this.parseSetting(new TokenStream(tokens.slice(1)));
        this.index++;
        return;
      }
      if (first.text === "export" && assigns(third)) {
        this.requireNoAttributes(first);
        this.parseAssignment(new TokenStream(tokens.slice(1)), true);
        this.index++;
        return;
      }
      if (first.text === "alias" && assigns(third)) {
        this.requireNoAttributes(first);
        this.parseAlias(new TokenStream(tokens.slice(1)));
        this.index++;
        return;
      }
    }

    if (first?.kind === "identifier" && assigns(second)) {
      this.requireNoAttributes(first);
      this.parseAssignment(new TokenStream(tokens), false);
      this.index++;
      return;
    }

    this.parseRecipe(new TokenStream(tokens));
  }

  private parseSetting(stream: TokenStream): void {
    const name = stream.expect("identifier", "setting name");
    if (this.seenSettings.has(name.text)) {
      throw new DefinitionConflictError(
        `Setting \`${name.text}\` is set more than once`
      );
    }
    this.seenSettings.add(name.text);

    const hasValue =
      stream.accept("colonEquals") !== undefined ||
      stream.accept("equals") !== undefined;

    if (name.text === "shell") {
      if (!hasValue) {
        throw new RecipeSyntaxError(
          "Setting `shell` needs a value",
          name.position,
          "':='"
        );
      }
      this.settings.shell = this.parseShell(stream);
      stream.expectEnd();
      return;
    }

    if (!isBooleanSetting(name.text)) {
      throw new RecipeSyntaxError(
        `Unknown setting \`${name.text}\``,
        name.position
      );
    }
    const key = BOOLEAN_SETTINGS[name.text];

    let value = true;
    if (hasValue) {
      const token = stream.expect("identifier", "true or false");
      if (token.text !== "true" && token.text !== "false") {
        throw new RecipeSyntaxError(
          `Unexpected ${describe(token)}`,
          token.position,
          "true or false"
        );
      }
      value = token.text === "true";
    }
    stream.expectEnd();
    this.settings[key] = value;
  }

  private parseShell(stream: TokenStream): Settings["shell"] {
    stream.expect("lbracket", "'['");
    const program = stream.expect("string", "shell program").text;
    const args: string[] = [];
    while (stream.accept("comma")) {
      args.push(stream.expect("string", "shell argument").text);
    }
    stream.expect("rbracket", "',' or ']'");
    return { args, program };
  }

  private parseAssignment(stream: TokenStream, exported: boolean): void {
    const name = stream.expect("identifier", "variable name");
    if (!stream.accept("colonEquals")) {
      stream.expect("equals", "':='");
    }
    const expression = new ExpressionParser(
      stream,
      EMPTY_SCOPE
    ).parseExpression();
    stream.expectEnd();

    this.assignments.push({
      exported,
      expression,
      name: name.text,
      position: name.position,
    });
  }

  private parseAlias(stream: TokenStream): void {
    const name = stream.expect("identifier", "alias name");
    if (!stream.accept("colonEquals")) {
      stream.expect("equals", "':='");
    }
    const target = stream.expect("identifier", "recipe name");
    stream.expectEnd();
    this.aliases.push({
      name: name.text,
      position: name.position,
      target: target.text,
    });
  }

  private parseAttributes(raw: string, lineNumber: number): void {
    const stream = new TokenStream(tokenize(raw, lineNumber));
    const open = stream.expect("lbracket", "'['");
    do {
      const name = stream.expect("identifier", "attribute name");
      if (!ATTRIBUTES.has(name.text)) {
        throw new RecipeSyntaxError(
          `Unknown attribute \`${name.text}\``,
          name.position,
          "default or private"
        );
      }
      this.annotations.attributes.add(name.text);
    } while (stream.accept("comma"));
    stream.expect("rbracket", "',' or ']'");
    stream.expectEnd();
    this.annotations.position ??= open.position;
  }

  // biome-ignore lint/complexity/noExcessiveCognitiveComplexity: header grammar is parsed in one pass
  private parseRecipe(stream: TokenStream): void {
    const quiet = stream.accept("at") !== undefined;
    const name = stream.expect("identifier", "recipe name");

    const parameters: Parameter[] = [];
    let sawDefault = false;
    while (!stream.at("colon")) {
      const parameter = this.parseParameter(stream, parameters);
      const variadicBefore = parameters.find((p) => p.variadic);
      if (variadicBefore) {
        throw new RecipeSyntaxError(
          `Variadic parameter \`${variadicBefore.name}\` must be the last parameter`,
          name.position
        );
      }
      const required =
        parameter.default === undefined && parameter.variadic !== "*";
      if (required && sawDefault) {
        throw new RecipeSyntaxError(
          `Required parameter \`${parameter.name}\` follows a parameter with a default`,
          name.position
        );
      }
      sawDefault ||= parameter.default !== undefined;
      parameters.push(parameter);
    }
    stream.expect("colon", "':'");

    const scope: ExpressionScope = {
      parameters: new Set(parameters.map((p) => p.name)),
    };

    const dependencies: Dependency[] = [];
    while (!stream.at("eof")) {
      dependencies.push(this.parseDependency(stream, scope));
    }

    const { attributes, doc } = this.annotations;
    this.annotations = { attributes: new Set(), doc: [] };

    this.index++;
    const body = this.parseBody(scope);

    const recipe: Recipe = {
      body,
      dependencies,
      doc: doc.length > 0 ? doc.join(" ") : undefined,
      isDefault: attributes.has("default"),
      name: name.text,
      parameters,
      position: name.position,
      private: attributes.has("private") || name.text.startsWith("_"),
      quiet,
    };
    log(`Recipe ${recipe.name}:`, {
      dependencies: dependencies.map((d) => d.recipe),
      lines: body.length,
      parameters: parameters.map((p) => p.name),
    });
    this.recipes.push(recipe);
  }

  private parseParameter(
    stream: TokenStream,
    earlier: Parameter[]
  ): Parameter {
    let variadic: Parameter["variadic"];
    if (stream.accept("asterisk")) {
      variadic = "*";
    } else if (stream.accept("plus")) {
      variadic = "+";
    }
    const exported = stream.accept("dollar") !== undefined;
    const name = stream.expect("identifier", "parameter name or ':'");

    if (earlier.some((p) => p.name === name.text)) {
      throw new RecipeSyntaxError(
        `Duplicate parameter \`${name.text}\``,
        name.position
      );
    }

    let defaultValue: Expression | undefined;
    if (stream.accept("equals")) {
      defaultValue = new ExpressionParser(stream, {
        parameters: new Set(earlier.map((p) => p.name)),
      }).parseAtom();
    }

    return {
      default: defaultValue,
      exported,
      name: name.text,
      variadic,
    };
  }

  private parseDependency(
    stream: TokenStream,
    scope: ExpressionScope
  ): Dependency {
    const simple = stream.accept("identifier");
    if (simple) {
      return { args: [], position: simple.position, recipe: simple.text };
    }

    stream.expect("lparen", "dependency name or '('");
    const target = stream.expect("identifier", "dependency name");
    const parser = new ExpressionParser(stream, scope);
    const args: Expression[] = [];
    while (!stream.at("rparen")) {
      args.push(parser.parseAtom());
    }
    stream.expect("rparen", "')'");
    return { args, position: target.position, recipe: target.text };
  }

  private parseBody(scope: ExpressionScope): BodyLine[] {
    const body: BodyLine[] = [];

    while (this.index < this.lines.length) {
      const raw = this.lines[this.index] ?? "";
      const lineNumber = this.index + 1;
      const indent = LEADING_WHITESPACE.exec(raw)?.[0].length ?? 0;

      if (raw.trim() === "") {
        this.index++;
        continue;
      }
      if (indent === 0) {
        break;
      }
      this.index++;

      let text = raw.slice(indent).trimEnd();
      if (text.startsWith("#")) {
        continue;
      }
      text = this.joinContinuations(text);

      body.push(this.parseBodyLine(text, lineNumber, indent + 1, scope));
    }

    return body;
  }

  private joinContinuations(text: string): string {
    let joined = text;
    while (joined.endsWith("\\") && this.index < this.lines.length) {
      const next = this.lines[this.index] ?? "";
      if (!LEADING_WHITESPACE.test(next)) {
        break;
      }
      joined = joined.slice(0, -1) + next.trim();
      this.index++;
    }
    return joined;
  }

  private parseBodyLine(
    text: string,
    line: number,
    column: number,
    scope: ExpressionScope
  ): BodyLine {
    let quiet = false;
    let ignoreFailure = false;
    let offset = 0;

    for (; offset < text.length; offset++) {
      const char = text.charAt(offset);
      if (char === "@" && !quiet) {
        quiet = true;
      } else if (char === "-" && !ignoreFailure) {
        ignoreFailure = true;
      } else {
        break;
      }
    }

    const rest = text.slice(offset);
    const restColumn = column + offset;

    if (rest.startsWith(INVOCATION_MARKER)) {
      const stream = new TokenStream(
        tokenize(
          rest.slice(INVOCATION_MARKER.length),
          line,
          restColumn + INVOCATION_MARKER.length
        )
      );
      const target = stream.expect("identifier", "recipe name");
      const parser = new ExpressionParser(stream, scope);
      const args: Expression[] = [];
      while (!stream.at("eof")) {
        args.push(parser.parseAtom());
      }
      return {
        args,
        ignoreFailure,
        kind: "invocation",
        line,
        position: target.position,
        quiet,
        recipe: target.text,
      };
    }

    return {
      ignoreFailure,
      kind: "command",
      line,
      quiet,
      template: parseTemplate(rest, line, restColumn, scope),
    };
  }

  private requireNoAttributes(token: Token): void {
    if (this.annotations.attributes.size > 0) {
      throw new RecipeSyntaxError(
        "Attributes must be followed by a recipe",
        token.position
      );
    }
    this.annotations.doc = [];
  }
}

/**
 * Parses a body line into literal text and `{{ expression }}` parts.
 * `{{{{` produces a literal `{{`.
 */
export function parseTemplate(
  text: string,
  line: number,
  column: number,
  scope: ExpressionScope
): Expression {
  const parts: Expression[] = [];
  let literal = "";
  let i = 0;

  const flush = () => {
    if (literal !== "") {
      parts.push({ kind: "literal", value: literal });
      literal = "";
    }
  };

  while (i < text.length) {
    if (text.startsWith(ESCAPED_OPEN, i)) {
      literal += INTERPOLATION_OPEN;
      i += ESCAPED_OPEN.length;
    } else if (text.startsWith(INTERPOLATION_OPEN, i)) {
      const start = i + INTERPOLATION_OPEN.length;
      const end = findInterpolationEnd(text, start);
      if (end === -1) {
        throw new RecipeSyntaxError(
          "Unterminated interpolation",
          { column: column + i, line },
          "'}}'"
        );
      }
      flush();
      const stream = new TokenStream(
        tokenize(text.slice(start, end), line, column + start)
      );
      parts.push(new ExpressionParser(stream, scope).parseExpression());
      stream.expectEnd("'}}'");
      i = end + INTERPOLATION_CLOSE.length;
    } else {
      literal += text.charAt(i);
      i++;
    }
  }
  flush();

  const [first] = parts;
  if (!first) {
    return { kind: "literal", value: "" };
  }
  return parts.length === 1 ? first : { kind: "concat", parts };
}

function findInterpolationEnd(text: string, start: number): number {
  let depth = 0;
  let quote: string | undefined;

  for (let i = start; i < text.length; i++) {
    const char = text.charAt(i);
    if (quote) {
      if (quote === '"' && char === "\\") {
        i++;
      } else if (char === quote) {
        quote = undefined;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "{") {
      depth++;
    } else if (char === "}") {
      if (depth === 0 && text.startsWith(INTERPOLATION_CLOSE, i)) {
        return i;
      }
      depth = Math.max(0, depth - 1);
    }
  }
  return -1;
}

export function parseRecipeFile(source: string): RecipeFile {
  const parser = new Parser();
  return parser.parse(source);
}
