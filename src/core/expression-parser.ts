import { RecipeSyntaxError } from "../errors";
import type { Condition, Expression, SourcePosition } from "../types";
import { builtinFunctions } from "./functions";
import { describe, type TokenStream } from "./lexer";

const KEYWORDS = new Set(["if", "else"]);

/** Names that resolve to recipe parameters instead of file variables. */
export type ExpressionScope = {
  parameters: ReadonlySet<string>;
};

export const EMPTY_SCOPE: ExpressionScope = { parameters: new Set() };

/**
 * Recursive-descent parser for interpolation expressions:
 *
 *   expression := "if" condition "{" expression "}" "else" ("{" expression "}" | if)
 *               | concat [("==" | "!=") concat "?" expression ":" expression]
 *   concat     := atom (["+"] atom)*
 *   atom       := STRING | NAME | NAME "(" args ")" | "$@" | "$#" | "(" expression ")"
 */
export class ExpressionParser {
  constructor(
    private readonly stream: TokenStream,
    private readonly scope: ExpressionScope
  ) {}

  parseExpression(): Expression {
    if (this.atKeyword("if")) {
      return this.parseIf();
    }

    const left = this.parseConcat();
    const operator = this.acceptComparison();
    if (!operator) {
      return left;
    }

    const right = this.parseConcat();
    this.stream.expect("question", "'?'");
    const then = this.parseExpression();
    this.stream.expect("colon", "':'");
    const otherwise = this.parseExpression();
    return {
      condition: { left, operator, right },
      kind: "conditional",
      otherwise,
      then,
    };
  }

  parseAtom(): Expression {
    const token = this.stream.peek();

    switch (token.kind) {
      case "string":
        this.stream.next();
        return { kind: "literal", value: token.text };
      case "arguments":
        this.stream.next();
        return { kind: "arguments", position: token.position };
      case "argumentCount":
        this.stream.next();
        return { kind: "argumentCount" };
      case "lparen": {
        this.stream.next();
        const inner = this.parseExpression();
        this.stream.expect("rparen", "')'");
        return inner;
      }
      case "identifier":
        if (KEYWORDS.has(token.text)) {
          break;
        }
        this.stream.next();
        if (this.stream.at("lparen")) {
          return this.parseCall(token.text, token.position);
        }
        return this.scope.parameters.has(token.text)
          ? { kind: "parameter", name: token.text, position: token.position }
          : { kind: "variable", name: token.text, position: token.position };
      default:
        break;
    }

    throw new RecipeSyntaxError(
      `Unexpected ${describe(token)}`,
      token.position,
      "an expression"
    );
  }

  startsAtom(): boolean {
    const token = this.stream.peek();
    switch (token.kind) {
      case "string":
      case "arguments":
      case "argumentCount":
      case "lparen":
        return true;
      case "identifier":
        return !KEYWORDS.has(token.text);
      default:
        return false;
    }
  }

  private parseIf(): Expression {
    this.stream.next();
    const condition = this.parseCondition();
    this.stream.expect("lbrace", "'{'");
    const then = this.parseExpression();
    this.stream.expect("rbrace", "'}'");

    const elseToken = this.stream.peek();
    if (!this.atKeyword("else")) {
      throw new RecipeSyntaxError(
        `Unexpected ${describe(elseToken)}`,
        elseToken.position,
        "'else'"
      );
    }
    this.stream.next();

    let otherwise: Expression;
    if (this.atKeyword("if")) {
      otherwise = this.parseIf();
    } else {
      this.stream.expect("lbrace", "'{'");
      otherwise = this.parseExpression();
      this.stream.expect("rbrace", "'}'");
    }

    return { condition, kind: "conditional", otherwise, then };
  }

  private parseCondition(): Condition {
    const left = this.parseConcat();
    const operator = this.acceptComparison();
    if (!operator) {
      const token = this.stream.peek();
      throw new RecipeSyntaxError(
        `Unexpected ${describe(token)}`,
        token.position,
        "'==' or '!='"
      );
    }
    const right = this.parseConcat();
    return { left, operator, right };
  }

  private parseConcat(): Expression {
    const parts = [this.parseAtom()];
    for (;;) {
      if (this.stream.accept("plus")) {
        parts.push(this.parseAtom());
      } else if (this.startsAtom()) {
        parts.push(this.parseAtom());
      } else {
        break;
      }
    }
    const [first] = parts;
    return parts.length === 1 && first ? first : { kind: "concat", parts };
  }

  private parseCall(name: string, position: SourcePosition): Expression {
    const builtin = builtinFunctions.get(name);
    if (!builtin) {
      throw new RecipeSyntaxError(`Unknown function \`${name}\``, position);
    }

    this.stream.expect("lparen", "'('");
    const args: Expression[] = [];
    if (!this.stream.at("rparen")) {
      args.push(this.parseExpression());
      while (this.stream.accept("comma")) {
        args.push(this.parseExpression());
      }
    }
    this.stream.expect("rparen", "',' or ')'");

    if (args.length < builtin.minArgs || args.length > builtin.maxArgs) {
      const expected =
        builtin.minArgs === builtin.maxArgs
          ? `${builtin.minArgs}`
          : `at least ${builtin.minArgs}`;
      throw new RecipeSyntaxError(
        `Function \`${name}\` takes ${expected} argument(s) but got ${args.length}`,
        position
      );
    }

    return { args, kind: "call", name, position };
  }

  private acceptComparison(): "==" | "!=" | undefined {
    if (this.stream.accept("equalsEquals")) {
      return "==";
    }
    if (this.stream.accept("bangEquals")) {
      return "!=";
    }
    return undefined;
  }

  private atKeyword(keyword: string): boolean {
    const token = this.stream.peek();
    return token.kind === "identifier" && token.text === keyword;
  }
}
