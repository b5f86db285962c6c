import { RecipeSyntaxError } from "../errors";
import type { SourcePosition } from "../types";

export type TokenKind =
  | "identifier"
  | "string"
  | "dollar"
  | "arguments"
  | "argumentCount"
  | "colonEquals"
  | "equalsEquals"
  | "bangEquals"
  | "equals"
  | "colon"
  | "comma"
  | "plus"
  | "asterisk"
  | "at"
  | "question"
  | "lparen"
  | "rparen"
  | "lbrace"
  | "rbrace"
  | "lbracket"
  | "rbracket"
  | "eof";

export type Token = {
  kind: TokenKind;
  text: string;
  position: SourcePosition;
};

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_-]/;
const WHITESPACE = /[ \t]/;

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  n: "\n",
  r: "\r",
  t: "\t",
};

const PUNCTUATION: [string, TokenKind][] = [
  [":=", "colonEquals"],
  ["==", "equalsEquals"],
  ["!=", "bangEquals"],
  ["$@", "arguments"],
  ["$#", "argumentCount"],
  ["=", "equals"],
  [":", "colon"],
  [",", "comma"],
  ["+", "plus"],
  ["*", "asterisk"],
  ["@", "at"],
  ["?", "question"],
  ["(", "lparen"],
  [")", "rparen"],
  ["{", "lbrace"],
  ["}", "rbrace"],
  ["[", "lbracket"],
  ["]", "rbracket"],
  ["$", "dollar"],
];

/**
 * Splits one logical line of a recipe file into tokens. A `#` outside a
 * string ends the line.
 */
export class Lexer {
  private index = 0;
  private readonly tokens: Token[] = [];

  constructor(
    private readonly text: string,
    private readonly line: number,
    private readonly startColumn = 1
  ) {}

  tokenize(): Token[] {
    while (this.index < this.text.length) {
      const char = this.text.charAt(this.index);

      if (WHITESPACE.test(char)) {
        this.index++;
      } else if (char === "#") {
        break;
      } else if (IDENTIFIER_START.test(char)) {
        this.readIdentifier();
      } else if (char === '"') {
        this.readCookedString();
      } else if (char === "'") {
        this.readRawString();
      } else {
        this.readPunctuation();
      }
    }

    this.tokens.push({ kind: "eof", position: this.position(), text: "" });
    return this.tokens;
  }

  private position(index = this.index): SourcePosition {
    return { column: this.startColumn + index, line: this.line };
  }

  private readIdentifier(): void {
    const start = this.index;
    while (
      this.index < this.text.length &&
      IDENTIFIER_PART.test(this.text.charAt(this.index))
    ) {
      this.index++;
    }
    this.push("identifier", this.text.slice(start, this.index), start);
  }

  private readCookedString(): void {
    const start = this.index;
    let value = "";
    this.index++;

    while (this.index < this.text.length) {
      const char = this.text.charAt(this.index);
      if (char === '"') {
        this.index++;
        this.push("string", value, start);
        return;
      }
      if (char === "\\") {
        const escaped = ESCAPES[this.text.charAt(this.index + 1)];
        if (escaped === undefined) {
          throw new RecipeSyntaxError(
            "Unknown escape sequence",
            this.position(),
            'one of \\" \\\\ \\n \\r \\t'
          );
        }
        value += escaped;
        this.index += 2;
        continue;
      }
      value += char;
      this.index++;
    }

    throw new RecipeSyntaxError(
      "Unterminated string",
      this.position(start),
      'closing "'
    );
  }

  private readRawString(): void {
    const start = this.index;
    const end = this.text.indexOf("'", start + 1);
    if (end === -1) {
      throw new RecipeSyntaxError(
        "Unterminated string",
        this.position(start),
        "closing '"
      );
    }
    this.index = end + 1;
    this.push("string", this.text.slice(start + 1, end), start);
  }

  private readPunctuation(): void {
    for (const [symbol, kind] of PUNCTUATION) {
      if (this.text.startsWith(symbol, this.index)) {
        const start = this.index;
        this.index += symbol.length;
        this.push(kind, symbol, start);
        return;
      }
    }
    throw new RecipeSyntaxError(
      `Unexpected character '${this.text.charAt(this.index)}'`,
      this.position()
    );
  }

  private push(kind: TokenKind, text: string, start: number): void {
    this.tokens.push({ kind, position: this.position(start), text });
  }
}

/**
 * Cursor over a token list, shared by the header and expression parsers
 */
export class TokenStream {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  peek(offset = 0): Token {
    const token =
      this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
    if (!token) {
      throw new Error("Token stream is empty");
    }
    return token;
  }

  next(): Token {
    const token = this.peek();
    if (token.kind !== "eof") {
      this.index++;
    }
    return token;
  }

  at(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  accept(kind: TokenKind): Token | undefined {
    return this.at(kind) ? this.next() : undefined;
  }

  expect(kind: TokenKind, description: string): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      throw new RecipeSyntaxError(
        `Unexpected ${describe(token)}`,
        token.position,
        description
      );
    }
    return this.next();
  }

  expectEnd(description = "end of line"): void {
    this.expect("eof", description);
  }
}

export function describe(token: Token): string {
  if (token.kind === "eof") {
    return "end of line";
  }
  if (token.kind === "string") {
    return `string "${token.text}"`;
  }
  return `'${token.text}'`;
}

export function tokenize(text: string, line: number, startColumn = 1): Token[] {
  return new Lexer(text, line, startColumn).tokenize();
}
