/**
 * Lexer - Tokenizes Tiny source code on demand.
 */

// ============================================================================
// Token Types
// ============================================================================

export type TokenType =
  // Structure
  | "NEWLINE"
  | "EOF"
  // Literals
  | "NUMBER"
  | "STRING"
  // Identifiers
  | "IDENT"
  // Keywords
  | "LABEL"
  | "GOTO"
  | "PRINT"
  | "INPUT"
  | "INT"
  | "FLT"
  | "STR"
  | "IF"
  | "THEN"
  | "ELSEIF"
  | "ELSE"
  | "ENDIF"
  | "WHILE"
  | "REPEAT"
  | "ENDWHILE"
  | "ARRAYSTART"
  | "ARRAYEND"
  // Operators
  | "ASSIGN"
  | "PLUS"
  | "MINUS"
  | "STAR"
  | "SLASH"
  | "EQ"
  | "NEQ"
  | "LT"
  | "LTE"
  | "GT"
  | "GTE";

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly line: number;
  readonly column: number;
}

/**
 * Pull-based token supply. After the input is exhausted every call
 * returns an EOF token.
 */
export interface TokenSource {
  nextToken(): Token;
}

// ============================================================================
// Keywords
// ============================================================================

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ["label", "LABEL"],
  ["goto", "GOTO"],
  ["print", "PRINT"],
  ["input", "INPUT"],
  ["int", "INT"],
  ["flt", "FLT"],
  ["str", "STR"],
  ["if", "IF"],
  ["then", "THEN"],
  ["elseif", "ELSEIF"],
  ["else", "ELSE"],
  ["endif", "ENDIF"],
  ["while", "WHILE"],
  ["repeat", "REPEAT"],
  ["endwhile", "ENDWHILE"],
  ["arraystart", "ARRAYSTART"],
  ["arrayend", "ARRAYEND"],
]);

// Characters that would corrupt the C format string a literal is copied into.
const ILLEGAL_IN_STRING = new Set(["\r", "\n", "\t", "\\", "%"]);

// ============================================================================
// Lexer Class
// ============================================================================

export class Lexer implements TokenSource {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(source: string) {
    // Terminates the last statement even when the file has no final newline
    this.source = source + "\n";
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.nextToken();
      tokens.push(token);
      if (token.type === "EOF") break;
    }
    return tokens;
  }

  nextToken(): Token {
    this.skipWhitespaceAndComments();
    if (this.isAtEnd()) {
      return { type: "EOF", value: "", line: this.line, column: this.column };
    }

    const ch = this.peek();

    if (ch === "\n") {
      const token: Token = { type: "NEWLINE", value: "\n", line: this.line, column: this.column };
      this.advance();
      return token;
    }

    // Numbers
    if (this.isDigit(ch)) {
      return this.readNumber();
    }

    // Strings
    if (ch === '"') {
      return this.readString();
    }

    // Identifiers and keywords
    if (this.isAlpha(ch)) {
      return this.readIdentifier();
    }

    // Operators
    return this.readOperator();
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    return this.source[this.pos] ?? "";
  }

  private peekNext(): string {
    return this.source[this.pos + 1] ?? "";
  }

  private advance(): string {
    const ch = this.peek();
    this.pos++;
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const ch = this.peek();

      if (ch === " " || ch === "\t" || ch === "\r") {
        this.advance();
      } else if (ch === "#") {
        // Comment runs up to, not including, the line break
        while (!this.isAtEnd() && this.peek() !== "\n") {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private readNumber(): Token {
    const startCol = this.column;
    let value = "";

    // Integer part
    while (this.isDigit(this.peek())) {
      value += this.advance();
    }

    // Decimal part
    if (this.peek() === ".") {
      if (!this.isDigit(this.peekNext())) {
        throw new LexerError(`Illegal character in number at line ${this.line}, column ${this.column + 1}`);
      }
      value += this.advance(); // consume '.'
      while (this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    return { type: "NUMBER", value, line: this.line, column: startCol };
  }

  private readString(): Token {
    const startCol = this.column;
    let value = "";

    this.advance(); // consume opening "

    while (this.peek() !== '"') {
      const ch = this.peek();
      if (ch === "\n") {
        throw new LexerError(`Unterminated string at line ${this.line}, column ${startCol}`);
      }
      if (ILLEGAL_IN_STRING.has(ch)) {
        throw new LexerError(
          `Illegal character ${JSON.stringify(ch)} in string at line ${this.line}, column ${this.column}`
        );
      }
      value += this.advance();
    }

    this.advance(); // consume closing "

    return { type: "STRING", value, line: this.line, column: startCol };
  }

  private readIdentifier(): Token {
    const startCol = this.column;
    let value = "";

    while (this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    const type = KEYWORDS.get(value.toLowerCase()) ?? "IDENT";
    return { type, value, line: this.line, column: startCol };
  }

  private readOperator(): Token {
    const startCol = this.column;
    const ch = this.advance();

    switch (ch) {
      case "+": return { type: "PLUS", value: "+", line: this.line, column: startCol };
      case "-": return { type: "MINUS", value: "-", line: this.line, column: startCol };
      case "*": return { type: "STAR", value: "*", line: this.line, column: startCol };
      case "/": return { type: "SLASH", value: "/", line: this.line, column: startCol };

      case "=":
        if (this.peek() === "=") {
          this.advance();
          return { type: "EQ", value: "==", line: this.line, column: startCol };
        }
        return { type: "ASSIGN", value: "=", line: this.line, column: startCol };

      case "!":
        if (this.peek() === "=") {
          this.advance();
          return { type: "NEQ", value: "!=", line: this.line, column: startCol };
        }
        throw new LexerError(`Unexpected character '!' at line ${this.line}, column ${startCol}. Did you mean '!='?`);

      case "<":
        if (this.peek() === "=") {
          this.advance();
          return { type: "LTE", value: "<=", line: this.line, column: startCol };
        }
        return { type: "LT", value: "<", line: this.line, column: startCol };

      case ">":
        if (this.peek() === "=") {
          this.advance();
          return { type: "GTE", value: ">=", line: this.line, column: startCol };
        }
        return { type: "GT", value: ">", line: this.line, column: startCol };

      default:
        throw new LexerError(`Unexpected character '${ch}' at line ${this.line}, column ${startCol}`);
    }
  }
}

// ============================================================================
// Errors
// ============================================================================

export class LexerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LexerError";
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}

/**
 * Serve a prepared token list through the TokenSource contract.
 * The last token repeats forever, so lists should end with EOF.
 */
export function tokenStream(tokens: readonly Token[]): TokenSource {
  let pos = 0;
  return {
    nextToken(): Token {
      const token = tokens[Math.min(pos, tokens.length - 1)];
      if (token === undefined) {
        return { type: "EOF", value: "", line: 1, column: 1 };
      }
      pos++;
      return token;
    },
  };
}
