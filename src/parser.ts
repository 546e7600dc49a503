/**
 * Parser - Single-pass recursive descent translator from Tiny to C.
 *
 * There is no syntax tree: every rule writes its C fragment to the
 * Emitter the moment the construct is recognised, so output order is
 * recognition order.
 *
 * Grammar:
 *
 * program    = nl? statement*
 * statement  = ( "print" (STRING | expression)
 *              | "if" comparison "then" nl block "endif"
 *                  (nl? "elseif" comparison "then" nl block "endif")*
 *                  (nl? "else" nl block "endif")?
 *              | "while" comparison "repeat" nl block "endwhile"
 *              | "label" IDENT
 *              | "goto" IDENT
 *              | ("int" | "flt") IDENT "=" expression
 *              | "str" IDENT "=" STRING
 *              | "input" IDENT
 *              | "arraystart" IDENT (NUMBER | STRING)+ "arrayend"
 *              ) nl
 * block      = statement*
 * comparison = expression (relop expression)+ (("+" | "-") expression)*
 * relop      = "==" | "!=" | ">" | ">=" | "<" | "<="
 * expression = term (("+" | "-") term)*
 * term       = unary (("*" | "/") unary)*
 * unary      = ("+" | "-")? primary
 * primary    = NUMBER | IDENT
 * nl         = NEWLINE+
 */

import { Token, TokenType, TokenSource, Lexer } from "./lexer";
import { Emitter } from "./codegen/emitter";

type NumericType = "int" | "float";

const RELATIONAL_OPS: ReadonlySet<TokenType> = new Set<TokenType>(["EQ", "NEQ", "GT", "GTE", "LT", "LTE"]);

// ============================================================================
// Parser Class
// ============================================================================

export class Parser {
  private tokens: TokenSource;
  private emitter: Emitter;
  private current: Token;
  private lookahead: Token;

  private readonly symbols = new Set<string>();
  private readonly labelsDeclared = new Set<string>();
  private readonly labelsGotoed = new Set<string>();

  constructor(tokens: TokenSource, emitter: Emitter) {
    this.tokens = tokens;
    this.emitter = emitter;
    this.current = tokens.nextToken();
    this.lookahead = tokens.nextToken();
  }

  /**
   * Translate the whole token stream. Throws on the first error; the
   * emitter holds a complete program only when this returns normally.
   */
  program(): void {
    this.emitter.headerLine("#include <stdio.h>");
    this.emitter.headerLine("int main(void){");
    this.emitter.indent("header");

    while (this.check("NEWLINE")) {
      this.advance();
    }

    while (!this.check("EOF")) {
      this.statement();
    }

    this.emitter.emitLine("return 0;");
    this.emitter.dedent("body");
    this.emitter.emitLine("}");

    // Forward jumps are legal, so targets can only be checked now
    for (const label of this.labelsGotoed) {
      if (!this.labelsDeclared.has(label)) {
        throw new UndeclaredLabelError(label);
      }
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private check(type: TokenType): boolean {
    return this.current.type === type;
  }

  private advance(): Token {
    const token = this.current;
    this.current = this.lookahead;
    this.lookahead = this.tokens.nextToken();
    return token;
  }

  private expect(type: TokenType, message: string): Token {
    if (this.check(type)) {
      return this.advance();
    }
    throw new ParseError(`${message} at ${position(this.current)}. Got ${describe(this.current)}`);
  }

  /** Add a variable, writing its declaration the first time the name is seen. */
  private declare(name: string, declaration: string): void {
    if (this.symbols.has(name)) return;
    this.symbols.add(name);
    this.emitter.headerLine(declaration);
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  private statement(): void {
    switch (this.current.type) {
      case "PRINT":
        this.printStatement();
        break;
      case "IF":
        this.ifStatement();
        break;
      case "WHILE":
        this.whileStatement();
        break;
      case "LABEL":
        this.labelStatement();
        break;
      case "GOTO":
        this.gotoStatement();
        break;
      case "INT":
        this.numericAssignment("int");
        break;
      case "FLT":
        this.numericAssignment("float");
        break;
      case "STR":
        this.stringAssignment();
        break;
      case "INPUT":
        this.inputStatement();
        break;
      case "ARRAYSTART":
        this.arrayLiteral();
        break;
      default:
        throw new SemanticError(
          `Invalid statement at '${this.current.value}' (${this.current.type}) at ${position(this.current)}`
        );
    }

    this.nl();
  }

  private printStatement(): void {
    this.advance(); // 'print'

    if (this.check("STRING")) {
      this.emitter.emitLine(`printf("${this.advance().value}\\n");`);
      return;
    }

    this.emitter.emit(`printf("%.2f\\n", (float)(`);
    this.expression();
    this.emitter.emitLine("));");
  }

  private ifStatement(): void {
    this.advance(); // 'if'
    this.emitter.emit("if(");
    this.comparison();
    this.expect("THEN", "Expected 'then' after condition");
    this.nl();
    this.emitter.emitLine("){");
    this.block("ENDIF");

    while (this.continuesWith("ELSEIF")) {
      this.emitter.emit("}else if(");
      this.comparison();
      this.expect("THEN", "Expected 'then' after condition");
      this.nl();
      this.emitter.emitLine("){");
      this.block("ENDIF");
    }

    if (this.continuesWith("ELSE")) {
      this.emitter.emit("}else");
      this.nl();
      this.emitter.emitLine("{");
      this.block("ENDIF");
    }

    this.emitter.emitLine("}");
  }

  /**
   * Consume `type` if it follows the previous `endif` directly or after
   * a single line break.
   */
  private continuesWith(type: "ELSEIF" | "ELSE"): boolean {
    if (this.check("NEWLINE") && this.lookahead.type === type) {
      this.advance();
    }
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private whileStatement(): void {
    this.advance(); // 'while'
    this.emitter.emit("while(");
    this.comparison();
    this.expect("REPEAT", "Expected 'repeat' after loop condition");
    this.nl();
    this.emitter.emitLine("){");
    this.block("ENDWHILE");
    this.emitter.emitLine("}");
  }

  /** Statements up to and including the closing keyword. */
  private block(end: "ENDIF" | "ENDWHILE"): void {
    this.emitter.indent();
    while (!this.check(end)) {
      if (this.check("EOF")) {
        throw new ParseError(`Expected '${end.toLowerCase()}' before end of input at ${position(this.current)}`);
      }
      this.statement();
    }
    this.emitter.dedent();
    this.advance();
  }

  private labelStatement(): void {
    this.advance(); // 'label'
    const name = this.expect("IDENT", "Expected label name after 'label'");

    if (this.labelsDeclared.has(name.value)) {
      throw new SemanticError(`Label already exists: ${name.value} at ${position(name)}`);
    }
    this.labelsDeclared.add(name.value);

    // The empty statement keeps the label valid at the end of a block
    this.emitter.emitLine(`${name.value}:;`);
  }

  private gotoStatement(): void {
    this.advance(); // 'goto'
    const name = this.expect("IDENT", "Expected label name after 'goto'");
    this.labelsGotoed.add(name.value);
    this.emitter.emitLine(`goto ${name.value};`);
  }

  private numericAssignment(type: NumericType): void {
    const keyword = this.advance();
    const name = this.expect("IDENT", `Expected variable name after '${keyword.value}'`).value;
    this.declare(name, `${type} ${name};`);

    this.expect("ASSIGN", "Expected '=' after variable name");
    this.emitter.emit(`${name} = `);
    this.expression();
    this.emitter.emitLine(";");
  }

  private stringAssignment(): void {
    const keyword = this.advance();
    const name = this.expect("IDENT", `Expected variable name after '${keyword.value}'`).value;
    this.declare(name, `char *${name};`);

    this.expect("ASSIGN", "Expected '=' after variable name");
    const text = this.expect("STRING", "Expected string literal").value;
    this.emitter.emitLine(`${name} = "${text}";`);
  }

  private inputStatement(): void {
    this.advance(); // 'input'
    const name = this.expect("IDENT", "Expected variable name after 'input'").value;
    this.declare(name, `float ${name};`);

    // A failed or exhausted read zeroes the variable and drops the rest of the line
    this.emitter.emitLine(`if(1 != scanf("%f", &${name})) {`);
    this.emitter.indent();
    this.emitter.emitLine(`${name} = 0;`);
    this.emitter.emitLine(`scanf("%*[^\\n]");`);
    this.emitter.dedent();
    this.emitter.emitLine("}");
  }

  private arrayLiteral(): void {
    this.advance(); // 'arraystart'
    const name = this.expect("IDENT", "Expected array name after 'arraystart'");

    const elements: Token[] = [];
    while (!this.check("ARRAYEND")) {
      const element = this.current;
      if (element.type !== "NUMBER" && element.type !== "STRING") {
        throw new SemanticError(
          `Illegal element in array: ${describe(element)} at ${position(element)}. Only numbers and strings are allowed`
        );
      }
      const first = elements[0];
      if (first !== undefined && first.type !== element.type) {
        throw new SemanticError(`Array elements must all be numbers or all be strings at ${position(element)}`);
      }
      elements.push(this.advance());
    }

    const first = elements[0];
    if (first === undefined) {
      throw new SemanticError(`Array literal needs at least one element at ${position(this.current)}`);
    }
    this.advance(); // 'arrayend'

    const isString = first.type === "STRING";
    const values = elements.map((e) => (isString ? `"${e.value}"` : e.value));

    // Declared with its initializer the first time, assigned element-wise after
    if (!this.symbols.has(name.value)) {
      this.symbols.add(name.value);
      this.emitter.header(`${isString ? "char *" : "float "}${name.value}[${elements.length}] = {`);
      this.emitter.header(values.join(", "));
      this.emitter.headerLine("};");
      return;
    }
    values.forEach((value, i) => this.emitter.emitLine(`${name.value}[${i}] = ${value};`));
  }

  /** One required line break, extra blank lines collapsed. */
  private nl(): void {
    this.expect("NEWLINE", "Expected end of line");
    while (this.check("NEWLINE")) {
      this.advance();
    }
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private comparison(): void {
    this.expression();

    if (!RELATIONAL_OPS.has(this.current.type)) {
      throw new ParseError(`Expected comparison operator at ${position(this.current)}. Got ${describe(this.current)}`);
    }
    while (RELATIONAL_OPS.has(this.current.type)) {
      this.emitter.emit(this.advance().value);
      this.expression();
    }

    // Trailing +/- terms attach to the comparison as a whole
    while (this.check("PLUS") || this.check("MINUS")) {
      this.emitter.emit(this.advance().value);
      this.expression();
    }
  }

  private expression(): void {
    this.term();
    while (this.check("PLUS") || this.check("MINUS")) {
      this.emitter.emit(this.advance().value);
      this.term();
    }
  }

  private term(): void {
    this.unary();
    while (this.check("STAR") || this.check("SLASH")) {
      this.emitter.emit(this.advance().value);
      this.unary();
    }
  }

  private unary(): void {
    if (this.check("PLUS") || this.check("MINUS")) {
      this.emitter.emit(this.advance().value);
    }
    this.primary();
  }

  private primary(): void {
    if (this.check("NUMBER")) {
      this.emitter.emit(this.advance().value);
      return;
    }

    if (this.check("IDENT")) {
      if (!this.symbols.has(this.current.value)) {
        throw new SemanticError(
          `Referencing variable before assignment: ${this.current.value} at ${position(this.current)}`
        );
      }
      this.emitter.emit(this.advance().value);
      return;
    }

    throw new ParseError(`Unexpected token ${describe(this.current)} at ${position(this.current)}`);
  }
}

function position(token: Token): string {
  return `line ${token.line}, column ${token.column}`;
}

function describe(token: Token): string {
  switch (token.type) {
    case "NEWLINE":
      return "end of line";
    case "EOF":
      return "end of input";
    default:
      return `'${token.value}'`;
  }
}

// ============================================================================
// Errors
// ============================================================================

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class SemanticError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SemanticError";
  }
}

export class UndeclaredLabelError extends SemanticError {
  readonly label: string;

  constructor(label: string) {
    super(`Attempting to GOTO to undeclared label: ${label}`);
    this.name = "UndeclaredLabelError";
    this.label = label;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

export interface CompileOptions {
  /** Indentation string per nesting level (default: "  ") */
  indent?: string;
}

/**
 * Translate Tiny source text into a C program.
 */
export function compile(source: string, options: CompileOptions = {}): string {
  const emitter = new Emitter(options.indent ?? "  ");
  new Parser(new Lexer(source), emitter).program();
  return emitter.build();
}
