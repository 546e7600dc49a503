/**
 * Tiny to C translator.
 */

// Tokens
export { Lexer, LexerError, tokenize, tokenStream } from "./lexer";
export type { Token, TokenType, TokenSource } from "./lexer";

// Translation
export { Parser, ParseError, SemanticError, UndeclaredLabelError, compile } from "./parser";
export type { CompileOptions } from "./parser";

// Output buffers
export { Emitter, CodeBuilder } from "./codegen";
export type { Region } from "./codegen";
