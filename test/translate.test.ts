/**
 * Tests for the single-pass Tiny to C translation.
 */
import { describe, it, expect } from "vitest";

import {
  compile,
  Emitter,
  Lexer,
  Parser,
  ParseError,
  SemanticError,
  UndeclaredLabelError,
  tokenStream,
} from "../src/index";
import type { Token } from "../src/index";

// Expected output: fixed boilerplate around the given (already indented) lines
function cProgram(...lines: string[]): string {
  return ["#include <stdio.h>", "int main(void){", ...lines, "  return 0;", "}"].join("\n") + "\n";
}

describe("Print", () => {
  it("prints a string literal without a numeric cast", () => {
    expect(compile('print "hello"')).toBe(cProgram('  printf("hello\\n");'));
  });

  it("prints an expression as a two-decimal float", () => {
    expect(compile("int x = 2\nprint x * 3 + 1")).toBe(
      cProgram("  int x;", "  x = 2;", '  printf("%.2f\\n", (float)(x*3+1));')
    );
  });

  it("accepts keywords in upper case", () => {
    expect(compile('PRINT "a"')).toBe(cProgram('  printf("a\\n");'));
  });
});

describe("Declarations", () => {
  it("declares a float and keeps unary signs", () => {
    expect(compile("flt y = -1.5 / 2")).toBe(cProgram("  float y;", "  y = -1.5/2;"));
  });

  it("declares a variable only once", () => {
    const out = compile("int x = 1\nint x = x + 1");
    expect(out).toBe(cProgram("  int x;", "  x = 1;", "  x = x+1;"));
    expect(out.match(/int x;/g)).toHaveLength(1);
  });

  it("keeps the first declaration when another kind reuses the name", () => {
    expect(compile("int x = 1\nflt x = 2")).toBe(cProgram("  int x;", "  x = 1;", "  x = 2;"));
  });

  it("declares before the right-hand side is read", () => {
    expect(compile("int x = x + 1")).toBe(cProgram("  int x;", "  x = x+1;"));
  });

  it("declares and assigns strings", () => {
    expect(compile('str s = "hi there"')).toBe(cProgram("  char *s;", '  s = "hi there";'));
  });

  it("requires a string literal for str", () => {
    expect(() => compile("str s = 5")).toThrow("Expected string literal at line 1, column 9. Got '5'");
  });

  it("lists declarations in first-declaration order", () => {
    expect(compile("int b = 1\nflt a = 2\nint b = 3")).toBe(
      cProgram("  int b;", "  float a;", "  b = 1;", "  a = 2;", "  b = 3;")
    );
  });
});

describe("Input", () => {
  it("emits a guarded read that clears bad input", () => {
    expect(compile("input n\nprint n")).toBe(
      cProgram(
        "  float n;",
        '  if(1 != scanf("%f", &n)) {',
        "    n = 0;",
        '    scanf("%*[^\\n]");',
        "  }",
        '  printf("%.2f\\n", (float)(n));'
      )
    );
  });

  it("does not redeclare an existing variable", () => {
    const out = compile("int n = 1\ninput n");
    expect(out.match(/ n;/g)).toHaveLength(1);
    expect(out).toContain("  int n;\n");
  });
});

describe("Conditionals", () => {
  it("wraps the block in an if", () => {
    expect(compile('if 1 > 0 then\nprint "yes"\nendif')).toBe(
      cProgram("  if(1>0){", '    printf("yes\\n");', "  }")
    );
  });

  it("chains elseif and else", () => {
    const source = [
      "int x = 5",
      "if x > 10 then",
      'print "big"',
      "endif",
      "elseif x > 3 then",
      'print "medium"',
      "endif",
      "else",
      'print "small"',
      "endif",
    ].join("\n");

    expect(compile(source)).toBe(
      cProgram(
        "  int x;",
        "  x = 5;",
        "  if(x>10){",
        '    printf("big\\n");',
        "  }else if(x>3){",
        '    printf("medium\\n");',
        "  }else{",
        '    printf("small\\n");',
        "  }"
      )
    );
  });

  it("chains several elseif branches", () => {
    const source = "int x = 1\nif x == 1 then\nendif\nelseif x == 2 then\nendif\nelseif x == 3 then\nendif";
    expect(compile(source)).toBe(
      cProgram("  int x;", "  x = 1;", "  if(x==1){", "  }else if(x==2){", "  }else if(x==3){", "  }")
    );
  });

  it("accepts else right after endif", () => {
    expect(compile("if 1 < 2 then\nendif else\nendif")).toBe(cProgram("  if(1<2){", "  }else{", "  }"));
  });

  it("ends the chain after a blank line", () => {
    expect(() => compile("if 1 < 2 then\nendif\n\nelse\nendif")).toThrow(
      "Invalid statement at 'else' (ELSE) at line 4, column 1"
    );
  });

  it("balances braces when nested", () => {
    const source = [
      "int i = 0",
      "while i < 3 repeat",
      "if i == 1 then",
      'print "one"',
      "endif",
      "else",
      "if i == 2 then",
      'print "two"',
      "endif",
      "endif",
      "int i = i + 1",
      "endwhile",
    ].join("\n");

    const out = compile(source);
    expect(out).toBe(
      cProgram(
        "  int i;",
        "  i = 0;",
        "  while(i<3){",
        "    if(i==1){",
        '      printf("one\\n");',
        "    }else{",
        "      if(i==2){",
        '        printf("two\\n");',
        "      }",
        "    }",
        "    i = i+1;",
        "  }"
      )
    );
    expect(out.split("{").length).toBe(out.split("}").length);
  });

  it("requires then", () => {
    expect(() => compile('if 1 > 0\nprint "x"\nendif')).toThrow(ParseError);
  });

  it("requires a closing endif", () => {
    expect(() => compile('if 1 > 0 then\nprint "x"')).toThrow(
      "Expected 'endif' before end of input at line 3, column 1"
    );
  });
});

describe("Loops", () => {
  it("emits a while loop", () => {
    expect(compile("int i = 0\nwhile i < 10 repeat\nint i = i + 1\nendwhile")).toBe(
      cProgram("  int i;", "  i = 0;", "  while(i<10){", "    i = i+1;", "  }")
    );
  });

  it("requires a closing endwhile", () => {
    expect(() => compile('while 1 < 2 repeat\nprint "x"')).toThrow(
      "Expected 'endwhile' before end of input at line 3, column 1"
    );
  });
});

describe("Comparisons", () => {
  it("requires a relational operator", () => {
    expect(() => compile("if 1 then\nendif")).toThrow(ParseError);
    expect(() => compile("if 1 then\nendif")).toThrow("Expected comparison operator at line 1, column 6. Got 'then'");
  });

  it("emits chained relational operators in order", () => {
    expect(compile("int a = 1\nif a > 0 == 1 then\nendif")).toBe(
      cProgram("  int a;", "  a = 1;", "  if(a>0==1){", "  }")
    );
  });

  it("keeps arithmetic inside the operands", () => {
    expect(compile("int a = 1\nwhile a * 2 <= 10 - a repeat\nendwhile")).toBe(
      cProgram("  int a;", "  a = 1;", "  while(a*2<=10-a){", "  }")
    );
  });
});

describe("Labels", () => {
  it("allows forward jumps", () => {
    expect(compile('goto end\nprint "skipped"\nlabel end')).toBe(
      cProgram("  goto end;", '  printf("skipped\\n");', "  end:;")
    );
  });

  it("allows backward jumps", () => {
    expect(compile("label top\ngoto top")).toBe(cProgram("  top:;", "  goto top;"));
  });

  it("rejects a duplicate label at the second declaration", () => {
    expect(() => compile("label a\nlabel a")).toThrow(SemanticError);
    expect(() => compile("label a\nlabel a")).toThrow("Label already exists: a at line 2, column 7");
  });

  it("rejects a jump to a label that is never declared", () => {
    expect(() => compile("goto nowhere")).toThrow(UndeclaredLabelError);
    expect(() => compile("goto nowhere")).toThrow("Attempting to GOTO to undeclared label: nowhere");
  });

  it("checks jump targets only after the whole program", () => {
    // The later grammar error wins over the unresolved label
    expect(() => compile("goto nowhere\nprint y")).toThrow("Referencing variable before assignment: y");

    const emitter = new Emitter();
    const parser = new Parser(new Lexer('goto nowhere\nprint "after"'), emitter);
    expect(() => parser.program()).toThrow(UndeclaredLabelError);
    expect(emitter.build()).toBe(cProgram("  goto nowhere;", '  printf("after\\n");'));
  });
});

describe("Arrays", () => {
  it("declares a numeric array with its initializer", () => {
    expect(compile("arraystart nums 1 2.5 3 arrayend")).toBe(cProgram("  float nums[3] = {1, 2.5, 3};"));
  });

  it("declares a string array", () => {
    expect(compile('arraystart words "a" "b" arrayend')).toBe(cProgram('  char *words[2] = {"a", "b"};'));
  });

  it("rejects other token kinds", () => {
    expect(() => compile("int x = 1\narraystart a 1 x arrayend")).toThrow(
      "Illegal element in array: 'x' at line 2, column 16. Only numbers and strings are allowed"
    );
  });

  it("rejects a missing arrayend", () => {
    expect(() => compile("arraystart a 1 2")).toThrow("Illegal element in array: end of line");
  });

  it("rejects mixed element kinds", () => {
    expect(() => compile('arraystart a 1 "b" arrayend')).toThrow(
      "Array elements must all be numbers or all be strings"
    );
  });

  it("rejects empty arrays", () => {
    expect(() => compile("arraystart e arrayend")).toThrow("Array literal needs at least one element");
  });

  it("declares an array once and assigns its elements afterwards", () => {
    const out = compile("arraystart a 1 2 arrayend\narraystart a 3 arrayend");
    expect(out).toBe(cProgram("  float a[2] = {1, 2};", "  a[0] = 3;"));
    expect(out.match(/float a\[/g)).toHaveLength(1);
  });

  it("assigns string elements on a later literal", () => {
    expect(compile('arraystart w "a" "b" arrayend\narraystart w "c" arrayend')).toBe(
      cProgram('  char *w[2] = {"a", "b"};', '  w[0] = "c";')
    );
  });
});

describe("Statements", () => {
  it("skips blank lines and comments", () => {
    expect(compile('\n\n# comment\nprint "a"\n\n\nprint "b" # trailing\n')).toBe(
      cProgram('  printf("a\\n");', '  printf("b\\n");')
    );
  });

  it("translates an empty program", () => {
    expect(compile("")).toBe(cProgram());
  });

  it("rejects use before declaration", () => {
    expect(() => compile("print x")).toThrow(SemanticError);
    expect(() => compile("print x")).toThrow("Referencing variable before assignment: x at line 1, column 7");
  });

  it("names the token of an unknown statement", () => {
    expect(() => compile("x = 1")).toThrow("Invalid statement at 'x' (IDENT) at line 1, column 1");
  });

  it("requires a line break between statements", () => {
    expect(() => compile('print "a" print "b"')).toThrow("Expected end of line at line 1, column 11. Got 'print'");
  });

  it("rejects a missing operand", () => {
    expect(() => compile("int x = ")).toThrow("Unexpected token end of line at line 1, column 9");
  });

  it("honours the indent option", () => {
    expect(compile('if 1 < 2 then\nprint "x"\nendif', { indent: "\t" })).toBe(
      ["#include <stdio.h>", "int main(void){", "\tif(1<2){", '\t\tprintf("x\\n");', "\t}", "\treturn 0;", "}"].join("\n") +
        "\n"
    );
  });

  it("keeps translations independent", () => {
    compile("int x = 1\nlabel a");
    expect(() => compile("print x")).toThrow(SemanticError);
    expect(compile("label a")).toBe(cProgram("  a:;"));
  });

  it("reads from any token source", () => {
    const tokens: Token[] = [
      { type: "PRINT", value: "print", line: 1, column: 1 },
      { type: "NUMBER", value: "7", line: 1, column: 7 },
      { type: "NEWLINE", value: "\n", line: 1, column: 8 },
      { type: "EOF", value: "", line: 2, column: 1 },
    ];
    const emitter = new Emitter();
    new Parser(tokenStream(tokens), emitter).program();
    expect(emitter.build()).toBe(cProgram('  printf("%.2f\\n", (float)(7));'));
  });
});
