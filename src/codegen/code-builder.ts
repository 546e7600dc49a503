/**
 * CodeBuilder - line-oriented text accumulator.
 *
 * Finished lines are kept apart from the line under construction, which
 * receives its indentation when its first fragment arrives. Fragments of
 * one line can therefore be appended piece by piece.
 */

export class CodeBuilder {
  private readonly lines: string[] = [];
  // null while no fragment of the current line has been written
  private open: string | null = null;
  private level: number;
  private readonly unit: string;

  constructor(unit: string = "  ", level: number = 0) {
    this.unit = unit;
    this.level = level;
  }

  write(content: string): this {
    content.split("\n").forEach((fragment, i) => {
      if (i > 0) this.newline();
      if (fragment.length > 0) {
        this.open = (this.open ?? this.unit.repeat(this.level)) + fragment;
      }
    });
    return this;
  }

  newline(): this {
    this.lines.push(this.open ?? "");
    this.open = null;
    return this;
  }

  writeLine(content: string = ""): this {
    return this.write(content).newline();
  }

  indent(): this {
    this.level++;
    return this;
  }

  dedent(): this {
    this.level = Math.max(0, this.level - 1);
    return this;
  }

  build(): string {
    const closed = this.lines.map((line) => line + "\n").join("");
    return this.open === null ? closed : closed + this.open;
  }
}
