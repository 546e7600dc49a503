/**
 * Emitter - the two output regions of a translation.
 *
 * The header receives the fixed boilerplate and variable declarations,
 * the body receives statements in program order and starts one level
 * deep, inside the entry point. Both only grow; build() joins them
 * header first.
 */

import { CodeBuilder } from "./code-builder";

export type Region = "header" | "body";

export class Emitter {
  private readonly regions: Record<Region, CodeBuilder>;

  constructor(indent: string = "  ") {
    this.regions = {
      header: new CodeBuilder(indent),
      body: new CodeBuilder(indent, 1),
    };
  }

  /** Append to the body without ending the line. */
  emit(code: string): void {
    this.regions.body.write(code);
  }

  emitLine(code: string): void {
    this.regions.body.writeLine(code);
  }

  /** Append to the header without ending the line. */
  header(code: string): void {
    this.regions.header.write(code);
  }

  headerLine(code: string): void {
    this.regions.header.writeLine(code);
  }

  indent(region: Region = "body"): void {
    this.regions[region].indent();
  }

  dedent(region: Region = "body"): void {
    this.regions[region].dedent();
  }

  build(): string {
    return this.regions.header.build() + this.regions.body.build();
  }
}
