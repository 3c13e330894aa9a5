/**
 * Printer class for building OpenDDL text with tab indentation.
 * Maintains an internal stack of indentation levels for nested blocks.
 * Indentation is written lazily, at the first write on each line.
 */
export class Printer {
  private buffer: string = "";
  private indentStack: string[] = [];
  private atLineStart = true;

  constructor(private indentUnit: string = "\t") {}

  /**
   * Write text on the current line (no automatic newline).
   */
  write(text: string): this {
    if (text.length === 0) return this;
    if (this.atLineStart) {
      this.buffer += this.indentStack.join("");
      this.atLineStart = false;
    }
    this.buffer += text;
    return this;
  }

  /**
   * End the current line.
   */
  newline(): this {
    this.buffer += "\n";
    this.atLineStart = true;
    return this;
  }

  /**
   * Write a full line of text at the current indentation.
   */
  line(text: string): this {
    return this.write(text).newline();
  }

  /**
   * Increase indentation for the lines that follow.
   */
  pushIndentation(): this {
    this.indentStack.push(this.indentUnit);
    return this;
  }

  /**
   * Restore to the previous indentation level from the stack.
   */
  popIndentation(): this {
    this.indentStack.pop();
    return this;
  }

  toString(): string {
    return this.buffer;
  }
}
