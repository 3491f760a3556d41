import { WHITESPACE_REGEX } from "./consts.js";

/**
 * A cursor over the characters of one source line.
 */
export class LineBuffer {
  readonly buf: string;
  idx: number;

  public constructor(buf: string) {
    this.buf = buf;
    this.idx = 0;
  }

  /**
   * The 1-based column of the character under the cursor.
   */
  get col(): number {
    return this.idx + 1;
  }

  /**
   * Advances the index while there is whitespace.
   */
  skipWhitespace(): void {
    while (
      this.idx < this.buf.length && WHITESPACE_REGEX.test(this.buf[this.idx])
    ) {
      this.idx++;
    }
  }

  /**
   * Returns the character `offset` places past the cursor, or null past the
   * end of the line. Does not skip whitespace.
   */
  peek(offset = 0): string | null {
    const at = this.idx + offset;
    return at < this.buf.length ? this.buf[at] : null;
  }

  /**
   * Returns whether the text under the cursor starts with `text`.
   */
  lookingAt(text: string): boolean {
    return this.buf.startsWith(text, this.idx);
  }

  /**
   * Consumes `count` characters and returns them.
   */
  consume(count = 1): string {
    const taken = this.buf.slice(this.idx, this.idx + count);
    this.idx = Math.min(this.buf.length, this.idx + count);
    return taken;
  }
}
