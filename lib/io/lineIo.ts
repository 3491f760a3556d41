/**
 * Line-oriented input and output used by the builtins and the interpreter.
 *
 * @module
 */
import { readSync } from "node:fs";
import { StringDecoder } from "node:string_decoder";

export interface LineReader {
  /** The next line without its terminator, or null at end of input. */
  readLine(): string | null;
}

export interface LineWriter {
  writeLine(text: string): void;
}

const STDIN_FD = 0;
const CHUNK_SIZE = 4096;

const isErrnoException = (e: unknown): e is NodeJS.ErrnoException =>
  e instanceof Error && "code" in e;

/**
 * Reads a file descriptor synchronously, buffering whatever follows the
 * current line for the next call.
 */
export class FdLineReader implements LineReader {
  private pending = "";
  private eof = false;
  private readonly decoder = new StringDecoder("utf8");

  constructor(private readonly fd: number) {}

  readLine(): string | null {
    const chunk = Buffer.alloc(CHUNK_SIZE);

    while (!this.eof && !this.pending.includes("\n")) {
      let bytesRead: number;
      try {
        bytesRead = readSync(this.fd, chunk, 0, CHUNK_SIZE, null);
      } catch (e) {
        // non-blocking stdin reports EAGAIN until data arrives
        if (isErrnoException(e) && e.code === "EAGAIN") continue;
        if (isErrnoException(e) && e.code === "EOF") {
          bytesRead = 0;
        } else {
          throw e;
        }
      }
      if (bytesRead === 0) {
        this.eof = true;
        this.pending += this.decoder.end();
      } else {
        this.pending += this.decoder.write(chunk.subarray(0, bytesRead));
      }
    }

    const newline = this.pending.indexOf("\n");
    if (newline === -1) {
      if (this.pending.length === 0) {
        return null;
      }
      const last = this.pending;
      this.pending = "";
      return last;
    }

    const line = this.pending.slice(0, newline).replace(/\r$/, "");
    this.pending = this.pending.slice(newline + 1);
    return line;
  }
}

export const stdinLineReader = (): LineReader => new FdLineReader(STDIN_FD);

export const stdoutLineWriter = (): LineWriter => ({
  writeLine: (text: string) => {
    process.stdout.write(`${text}\n`);
  },
});
