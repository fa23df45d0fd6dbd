import { WorldMapFormatError } from "./errors.js";

export class LineReader {
  private readonly lines: string[];
  private offset = 0;

  public constructor(text: string) {
    const lines = text.split(/\r\n|\r|\n/);
    // A terminator at the very end closes the last line; it does not open a new one.
    if (lines[lines.length - 1] === "") lines.pop();
    this.lines = lines;
  }

  public remaining(): number {
    return this.lines.length - this.offset;
  }

  public atEnd(): boolean {
    return this.remaining() === 0;
  }

  /** 1-based number of the line the next readLine() returns. */
  public lineNumber(): number {
    return this.offset + 1;
  }

  public readLine(): string {
    const line = this.lines[this.offset];
    if (line === undefined) {
      throw new WorldMapFormatError("Unexpected end of input", this.lineNumber());
    }
    this.offset += 1;
    return line;
  }
}

export class LineWriter {
  private readonly lines: string[] = [];

  public writeLine(line = ""): void {
    if (/[\r\n]/.test(line)) throw new Error(`Line contains a line break: '${line}'`);
    this.lines.push(line);
  }

  public toString(): string {
    return this.lines.map((l) => l + "\n").join("");
  }
}
