import { IoError } from "./errors.js";
import type { ByteSource } from "./source.js";

const LF = 0x0a;

/** Default number of bytes requested from the source per fetch. */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

const decoder = new TextDecoder("latin1");

/** Space, tab, LF, VT, FF and CR. */
export function isSpace(byte: number): boolean {
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}

/**
 * HTTP sources reject a range that starts at or past the end of the resource
 * with status 416 instead of returning no bytes.
 */
function isRangeNotSatisfiable(err: unknown): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === 416
  );
}

/** A whitespace-delimited token read from the source. */
export type Token = {
  text: string;
  /** Byte offset of the token's first character. */
  offset: number;
  /** Whether a line break was crossed between the previous token and this one. */
  newline: boolean;
};

/** A line read from the source, without its line break. */
export type Line = {
  text: string;
  /** Byte offset of the line's first character. */
  offset: number;
};

/**
 * A forward-reading cursor over a {@link ByteSource}.
 *
 * Bytes are fetched `chunkSize` at a time and only the current chunk is kept,
 * so memory use does not depend on the size of the source. The total size is
 * never asked for: the end of data is the first fetch that returns nothing.
 */
export class ByteCursor {
  private readonly source: ByteSource;
  private readonly chunkSize: number;

  private buffer = new Uint8Array(0);
  private bufferStart = 0;
  private pos: number;
  /** Offset at which the source returned no more bytes, once known. */
  private end: number | null = null;

  constructor(source: ByteSource, offset = 0, chunkSize = DEFAULT_CHUNK_SIZE) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    this.source = source;
    this.chunkSize = chunkSize;
    this.pos = offset;
  }

  /** Offset of the next byte to be read. */
  get position(): number {
    return this.pos;
  }

  /** Move to an absolute offset. The current chunk is reused when it covers it. */
  seek(offset: number): void {
    this.pos = offset;
  }

  /**
   * Ensure the byte at the current position is buffered.
   *
   * @returns false at the end of the data.
   */
  private async fill(): Promise<boolean> {
    const index = this.pos - this.bufferStart;
    if (index >= 0 && index < this.buffer.length) {
      return true;
    }
    if (this.end !== null && this.pos >= this.end) {
      return false;
    }

    let bytes: ArrayBuffer;
    try {
      bytes = await this.source.fetch(this.pos, this.chunkSize);
    } catch (err) {
      if (isRangeNotSatisfiable(err)) {
        this.buffer = new Uint8Array(0);
        this.bufferStart = this.pos;
        this.end = this.pos;
        return false;
      }
      throw new IoError(
        `Failed to read ${this.chunkSize} bytes at offset ${this.pos} from ${this.source.url}`,
        { cause: err },
      );
    }

    this.buffer = new Uint8Array(bytes);
    this.bufferStart = this.pos;
    if (this.buffer.length === 0) {
      this.end = this.pos;
      return false;
    }
    return true;
  }

  /** Whether every byte of the source has been read. */
  async atEnd(): Promise<boolean> {
    return !(await this.fill());
  }

  /**
   * Skip spaces and line breaks.
   *
   * @returns whether a line break was skipped.
   */
  async skipWhitespace(): Promise<boolean> {
    let newline = false;
    while (await this.fill()) {
      const chunkEnd = this.bufferStart + this.buffer.length;
      while (this.pos < chunkEnd) {
        const byte = this.buffer[this.pos - this.bufferStart];
        if (!isSpace(byte)) {
          return newline;
        }
        if (byte === LF) {
          newline = true;
        }
        this.pos++;
      }
    }
    return newline;
  }

  /**
   * Move past the next line feed.
   *
   * @returns false if the data ended first.
   */
  async skipLine(): Promise<boolean> {
    while (await this.fill()) {
      const index = this.buffer.indexOf(LF, this.pos - this.bufferStart);
      if (index !== -1) {
        this.pos = this.bufferStart + index + 1;
        return true;
      }
      this.pos = this.bufferStart + this.buffer.length;
    }
    return false;
  }

  /** Read the next token, or null at the end of the data. */
  async readToken(): Promise<Token | null> {
    const newline = await this.skipWhitespace();
    const offset = this.pos;
    let text = "";

    while (await this.fill()) {
      const start = this.pos - this.bufferStart;
      let index = start;
      while (index < this.buffer.length && !isSpace(this.buffer[index])) {
        index++;
      }
      text += decoder.decode(this.buffer.subarray(start, index));
      this.pos = this.bufferStart + index;
      if (index < this.buffer.length) {
        break;
      }
    }

    return text.length === 0 ? null : { text, offset, newline };
  }

  /** Read up to and past the next line feed, or null at the end of the data. */
  async readLine(): Promise<Line | null> {
    const offset = this.pos;
    let text = "";

    while (await this.fill()) {
      const start = this.pos - this.bufferStart;
      const index = this.buffer.indexOf(LF, start);
      const stop = index === -1 ? this.buffer.length : index;
      text += decoder.decode(this.buffer.subarray(start, stop));
      if (index !== -1) {
        this.pos = this.bufferStart + index + 1;
        return { text, offset };
      }
      this.pos = this.bufferStart + this.buffer.length;
    }

    return this.pos === offset ? null : { text, offset };
  }
}
