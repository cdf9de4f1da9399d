import type { ByteCursor } from "./cursor.js";
import { OutOfBoundsError, ParseError } from "./errors.js";

/**
 * Lazily built table of the byte offset of each row's first value.
 *
 * Rows are located by scanning forward from the last known row, so entries
 * are only ever appended and the table's length doubles as the scan
 * watermark. Reaching an uncached row costs a scan proportional to its
 * distance from the last known one; {@link RowIndex.build} pays for every row
 * up front instead.
 */
export class RowIndex {
  /** Number of rows declared in the header. */
  readonly numRows: number;

  private readonly cursor: ByteCursor;
  private readonly dataStart: number;
  private readonly offsets: number[] = [];

  constructor(cursor: ByteCursor, dataStart: number, numRows: number) {
    this.cursor = cursor;
    this.dataStart = dataStart;
    this.numRows = numRows;
  }

  /** Number of rows whose offset is known. */
  get size(): number {
    return this.offsets.length;
  }

  /** Whether the offset of `row` is already known. */
  has(row: number): boolean {
    return Number.isInteger(row) && row >= 0 && row < this.offsets.length;
  }

  /** Byte offset of the first value of `row`, scanning to it if needed. */
  async offsetOf(row: number): Promise<number> {
    if (!Number.isInteger(row) || row < 0 || row >= this.numRows) {
      throw new OutOfBoundsError("row", row);
    }
    while (this.offsets.length <= row) {
      await this.scanNext();
    }
    return this.offsets[row];
  }

  /** Locate every remaining row. */
  async build(): Promise<void> {
    while (this.offsets.length < this.numRows) {
      await this.scanNext();
    }

    const cursor = this.cursor;
    cursor.seek(this.offsets[this.numRows - 1]);
    if (await cursor.skipLine()) {
      await cursor.skipWhitespace();
      if (!(await cursor.atEnd())) {
        console.warn(
          `[ascii-grid] Ignoring data after the ${this.numRows} rows declared in the header (at byte ${cursor.position})`,
        );
      }
    }
  }

  /** Find the row after the last known one and record its offset. */
  private async scanNext(): Promise<void> {
    const cursor = this.cursor;
    const known = this.offsets.length;

    if (known === 0) {
      cursor.seek(this.dataStart);
    } else {
      cursor.seek(this.offsets[known - 1]);
      if (!(await cursor.skipLine())) {
        throw missingRows(this.numRows, known, cursor.position);
      }
    }

    await cursor.skipWhitespace();
    if (await cursor.atEnd()) {
      throw missingRows(this.numRows, known, cursor.position);
    }
    this.offsets.push(cursor.position);
  }
}

function missingRows(expected: number, found: number, offset: number) {
  return new ParseError(
    `Expected ${expected} rows but the data ends after ${found}`,
    offset,
  );
}
