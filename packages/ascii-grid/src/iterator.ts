import type { ByteCursor } from "./cursor.js";
import { ParseError } from "./errors.js";
import type { GridHeader } from "./header.js";
import { parseValue } from "./header.js";

/** A cell yielded by the sequential reader. */
export type Cell = [row: number, col: number, value: number];

/**
 * Stream every cell in row-major order, starting with row 0.
 *
 * Reads forward from `dataStart` once and does not use the row index. Each
 * row must hold exactly `numCols` values on its own line; the generator
 * throws at the first cell that cannot be read.
 */
export async function* readCells(
  cursor: ByteCursor,
  header: GridHeader,
  dataStart: number,
): AsyncGenerator<Cell, void, undefined> {
  const { numRows, numCols } = header;
  cursor.seek(dataStart);

  for (let row = 0; row < numRows; row++) {
    for (let col = 0; col < numCols; col++) {
      const token = await cursor.readToken();
      if (token === null) {
        throw new ParseError(
          `Data ends at row ${row}, col ${col} of a ${numRows} x ${numCols} grid`,
          cursor.position,
        );
      }
      if (col === 0 && row > 0 && !token.newline) {
        throw new ParseError(
          `Row ${row - 1} has more than ${numCols} values`,
          token.offset,
        );
      }
      if (col > 0 && token.newline) {
        throw new ParseError(
          `Row ${row} has ${col} values, expected ${numCols}`,
          token.offset,
        );
      }
      yield [row, col, parseValue(token)];
    }
  }
}
