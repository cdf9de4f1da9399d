import type { ByteCursor, Token } from "./cursor.js";
import { HeaderError, OutOfBoundsError, ParseError } from "./errors.js";
import type { Affine, CellOffset } from "./transform.js";
import { applyGeoTransform, CELL_OFFSETS, northUp } from "./transform.js";

/**
 * Whether `xllcorner`/`yllcorner` (the lower-left corner of the lower-left
 * cell) or `xllcenter`/`yllcenter` (its centre) was given.
 */
export type CornerType = "corner" | "center";

/** Values read from the header, before any normalisation. */
export type HeaderFields = {
  numCols: number;
  numRows: number;
  /** Lower-left x, as written in the header. */
  xll: number;
  /** Lower-left y, as written in the header. */
  yll: number;
  cellSize: number;
  nodata: number | null;
  cornerType: CornerType;
};

type HeaderField = "ncols" | "nrows" | "xll" | "yll" | "cellsize" | "nodata";

const HEADER_KEYS = new Map<string, HeaderField>([
  ["ncols", "ncols"],
  ["nrows", "nrows"],
  ["xllcorner", "xll"],
  ["xllcenter", "xll"],
  ["yllcorner", "yll"],
  ["yllcenter", "yll"],
  ["cellsize", "cellsize"],
  ["nodata_value", "nodata"],
]);

const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const COUNT_RE = /^\+?\d+$/;

/**
 * Parse a numeric literal in the grid's syntax.
 *
 * @returns null when `text` is not a number.
 */
export function parseNumber(text: string): number | null {
  return FLOAT_RE.test(text) ? Number(text) : null;
}

/**
 * Immutable description of the grid geometry.
 *
 * Row 0 is the northern edge: rows grow downward while y grows upward.
 */
export class GridHeader {
  readonly numCols: number;
  readonly numRows: number;
  /** x of the grid's west edge. */
  readonly minX: number;
  /** y of the grid's south edge. */
  readonly minY: number;
  readonly cellSize: number;
  /** The no-data sentinel, or null if the header declares none. */
  readonly nodata: number | null;
  readonly cornerType: CornerType;

  constructor(fields: HeaderFields) {
    const { numCols, numRows, xll, yll, cellSize, nodata, cornerType } =
      fields;

    if (!Number.isInteger(numCols) || numCols <= 0) {
      throw new HeaderError(`ncols must be a positive integer, got ${numCols}`);
    }
    if (!Number.isInteger(numRows) || numRows <= 0) {
      throw new HeaderError(`nrows must be a positive integer, got ${numRows}`);
    }
    if (!Number.isFinite(cellSize) || cellSize <= 0) {
      throw new HeaderError(`cellsize must be positive, got ${cellSize}`);
    }
    if (!Number.isFinite(xll) || !Number.isFinite(yll)) {
      throw new HeaderError(`Lower-left corner (${xll}, ${yll}) is not finite`);
    }

    this.numCols = numCols;
    this.numRows = numRows;
    this.cellSize = cellSize;
    this.nodata = nodata;
    this.cornerType = cornerType;

    // Centre-registered grids are normalised to the corner convention.
    const shift = cornerType === "center" ? cellSize / 2 : 0;
    this.minX = xll - shift;
    this.minY = yll - shift;
  }

  /** x of the grid's east edge. */
  get maxX(): number {
    return this.minX + this.numCols * this.cellSize;
  }

  /** y of the grid's north edge. */
  get maxY(): number {
    return this.minY + this.numRows * this.cellSize;
  }

  /** Bounding box [minX, minY, maxX, maxY]. */
  get bbox(): [number, number, number, number] {
    return [this.minX, this.minY, this.maxX, this.maxY];
  }

  /** North-up geotransform mapping (col, row) to (x, y). */
  get transform(): Affine {
    return northUp(this.minX, this.maxY, this.cellSize);
  }

  /** Whether `value` is exactly the no-data sentinel. */
  isNoData(value: number): boolean {
    return this.nodata !== null && value === this.nodata;
  }

  /** Whether (row, col) addresses a cell of the grid. */
  contains(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.numRows &&
      col >= 0 &&
      col < this.numCols
    );
  }

  /**
   * Get the [row, col] of the cell containing (x, y).
   *
   * Cell edges belong to the cell above and to the right, except on the
   * north and east edges of the grid, which belong to the outermost cells.
   */
  indexOf(x: number, y: number): [number, number] {
    if (
      !(x >= this.minX && x <= this.maxX && y >= this.minY && y <= this.maxY)
    ) {
      throw new OutOfBoundsError("coordinate", x, y);
    }
    const col = Math.min(
      Math.floor((x - this.minX) / this.cellSize),
      this.numCols - 1,
    );
    const row = Math.max(
      this.numRows - 1 - Math.floor((y - this.minY) / this.cellSize),
      0,
    );
    return [row, col];
  }

  /**
   * Get the (x, y) coordinate of the cell at (row, col).
   *
   * @param offset  Which part of the cell to return.  Defaults to "center".
   */
  indexPos(
    row: number,
    col: number,
    offset: CellOffset = "center",
  ): [number, number] {
    if (!this.contains(row, col)) {
      throw new OutOfBoundsError("index", row, col);
    }
    const [dc, dr] = CELL_OFFSETS[offset];
    return applyGeoTransform(col + dc, row + dr, this.transform);
  }
}

/**
 * Read the header lines at the cursor.
 *
 * Keys are matched case-insensitively and in any order. The header ends at the
 * first line that is not a recognised key; the cursor is left at the start of
 * that line.
 *
 * @returns the header and the byte offset where the data section starts.
 */
export async function readHeader(
  cursor: ByteCursor,
): Promise<{ header: GridHeader; dataStart: number }> {
  const values = new Map<HeaderField, { key: string; value: string }>();
  const cornerTypes = new Set<CornerType>();
  let dataStart = cursor.position;

  for (;;) {
    const line = await cursor.readLine();
    if (line === null) {
      break;
    }

    const tokens = line.text.trim().split(/\s+/);
    const key = tokens[0];
    const field = HEADER_KEYS.get(key.toLowerCase());
    if (field === undefined) {
      dataStart = line.offset;
      break;
    }

    if (values.has(field)) {
      throw new HeaderError(`Duplicate header key ${key}`);
    }
    if (tokens.length < 2) {
      throw new HeaderError(`Header key ${key} has no value`);
    }
    if (tokens.length > 2) {
      throw new HeaderError(
        `Header key ${key} expects one value, got "${tokens.slice(1).join(" ")}"`,
      );
    }
    if (field === "xll" || field === "yll") {
      cornerTypes.add(key.toLowerCase().endsWith("center") ? "center" : "corner");
    }

    values.set(field, { key, value: tokens[1] });
    dataStart = cursor.position;
  }
  cursor.seek(dataStart);

  if (cornerTypes.size > 1) {
    throw new HeaderError("xll and yll disagree on corner or center registration");
  }

  const float = (field: HeaderField, name: string): number => {
    const entry = values.get(field);
    if (entry === undefined) {
      throw new HeaderError(`Header key ${name} is expected but missing`);
    }
    const value = parseNumber(entry.value);
    if (value === null) {
      throw new HeaderError(`${entry.key} expects a number, got "${entry.value}"`);
    }
    return value;
  };

  const count = (field: HeaderField, name: string): number => {
    const entry = values.get(field);
    if (entry !== undefined && !COUNT_RE.test(entry.value)) {
      throw new HeaderError(
        `${entry.key} expects a positive integer, got "${entry.value}"`,
      );
    }
    return float(field, name);
  };

  const header = new GridHeader({
    numCols: count("ncols", "ncols"),
    numRows: count("nrows", "nrows"),
    xll: float("xll", "xllcorner"),
    yll: float("yll", "yllcorner"),
    cellSize: float("cellsize", "cellsize"),
    nodata: values.has("nodata") ? float("nodata", "nodata_value") : null,
    cornerType: cornerTypes.has("center") ? "center" : "corner",
  });

  return { header, dataStart };
}

/**
 * Parse a data token as a cell value.
 *
 * @throws ParseError when the token is not a number.
 */
export function parseValue(token: Token): number {
  const value = parseNumber(token.text);
  if (value === null) {
    throw new ParseError(`"${token.text}" is not a number`, token.offset);
  }
  return value;
}
