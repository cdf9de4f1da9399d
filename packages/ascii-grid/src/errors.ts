/** Base class for every error raised while reading an ASCII grid. */
export class AsciiGridError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The header is missing a required key, repeats one, or holds a value that
 * cannot describe a grid (non-numeric, non-positive size).
 */
export class HeaderError extends AsciiGridError {}

/** A row, a row/column index or an x/y coordinate outside the grid. */
export class OutOfBoundsError extends AsciiGridError {
  readonly kind: "row" | "index" | "coordinate";
  /** Row index, or x coordinate. */
  readonly a: number;
  /** Column index, or y coordinate. Null for `kind: "row"`. */
  readonly b: number | null;

  constructor(kind: "row", row: number);
  constructor(kind: "index" | "coordinate", a: number, b: number);
  constructor(kind: "row" | "index" | "coordinate", a: number, b?: number) {
    super(describe(kind, a, b));
    this.kind = kind;
    this.a = a;
    this.b = b ?? null;
  }
}

function describe(
  kind: "row" | "index" | "coordinate",
  a: number,
  b: number | undefined,
): string {
  switch (kind) {
    case "row":
      return `Row ${a} is out of bounds`;
    case "index":
      return `Index (row ${a}, col ${b}) is out of bounds`;
    case "coordinate":
      return `Coordinate (${a}, ${b}) is out of bounds`;
  }
}

/** The data section holds something other than the expected numbers. */
export class ParseError extends AsciiGridError {
  /** Byte offset of the offending token or row. */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (at byte ${offset})`);
    this.offset = offset;
  }
}

/** The byte source failed, or the reader was used after being closed. */
export class IoError extends AsciiGridError {}
