import { SourceCache } from "@chunkd/middleware";
import { SourceView } from "@chunkd/source";
import { SourceHttp } from "@chunkd/source-http";
import { SourceMemory } from "@chunkd/source-memory";
import { ByteCursor, DEFAULT_CHUNK_SIZE } from "./cursor.js";
import { IoError, OutOfBoundsError, ParseError } from "./errors.js";
import type { CornerType, GridHeader } from "./header.js";
import { parseValue, readHeader } from "./header.js";
import { interpolate } from "./interpolate.js";
import type { Cell } from "./iterator.js";
import { readCells } from "./iterator.js";
import { RowIndex } from "./row-index.js";
import type { ByteSource } from "./source.js";
import { FileSource } from "./source.js";
import type { Affine, CellOffset } from "./transform.js";

/** Options for opening a grid. */
export type OpenOptions = {
  /** Bytes requested from the source per read. Defaults to 64 KiB. */
  chunkSize?: number;
};

/**
 * Random-access reader for an ASCII grid.
 *
 * Only the header is read when opening. Cells are read on demand by seeking to
 * their row, whose offset comes from a lazily built {@link RowIndex}, and
 * scanning along it. Nothing but the current chunk and the row offsets is
 * held in memory.
 *
 * Construct via `AsciiGrid.open(source)` or one of the `from*` helpers.
 * Operations on one reader must not overlap: await each before the next.
 */
export class AsciiGrid {
  /** The parsed header. */
  readonly header: GridHeader;

  /** The byte source this reader owns. */
  readonly source: ByteSource;

  private readonly cursor: ByteCursor;
  private readonly dataStart: number;
  private readonly rowIndex: RowIndex;

  private state: "open" | "consumed" | "closed" = "open";
  private released = false;

  private constructor(
    source: ByteSource,
    cursor: ByteCursor,
    header: GridHeader,
    dataStart: number,
  ) {
    this.source = source;
    this.cursor = cursor;
    this.header = header;
    this.dataStart = dataStart;
    this.rowIndex = new RowIndex(cursor, dataStart, header.numRows);
  }

  /**
   * Open a grid from a byte source, reading its header.
   *
   * Rejects with a `HeaderError` when the header is invalid; the source is
   * left to the caller in that case.
   */
  static async open(
    source: ByteSource,
    { chunkSize = DEFAULT_CHUNK_SIZE }: OpenOptions = {},
  ): Promise<AsciiGrid> {
    const cursor = new ByteCursor(source, 0, chunkSize);
    const { header, dataStart } = await readHeader(cursor);
    return new AsciiGrid(source, cursor, header, dataStart);
  }

  /** Open a local file. */
  static async fromFile(
    path: string,
    options?: OpenOptions,
  ): Promise<AsciiGrid> {
    const source = new FileSource(path);
    try {
      return await AsciiGrid.open(source, options);
    } catch (err) {
      await source.close();
      throw err;
    }
  }

  static async fromArrayBuffer(
    input: ArrayBuffer,
    options?: OpenOptions,
  ): Promise<AsciiGrid> {
    const source = new SourceMemory("memory://input.asc", input);
    return await AsciiGrid.open(source, options);
  }

  static async fromString(
    text: string,
    options?: OpenOptions,
  ): Promise<AsciiGrid> {
    const encoded = new TextEncoder().encode(text);
    const input = new ArrayBuffer(encoded.byteLength);
    new Uint8Array(input).set(encoded);
    return await AsciiGrid.fromArrayBuffer(input, options);
  }

  /**
   * Open a remote grid through HTTP range requests.
   *
   * Fetched chunks are kept in a cache of up to `cacheSize` bytes so rows
   * visited again are not downloaded twice.
   */
  static async fromUrl(
    url: string | URL,
    {
      chunkSize = DEFAULT_CHUNK_SIZE,
      cacheSize = 64 * 1024 * 1024,
    }: OpenOptions & { cacheSize?: number } = {},
  ): Promise<AsciiGrid> {
    const cache = new SourceCache({ size: cacheSize });
    const view = new SourceView(new SourceHttp(url), [cache]);
    return await AsciiGrid.open(view, { chunkSize });
  }

  // ── Properties from the header ─────────────────────────────────────────

  get numRows(): number {
    return this.header.numRows;
  }

  get numCols(): number {
    return this.header.numCols;
  }

  get cellSize(): number {
    return this.header.cellSize;
  }

  get minX(): number {
    return this.header.minX;
  }

  get minY(): number {
    return this.header.minY;
  }

  get maxX(): number {
    return this.header.maxX;
  }

  get maxY(): number {
    return this.header.maxY;
  }

  /** The no-data sentinel, or null if not set. */
  get nodata(): number | null {
    return this.header.nodata;
  }

  get cornerType(): CornerType {
    return this.header.cornerType;
  }

  /** Bounding box [minX, minY, maxX, maxY]. */
  get bbox(): [number, number, number, number] {
    return this.header.bbox;
  }

  get transform(): Affine {
    return this.header.transform;
  }

  /** Number of rows whose byte offset is currently known. */
  get indexedRows(): number {
    return this.rowIndex.size;
  }

  isNoData(value: number): boolean {
    return this.header.isNoData(value);
  }

  indexOf(x: number, y: number): [number, number] {
    return this.header.indexOf(x, y);
  }

  indexPos(
    row: number,
    col: number,
    offset: CellOffset = "center",
  ): [number, number] {
    return this.header.indexPos(row, col, offset);
  }

  // ── Reading ────────────────────────────────────────────────────────────

  /**
   * Locate every row now, so later reads never scan.
   *
   * Worth it before many random reads across the whole grid.
   */
  async buildIndex(): Promise<void> {
    this.assertOpen();
    await this.rowIndex.build();
  }

  /** Read the value of the cell at (row, col). */
  async getIndex(row: number, col: number): Promise<number> {
    this.assertOpen();
    if (!this.header.contains(row, col)) {
      throw new OutOfBoundsError("index", row, col);
    }

    const offset = await this.rowIndex.offsetOf(row);
    this.cursor.seek(offset);
    for (let i = 0; ; i++) {
      const token = await this.cursor.readToken();
      if (token === null || (i > 0 && token.newline)) {
        throw new ParseError(
          `Row ${row} has ${i} values, expected ${this.numCols}`,
          offset,
        );
      }
      if (i === col) {
        return parseValue(token);
      }
    }
  }

  /** Read the value of the cell containing (x, y). */
  async get(x: number, y: number): Promise<number> {
    const [row, col] = this.indexOf(x, y);
    return await this.getIndex(row, col);
  }

  /**
   * Interpolate between the cell centres around (x, y).
   *
   * Bilinear between the outermost cell centres, linear along the edges, the
   * nearest cell in the corners. Any no-data cell involved makes the result
   * no-data.
   */
  async getInterpolate(x: number, y: number): Promise<number> {
    this.assertOpen();
    return await interpolate(this.header, x, y, (row, col) =>
      this.getIndex(row, col),
    );
  }

  /** Read every value of one row. */
  async getRow(row: number): Promise<Float64Array> {
    this.assertOpen();
    const { numCols } = this;
    const offset = await this.rowIndex.offsetOf(row);
    const values = new Float64Array(numCols);

    this.cursor.seek(offset);
    for (let col = 0; col < numCols; col++) {
      const token = await this.cursor.readToken();
      if (token === null || (col > 0 && token.newline)) {
        throw new ParseError(
          `Row ${row} has ${col} values, expected ${numCols}`,
          offset,
        );
      }
      values[col] = parseValue(token);
    }

    const next = await this.cursor.readToken();
    if (next !== null && !next.newline) {
      throw new ParseError(
        `Row ${row} has more than ${numCols} values`,
        next.offset,
      );
    }
    return values;
  }

  /**
   * Stream every cell as [row, col, value] in row-major order.
   *
   * This consumes the reader: the data is read front to back once, the
   * source is closed when the stream ends, and every other operation fails
   * from now on. Open the source again to read it a second time.
   */
  cells(): AsyncGenerator<Cell, void, undefined> {
    this.assertOpen();
    this.state = "consumed";
    return this.streamCells();
  }

  private async *streamCells(): AsyncGenerator<Cell, void, undefined> {
    try {
      yield* readCells(this.cursor, this.header, this.dataStart);
    } finally {
      await this.release();
    }
  }

  /** Close the reader and release its source. */
  async close(): Promise<void> {
    this.state = "closed";
    await this.release();
  }

  private async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await this.source.close?.();
  }

  private assertOpen(): void {
    if (this.state === "consumed") {
      throw new IoError("Reader has been consumed by cells()");
    }
    if (this.state === "closed") {
      throw new IoError("Reader is closed");
    }
  }
}
