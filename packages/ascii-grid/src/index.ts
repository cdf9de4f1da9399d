export type { OpenOptions } from "./ascii-grid.js";
export { AsciiGrid } from "./ascii-grid.js";
export type { Line, Token } from "./cursor.js";
export { ByteCursor, DEFAULT_CHUNK_SIZE } from "./cursor.js";
export {
  AsciiGridError,
  HeaderError,
  IoError,
  OutOfBoundsError,
  ParseError,
} from "./errors.js";
export type { CornerType, HeaderFields } from "./header.js";
export { GridHeader, parseNumber, readHeader } from "./header.js";
export type { Sample } from "./interpolate.js";
export { interpolate, interpolationSamples } from "./interpolate.js";
export type { Cell } from "./iterator.js";
export { readCells } from "./iterator.js";
export { RowIndex } from "./row-index.js";
export type { ByteSource } from "./source.js";
export { FileSource } from "./source.js";
export type { Affine, CellOffset } from "./transform.js";
export { applyGeoTransform, CELL_OFFSETS, northUp } from "./transform.js";
