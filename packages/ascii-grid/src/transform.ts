/**
 * Affine geotransform: [a, b, c, d, e, f].
 *
 * Maps pixel (col, row) to planar (x, y):
 *   x = a * col + b * row + c
 *   y = d * col + e * row + f
 */
export type Affine = [
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
];

/** Which part of a cell a coordinate refers to. */
export type CellOffset = "center" | "ul" | "ur" | "ll" | "lr";

/** Position of each {@link CellOffset} within a cell, as [col, row] fractions. */
export const CELL_OFFSETS: Record<CellOffset, [number, number]> = {
  center: [0.5, 0.5],
  ul: [0, 0],
  ur: [1, 0],
  ll: [0, 1],
  lr: [1, 1],
};

/**
 * North-up transform of a grid whose top-left corner is at (minX, maxY).
 *
 * Rows grow downward, so `e` is negative.
 */
export function northUp(minX: number, maxY: number, cellSize: number): Affine {
  return [cellSize, 0, minX, 0, -cellSize, maxY];
}

/**
 * Apply a geotransform to a coordinate.
 *
 *   x_out = a * x + b * y + c
 *   y_out = d * x + e * y + f
 */
export function applyGeoTransform(
  x: number,
  y: number,
  gt: Affine,
): [number, number] {
  const [a, b, c, d, e, f] = gt;
  return [a * x + b * y + c, d * x + e * y + f];
}
