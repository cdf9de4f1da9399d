import { OutOfBoundsError } from "./errors.js";
import type { GridHeader } from "./header.js";

/** A cell contributing to an interpolated value, with its weight. */
export type Sample = {
  row: number;
  col: number;
  weight: number;
};

type AxisSample = { index: number; weight: number };

/**
 * Samples along one axis for a fractional position in cell-centre space
 * (0 is the centre of the first cell).
 *
 * Positions on or beyond the outermost centres snap to them, and a position
 * exactly on a centre uses that centre alone.
 */
function axisSamples(position: number, length: number): AxisSample[] {
  if (position <= 0) {
    return [{ index: 0, weight: 1 }];
  }
  if (position >= length - 1) {
    return [{ index: length - 1, weight: 1 }];
  }

  const lower = Math.floor(position);
  const t = position - lower;
  if (t === 0) {
    return [{ index: lower, weight: 1 }];
  }
  return [
    { index: lower, weight: 1 - t },
    { index: lower + 1, weight: t },
  ];
}

/**
 * Cells and weights that make up the interpolated value at (x, y).
 *
 * Inside the rectangle spanned by the outermost cell centres this is the
 * bilinear stencil of up to four cells. In the half-cell margin around it, the
 * axis that falls outside collapses to the nearest centre, leaving a linear
 * blend of two cells (or a single cell in the corners).
 */
export function interpolationSamples(
  header: GridHeader,
  x: number,
  y: number,
): Sample[] {
  const { minX, minY, maxX, maxY, cellSize } = header;
  if (!(x >= minX && x <= maxX && y >= minY && y <= maxY)) {
    throw new OutOfBoundsError("coordinate", x, y);
  }

  const cols = axisSamples((x - minX) / cellSize - 0.5, header.numCols);
  const rows = axisSamples((maxY - y) / cellSize - 0.5, header.numRows);

  const samples: Sample[] = [];
  for (const r of rows) {
    for (const c of cols) {
      samples.push({ row: r.index, col: c.index, weight: r.weight * c.weight });
    }
  }
  return samples;
}

/**
 * Interpolate the grid at (x, y), reading cells through `read`.
 *
 * Returns the no-data sentinel as soon as any contributing cell holds it.
 */
export async function interpolate(
  header: GridHeader,
  x: number,
  y: number,
  read: (row: number, col: number) => Promise<number>,
): Promise<number> {
  let value = 0;
  for (const { row, col, weight } of interpolationSamples(header, x, y)) {
    const cell = await read(row, col);
    if (header.isNoData(cell)) {
      return cell;
    }
    value += cell * weight;
  }
  return value;
}
