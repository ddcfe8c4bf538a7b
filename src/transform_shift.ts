import { type CellSize, MalformedTransform } from "./util.js";

export type Matrix = {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
};

const MATRIX_RE = /^\s*matrix\s*\(([^)]*)\)\s*$/;

export function parseMatrix(transform: string): Matrix {
  const m = MATRIX_RE.exec(transform);
  if (!m) throw new MalformedTransform(`Expected matrix(a b c d e f), got: ${transform}`);
  const tokens = m[1].split(/[\s,]+/).filter((t) => t.length > 0);
  if (tokens.length < 6) {
    throw new MalformedTransform(`Matrix needs 6 values, got ${tokens.length}: ${transform}`);
  }
  const nums = tokens.slice(0, 6).map(Number);
  if (nums.some((n) => !Number.isFinite(n))) {
    throw new MalformedTransform(`Matrix has a non-numeric value: ${transform}`);
  }
  const [a, b, c, d, e, f] = nums;
  return { a, b, c, d, e, f };
}

/**
 * Moves a label's transform into the grid cell at (col, row).
 *
 * The output always carries the identity 2x2 part `1 0 0 1`: stroke numbers are
 * only repositioned, so any scale or rotation in the input is dropped.
 */
export function translateTransform(transform: string, col: number, row: number, cell: CellSize): string {
  const { e, f } = parseMatrix(transform);
  const e2 = e + col * cell.width;
  const f2 = f + row * cell.height;
  return `matrix(1 0 0 1 ${e2.toFixed(2)} ${f2.toFixed(2)})`;
}
