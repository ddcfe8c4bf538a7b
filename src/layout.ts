import type { CellSize } from "./util.js";

export type PanelPosition = {
  index: number;
  row: number;
  col: number;
};

export type Canvas = {
  width: number;
  height: number;
  viewBox: string;
};

export function panelPosition(index: number, boxesPerLine: number): PanelPosition {
  return { index, row: Math.floor(index / boxesPerLine), col: index % boxesPerLine };
}

export function panelPositions(count: number, boxesPerLine: number): PanelPosition[] {
  return Array.from({ length: count }, (_, i) => panelPosition(i, boxesPerLine));
}

/** Canvas around `count` panels; a single row is only as wide as the panels it holds. */
export function canvasSize(count: number, boxesPerLine: number, cell: CellSize): Canvas {
  const last = panelPosition(Math.max(count, 1) - 1, boxesPerLine);
  const width = last.row === 0 ? cell.width * (last.col + 1) : cell.width * boxesPerLine;
  const height = cell.height * (last.row + 1);
  return { width, height, viewBox: `0 0 ${width} ${height}` };
}
