/**
 * Boustrophedon board geometry.
 *
 * Tiles are numbered 1..cols*rows starting at the bottom-left. Row r is
 * ⌈tile / cols⌉; odd rows run left→right (low→high column), even rows run
 * right→left. The alphanumeric form is the column letter followed by the row
 * number, so a 10×10 board spans A1 (tile 1) to A10 (tile 100).
 */

export interface GridDimensions {
  cols: number;
  rows: number;
}

/** 1-based column and row. */
export interface GridPosition {
  col: number;
  row: number;
}

const COLUMN_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

export function tileCount(grid: GridDimensions): number {
  return grid.cols * grid.rows;
}

export function isValidTile(tile: number, grid: GridDimensions): boolean {
  return Number.isInteger(tile) && tile >= 1 && tile <= tileCount(grid);
}

export function tileToGrid(tile: number, grid: GridDimensions): GridPosition | null {
  if (!isValidTile(tile, grid)) {
    return null;
  }
  const row = Math.ceil(tile / grid.cols);
  const offset = tile - (row - 1) * grid.cols; // 1..cols
  const col = row % 2 === 1 ? offset : grid.cols - offset + 1;
  return { col, row };
}

export function gridToTile(position: GridPosition, grid: GridDimensions): number | null {
  const { col, row } = position;
  if (!Number.isInteger(col) || !Number.isInteger(row)) {
    return null;
  }
  if (col < 1 || col > grid.cols || row < 1 || row > grid.rows) {
    return null;
  }
  const offset = row % 2 === 1 ? col : grid.cols - col + 1;
  return (row - 1) * grid.cols + offset;
}

export function tileToAlphanumeric(tile: number, grid: GridDimensions): string | null {
  if (grid.cols > COLUMN_LETTERS.length) {
    return null;
  }
  const position = tileToGrid(tile, grid);
  if (!position) {
    return null;
  }
  return `${COLUMN_LETTERS[position.col - 1]}${position.row}`;
}

export function alphanumericToTile(coordinate: string, grid: GridDimensions): number | null {
  const match = /^([A-Za-z])(\d{1,3})$/.exec(coordinate.trim());
  if (!match) {
    return null;
  }
  const col = COLUMN_LETTERS.indexOf(match[1].toUpperCase()) + 1;
  const row = Number.parseInt(match[2], 10);
  return gridToTile({ col, row }, grid);
}

/** Canonical (upper-case, trimmed) form of a coordinate, or null if invalid. */
export function normalizeCoordinate(coordinate: string, grid: GridDimensions): string | null {
  const tile = alphanumericToTile(coordinate, grid);
  return tile === null ? null : tileToAlphanumeric(tile, grid);
}
