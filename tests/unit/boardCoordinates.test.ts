import {
  alphanumericToTile,
  gridToTile,
  normalizeCoordinate,
  tileToAlphanumeric,
  tileToGrid,
} from '../../src/shared/engine/boardCoordinates';

const GRID = { cols: 10, rows: 10 };

describe('boardCoordinates', () => {
  describe('tileToAlphanumeric', () => {
    it('runs odd rows left to right and even rows right to left', () => {
      expect(tileToAlphanumeric(1, GRID)).toBe('A1');
      expect(tileToAlphanumeric(10, GRID)).toBe('J1');
      expect(tileToAlphanumeric(11, GRID)).toBe('J2');
      expect(tileToAlphanumeric(20, GRID)).toBe('A2');
      expect(tileToAlphanumeric(21, GRID)).toBe('A3');
      expect(tileToAlphanumeric(100, GRID)).toBe('A10');
    });

    it('returns null for tiles off the board', () => {
      expect(tileToAlphanumeric(0, GRID)).toBeNull();
      expect(tileToAlphanumeric(101, GRID)).toBeNull();
      expect(tileToAlphanumeric(2.5, GRID)).toBeNull();
    });

    it('returns null when the grid is wider than the alphabet', () => {
      expect(tileToAlphanumeric(1, { cols: 27, rows: 2 })).toBeNull();
    });
  });

  describe('alphanumericToTile', () => {
    it('accepts lower-case letters and surrounding whitespace', () => {
      expect(alphanumericToTile(' c4 ', GRID)).toBe(38);
    });

    it('rejects coordinates outside the grid or malformed', () => {
      expect(alphanumericToTile('K1', GRID)).toBeNull();
      expect(alphanumericToTile('A0', GRID)).toBeNull();
      expect(alphanumericToTile('A11', GRID)).toBeNull();
      expect(alphanumericToTile('AA1', GRID)).toBeNull();
      expect(alphanumericToTile('', GRID)).toBeNull();
    });
  });

  it('maps every tile of a 10x10 board to a coordinate and back', () => {
    for (let tile = 1; tile <= 100; tile++) {
      const coordinate = tileToAlphanumeric(tile, GRID);
      expect(coordinate).not.toBeNull();
      expect(alphanumericToTile(coordinate ?? '', GRID)).toBe(tile);
    }
  });

  it('maps every coordinate of a 10x10 board to a tile and back', () => {
    for (const letter of 'ABCDEFGHIJ') {
      for (let row = 1; row <= 10; row++) {
        const coordinate = `${letter}${row}`;
        const tile = alphanumericToTile(coordinate, GRID);
        expect(tile).not.toBeNull();
        expect(tileToAlphanumeric(tile ?? 0, GRID)).toBe(coordinate);
      }
    }
  });

  it('keeps gridToTile the left inverse of tileToGrid', () => {
    const grid = { cols: 7, rows: 3 };
    for (let tile = 1; tile <= 21; tile++) {
      const position = tileToGrid(tile, grid);
      expect(position).not.toBeNull();
      if (position) {
        expect(gridToTile(position, grid)).toBe(tile);
      }
    }
  });

  it('normalizes coordinates to upper case', () => {
    expect(normalizeCoordinate('j1', GRID)).toBe('J1');
    expect(normalizeCoordinate('z9', GRID)).toBeNull();
  });
});
