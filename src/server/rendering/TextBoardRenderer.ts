import type { BoardToken, BoardView } from '../../shared/types/board';
import { gridToTile } from '../../shared/engine/boardCoordinates';
import type { BoardRenderer, RenderContext, RenderedBoard } from './BoardRenderer';

const HAZARD_MARK = 'v';
const SHORTCUT_MARK = '^';

/**
 * Monospace rendering of the board, top row first, as it reads on screen.
 *
 * A cell shows the tokens on it (`P1`, `P1+3` when shared) or else its tile
 * number, marked `v` for a hazard start and `^` for a shortcut start. A
 * legend of tokens follows the grid.
 */
export class TextBoardRenderer implements BoardRenderer {
  public async render(view: BoardView, context: RenderContext): Promise<RenderedBoard> {
    const lines = [`Board: turn ${view.turnNumber} (${view.status.replace('_', ' ')})`];
    lines.push(...this.renderGrid(view));

    const legend = view.tokens
      .filter((token) => token.tile !== null)
      .map((token) => this.legendLine(token, context));
    if (legend.length > 0) {
      lines.push('', ...legend);
    }

    return { text: lines.join('\n'), image: null };
  }

  private renderGrid(view: BoardView): string[] {
    const grid = { cols: view.cols, rows: view.rows };
    const occupants = new Map<number, number[]>();
    for (const token of view.tokens) {
      if (token.tile === null) {
        continue;
      }
      const list = occupants.get(token.tile) ?? [];
      list.push(token.sequence);
      occupants.set(token.tile, list);
    }

    const rows: string[][] = [];
    for (let row = view.rows; row >= 1; row--) {
      const cells: string[] = [];
      for (let col = 1; col <= view.cols; col++) {
        const tile = gridToTile({ col, row }, grid);
        cells.push(tile === null ? '' : this.cellText(view, tile, occupants.get(tile)));
      }
      rows.push(cells);
    }

    const width = Math.max(...rows.flat().map((cell) => cell.length));
    return rows.map((cells) => cells.map((cell) => cell.padStart(width)).join(' '));
  }

  private cellText(view: BoardView, tile: number, sequences: number[] | undefined): string {
    if (sequences && sequences.length > 0) {
      return `P${[...sequences].sort((a, b) => a - b).join('+')}`;
    }
    if (tile > view.goalTile) {
      return '.';
    }
    if (view.hazards.has(tile)) {
      return `${tile}${HAZARD_MARK}`;
    }
    if (view.shortcuts.has(tile)) {
      return `${tile}${SHORTCUT_MARK}`;
    }
    return String(tile);
  }

  private legendLine(token: BoardToken, context: RenderContext): string {
    const name = context.showFaces ? token.label : `Player ${token.sequence}`;
    const parts = [`P${token.sequence} ${name}: tile ${token.tile} (${token.coordinate ?? '?'})`];
    const background = context.backgroundOverrides.get(token.participantId) ?? token.display.background;
    if (background) {
      parts.push(`background ${background}`);
    }
    if (token.winner) {
      parts.push('WINNER');
    }
    if (token.forfeited) {
      parts.push('FORFEIT');
    }
    return parts.join(', ');
  }
}
