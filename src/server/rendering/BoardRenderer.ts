import type { BoardView } from '../../shared/types/board';
import type { OutboundImage } from '../../shared/types/events';

/**
 * Per-call render options. Everything a renderer may vary between calls is
 * passed here; renderers never read or patch shared state to pick it up.
 */
export interface RenderContext {
  /** Background selections that win over a token's own, keyed by participant id. */
  backgroundOverrides: ReadonlyMap<string, string>;
  /** Label tokens with character names instead of player numbers. */
  showFaces: boolean;
}

export interface RenderedBoard {
  text: string;
  image: OutboundImage | null;
}

/**
 * Board presentation collaborator. Image renderers live outside this
 * repository and plug in here.
 */
export interface BoardRenderer {
  render(view: BoardView, context: RenderContext): Promise<RenderedBoard>;
  /**
   * Optional best-effort cache warm-up. Callers fire it without awaiting and
   * only log a rejection.
   */
  warm?(view: BoardView): Promise<void>;
}

export const defaultRenderContext = (): RenderContext => ({
  backgroundOverrides: new Map(),
  showFaces: true,
});
