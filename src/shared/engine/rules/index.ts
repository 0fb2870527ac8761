import type { GameType } from '../../types/session';
import type { BoardConfig } from '../../validation/schemas';
import type { RuleEngine } from './RuleEngine';
import { SnakesLaddersRules } from './snakesLadders';

export type {
  RuleEngine,
  EligibilityResult,
  MoveOutcome,
  SettleOutcome,
  TileRedirect,
  WinCheck,
  DeserializedRuleState,
  ParticipantStanding,
} from './RuleEngine';
export { SnakesLaddersRules } from './snakesLadders';

type RuleEngineFactory = (board: BoardConfig) => RuleEngine;

const RULE_ENGINE_FACTORIES: Record<GameType, RuleEngineFactory> = {
  snakes_ladders: (board) => new SnakesLaddersRules(board),
};

/**
 * Select the rule engine for a session's game-type tag.
 */
export function createRuleEngine(gameType: GameType, board: BoardConfig): RuleEngine {
  return RULE_ENGINE_FACTORIES[gameType](board);
}
