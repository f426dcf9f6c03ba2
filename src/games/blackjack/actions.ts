import { canSplit } from './hand.js';
import type { GameAction, GameState } from './types.js';

const ALIASES: Record<string, GameAction> = {
  h: 'hit',
  hit: 'hit',
  s: 'stand',
  stand: 'stand',
  d: 'double',
  double: 'double',
  p: 'split',
  split: 'split',
};

const LABEL: Record<GameAction, string> = {
  hit: 'HIT',
  stand: 'STAND',
  double: 'DOUBLE',
  split: 'SPLIT',
};

/** Case-insensitive, whitespace-trimmed. Unknown tokens give undefined. */
export function parseAction(token: string): GameAction | undefined {
  const key = token.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(ALIASES, key) ? ALIASES[key] : undefined;
}

export function actionLabel(action: GameAction): string {
  return LABEL[action];
}

/** What the active hand may do right now; empty outside the player's turn. */
export function legalActions(state: GameState): GameAction[] {
  if (state.phase !== 'player_turn') return [];
  const hand = state.playerHands[state.activeHandIndex];
  if (!hand) return [];
  const out: GameAction[] = ['hit', 'stand'];
  const affordable = state.bankroll >= hand.bet;
  if (affordable) out.push('double');
  if (affordable && canSplit(hand)) out.push('split');
  return out;
}
