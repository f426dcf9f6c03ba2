import type { Card } from '../../cards/Card.js';
import { bestValue, isBusted, possibleValues } from './hand.js';
import type { GamePhase, GameState, HandOutcome, HandSnapshot } from './types.js';

export interface HandView {
  cards: Card[];
  bet: number;
  outcome: HandOutcome | null;
  values: number[];
  best: number;
  busted: boolean;
}

/** Flat, JSON-safe picture of a round for renderers and transports. */
export interface GameView {
  phase: GamePhase;
  bankroll: number;
  bet: number | null;
  dealerHand: HandView | null;
  playerHands: HandView[] | null;
  activeHandIndex: number | null;
}

export function handView(hand: HandSnapshot): HandView {
  return {
    cards: hand.cards.map((c) => ({ rank: c.rank, suit: c.suit })),
    bet: hand.bet,
    outcome: hand.outcome ?? null,
    values: possibleValues(hand),
    best: bestValue(hand),
    busted: isBusted(hand),
  };
}

export function toView(state: GameState): GameView {
  switch (state.phase) {
    case 'waiting_for_bet':
      return { phase: state.phase, bankroll: state.bankroll, bet: null, dealerHand: null, playerHands: null, activeHandIndex: null };
    case 'waiting_to_deal':
      return { phase: state.phase, bankroll: state.bankroll, bet: state.bet, dealerHand: null, playerHands: null, activeHandIndex: null };
    case 'player_turn':
    case 'dealer_turn':
    case 'round_complete':
      return {
        phase: state.phase,
        bankroll: state.bankroll,
        bet: state.playerHands[0]?.bet ?? null,
        dealerHand: handView(state.dealerHand),
        playerHands: state.playerHands.map(handView),
        activeHandIndex: state.phase === 'player_turn' ? state.activeHandIndex : null,
      };
  }
}
