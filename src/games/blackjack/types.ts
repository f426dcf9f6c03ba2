import type { Card } from '../../cards/Card.js';

export type HandOutcome = 'win' | 'loss' | 'push' | 'blackjack';

export interface Hand {
  cards: Card[];
  bet: number;
  outcome?: HandOutcome; // unset until settlement
}

export interface Player {
  hands: Hand[];
  bankroll: number;
}

export type GameAction = 'hit' | 'stand' | 'double' | 'split';

export type GamePhase = 'waiting_for_bet' | 'waiting_to_deal' | 'player_turn' | 'dealer_turn' | 'round_complete';

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type HandSnapshot = DeepReadonly<Hand>;

export type GameState =
  | { readonly phase: 'waiting_for_bet'; readonly bankroll: number }
  | { readonly phase: 'waiting_to_deal'; readonly bet: number; readonly bankroll: number }
  | {
      readonly phase: 'player_turn';
      readonly dealerHand: HandSnapshot;
      readonly playerHands: readonly HandSnapshot[];
      readonly bankroll: number;
      readonly activeHandIndex: number;
    }
  | {
      readonly phase: 'dealer_turn';
      readonly dealerHand: HandSnapshot;
      readonly playerHands: readonly HandSnapshot[];
      readonly bankroll: number;
    }
  | {
      readonly phase: 'round_complete';
      readonly dealerHand: HandSnapshot;
      readonly playerHands: readonly HandSnapshot[];
      readonly bankroll: number;
    };

export type CommandResult = { ok: true; state: GameState } | { ok: false; reason: string; state: GameState };

export type GameEvent =
  | { type: 'shoe_replenished'; decks: number; cards: number }
  | { type: 'card_dealt'; target: 'player' | 'dealer'; handIndex: number; card: Card }
  | { type: 'phase_changed'; from: GamePhase; to: GamePhase }
  | { type: 'command_rejected'; command: string; reason: string }
  | { type: 'round_settled'; outcomes: HandOutcome[]; bankroll: number };

export type GameListener = (event: GameEvent) => void;

/** Anything a round can draw from; the shoe in production, a stacked deck in tests. */
export interface CardSource {
  draw(): Card | undefined;
  shuffle(): void;
  ensureCardsForPlayers(numPlayers: number): boolean;
  readonly remaining: number;
}
