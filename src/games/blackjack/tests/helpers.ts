import { RANKS, SUITS, card } from '../../../cards/Card.js';
import type { Card } from '../../../cards/Card.js';
import { BlackjackGame } from '../engine.js';
import type { CardSource } from '../types.js';

/** '10H' -> ten of hearts, 'AS' -> ace of spades. */
export function c(spec: string): Card {
  const rank = RANKS.find((r) => r === spec.slice(0, -1));
  const suit = SUITS.find((s) => s === spec.slice(-1));
  if (!rank || !suit) throw new Error(`bad card spec ${spec}`);
  return card(rank, suit);
}

export function cards(...specs: string[]): Card[] {
  return specs.map(c);
}

/** Deals in exactly the order given; never replenishes. */
export class StackedShoe implements CardSource {
  private cards: Card[];
  shuffles = 0;

  constructor(order: Card[]) {
    this.cards = [...order];
  }

  get remaining() {
    return this.cards.length;
  }

  draw() {
    return this.cards.shift();
  }

  shuffle() {
    this.shuffles++;
  }

  ensureCardsForPlayers() {
    return false;
  }
}

// Deal order is player, dealer, player, dealer; later cards feed hits, splits and the dealer.
export function stackedGame(order: string[], startingBankroll = 10_000) {
  const shoe = new StackedShoe(cards(...order));
  const game = new BlackjackGame({ playerName: 'Tester', deckCount: 1, startingBankroll }, { shoe });
  return { game, shoe };
}
