import { RANKS, SUITS, card } from '../../cards/Card.js';
import type { Card } from '../../cards/Card.js';
import { RNG, cryptoRNG, shuffleInPlace } from '../../util/rng.js';
import type { CardSource } from './types.js';

export const CARDS_PER_DECK = 52;

export function makeDecks(decks: number): Card[] {
  const cards: Card[] = [];
  for (let d = 0; d < decks; d++) {
    for (const r of RANKS) {
      for (const s of SUITS) {
        cards.push(card(r, s));
      }
    }
  }
  return cards;
}

// Two initial cards for every seat plus the dealer, doubled as headroom for hits and splits.
export function minCardsNeeded(numPlayers: number): number {
  return (numPlayers + 1) * 2 * 2;
}

export class Shoe implements CardSource {
  private cards: Card[];
  private discards: Card[] = [];
  private readonly rng: RNG;

  constructor(readonly deckCount: number, rng: RNG = cryptoRNG) {
    this.rng = rng;
    this.cards = makeDecks(deckCount);
  }

  get remaining(): number {
    return this.cards.length;
  }

  get discardedCount(): number {
    return this.discards.length;
  }

  get available(): readonly Card[] {
    return this.cards;
  }

  get discarded(): readonly Card[] {
    return this.discards;
  }

  shuffle(): void {
    shuffleInPlace(this.cards, this.rng);
  }

  /** Top card of the shoe, or undefined once it is empty. */
  draw(): Card | undefined {
    const c = this.cards.pop();
    if (c === undefined) return undefined;
    this.discards.push(c);
    return c;
  }

  /**
   * Swap in a fresh, shuffled shoe when fewer cards remain than a deal for
   * `numPlayers` seats may need. Returns whether the shoe was replaced.
   */
  ensureCardsForPlayers(numPlayers: number): boolean {
    if (this.cards.length >= minCardsNeeded(numPlayers)) return false;
    this.cards = makeDecks(this.deckCount);
    this.discards = [];
    this.shuffle();
    return true;
  }
}
