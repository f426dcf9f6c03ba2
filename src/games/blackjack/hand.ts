import { cardToString, rankValues } from '../../cards/Card.js';
import type { Card } from '../../cards/Card.js';
import type { Hand, HandOutcome } from './types.js';

type Cards = { readonly cards: readonly Card[] };

const OUTCOME_LABEL: Record<HandOutcome, string> = {
  win: 'WIN',
  loss: 'LOSS',
  push: 'PUSH',
  blackjack: 'BLACKJACK',
};

export function createHand(bet = 0): Hand {
  return { cards: [], bet };
}

// Second hand of a split: starts from the card taken off the first.
export function handWithCard(card: Card, bet: number): Hand {
  return { cards: [card], bet };
}

export function cloneHand(hand: { readonly cards: readonly Card[]; readonly bet: number; readonly outcome?: HandOutcome }): Hand {
  const copy: Hand = { cards: [...hand.cards], bet: hand.bet };
  if (hand.outcome !== undefined) copy.outcome = hand.outcome;
  return copy;
}

export function addCard(hand: Hand, card: Card): void {
  hand.cards.push(card);
}

export function doubleBet(hand: Hand): void {
  hand.bet *= 2;
}

/**
 * Every distinct total the hand can make, ascending. Each Ace independently
 * counts 1 or 11, so k Aces give at most k + 1 totals.
 */
export function possibleValues(hand: Cards): number[] {
  let base = 0;
  let aces = 0;
  for (const c of hand.cards) {
    if (c.rank === 'A') aces++;
    else base += rankValues(c.rank)[0];
  }
  let totals = new Set<number>([base]);
  for (let i = 0; i < aces; i++) {
    const next = new Set<number>();
    for (const t of totals) {
      next.add(t + 1);
      next.add(t + 11);
    }
    totals = next;
  }
  return [...totals].sort((a, b) => a - b);
}

/** Highest total not over 21; when every total busts, the lowest one. */
export function bestValue(hand: Cards): number {
  const values = possibleValues(hand);
  for (let i = values.length - 1; i >= 0; i--) {
    if (values[i] <= 21) return values[i];
  }
  return values[0];
}

export function isNaturalBlackjack(hand: Cards): boolean {
  return hand.cards.length === 2 && bestValue(hand) === 21;
}

// Any 21, e.g. three cards after a split. Pays even money.
export function isBlackjack(hand: Cards): boolean {
  return bestValue(hand) === 21;
}

export function isBusted(hand: Cards): boolean {
  return possibleValues(hand).every((v) => v > 21);
}

export function isSoft(hand: Cards): boolean {
  const values = possibleValues(hand);
  const best = bestValue(hand);
  return best <= 21 && values.length > 1 && values[0] !== best;
}

export function canSplit(hand: Cards): boolean {
  return hand.cards.length === 2 && hand.cards[0].rank === hand.cards[1].rank;
}

export function outcomeLabel(outcome: HandOutcome): string {
  return OUTCOME_LABEL[outcome];
}

export function handToString(hand: Cards): string {
  return hand.cards.map(cardToString).join(' ');
}
