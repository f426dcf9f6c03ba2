export type Suit = 'C' | 'D' | 'H' | 'S';
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K' | 'A';
export type Card = { readonly rank: Rank; readonly suit: Suit };

// Shoe build order: rank-major, suit-minor.
export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];
export const SUITS: readonly Suit[] = ['C', 'D', 'H', 'S'];

const SUIT_SYMBOL: Record<Suit, string> = { C: '♣', D: '♦', H: '♥', S: '♠' };

export function card(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

/** Every value a rank can contribute to a hand. Only the Ace has two. */
export function rankValues(rank: Rank): number[] {
  if (rank === 'A') return [1, 11];
  if (rank === 'K' || rank === 'Q' || rank === 'J' || rank === '10') return [10];
  return [parseInt(rank, 10)];
}

export function rankLabel(rank: Rank): string {
  return rank;
}

export function suitSymbol(suit: Suit): string {
  return SUIT_SYMBOL[suit];
}

export function cardToString(c: Card): string {
  return `${rankLabel(c.rank)}${suitSymbol(c.suit)}`;
}

export function isRed(c: Card): boolean {
  return c.suit === 'D' || c.suit === 'H';
}
