import type { Card } from '../../cards/Card.js';
import { DEFAULT_BANKROLL } from '../../config/settings.js';
import { addCard, createHand } from './hand.js';
import type { Player } from './types.js';

export function createPlayer(bankroll = DEFAULT_BANKROLL): Player {
  return { hands: [createHand()], bankroll };
}

/** Out-of-range indexes are ignored. Returns whether the card landed. */
export function addCardToHand(player: Player, card: Card, handIndex: number): boolean {
  const hand = player.hands[handIndex];
  if (!hand) return false;
  addCard(hand, card);
  return true;
}

export function resetHands(player: Player): void {
  player.hands = [createHand()];
}
