import { cardToString, isRed } from '../cards/Card.js';
import type { Card } from '../cards/Card.js';
import { actionLabel, legalActions } from '../games/blackjack/actions.js';
import { bestValue, isBusted, outcomeLabel, possibleValues } from '../games/blackjack/hand.js';
import type { GameAction, GameState, HandSnapshot } from '../games/blackjack/types.js';
import type { Palette } from './theme.js';

const HIDDEN = '??';

export function formatAmount(n: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

function paintCard(p: Palette, c: Card): string {
  const s = cardToString(c);
  return isRed(c) ? p.red(s) : p.black(s);
}

// "12" for a hard total, "7/17" while an Ace still counts 11
export function valueText(hand: HandSnapshot): string {
  if (isBusted(hand)) return `${bestValue(hand)} BUST`;
  const live = possibleValues(hand).filter((v) => v <= 21);
  return live.join('/');
}

export function renderHand(p: Palette, hand: HandSnapshot, opts: { hideHole?: boolean } = {}): string {
  if (opts.hideHole && hand.cards.length > 1) {
    return `${paintCard(p, hand.cards[0])} ${HIDDEN}`;
  }
  const cards = hand.cards.map((c) => paintCard(p, c)).join(' ');
  return `${cards}  ${p.dim('(' + valueText(hand) + ')')}`;
}

/** Lines describing the table; the dealer's hole card stays hidden during the player's turn. */
export function renderState(p: Palette, state: GameState): string[] {
  switch (state.phase) {
    case 'waiting_for_bet':
      return [`Bankroll: ${p.bold(formatAmount(state.bankroll))}`];
    case 'waiting_to_deal':
      return [`Bet: ${p.bold(formatAmount(state.bet))}  Bankroll: ${formatAmount(state.bankroll)}`];
    case 'player_turn':
    case 'dealer_turn':
    case 'round_complete': {
      const hideHole = state.phase === 'player_turn';
      const lines = [`Dealer: ${renderHand(p, state.dealerHand, { hideHole })}`];
      state.playerHands.forEach((hand, i) => {
        const marker = state.phase === 'player_turn' && state.activeHandIndex === i ? p.info('>') : ' ';
        const outcome = hand.outcome ? `  ${p.bold(outcomeLabel(hand.outcome))}` : '';
        lines.push(`${marker} Hand ${i + 1}: ${renderHand(p, hand)}  bet ${formatAmount(hand.bet)}${outcome}`);
      });
      lines.push(`Bankroll: ${p.bold(formatAmount(state.bankroll))}`);
      return lines;
    }
  }
}

const KEY: Record<GameAction, string> = { hit: 'h', stand: 's', double: 'd', split: 'p' };

export function renderPrompt(state: GameState): string {
  return legalActions(state)
    .map((a) => `[${KEY[a]}] ${actionLabel(a).toLowerCase()}`)
    .join('  ');
}
