import type { Card } from '../../cards/Card.js';
import { parseSettings } from '../../config/settings.js';
import type { GameSettings, GameSettingsInput } from '../../config/settings.js';
import { log as rootLog } from '../../log.js';
import type { Logger } from '../../log.js';
import { RNG, cryptoRNG } from '../../util/rng.js';
import { bestValue, canSplit, cloneHand, doubleBet, handWithCard, isBlackjack, isBusted, isNaturalBlackjack } from './hand.js';
import { addCardToHand, createPlayer, resetHands } from './player.js';
import { Shoe } from './shoe.js';
import type {
  CardSource,
  CommandResult,
  GameAction,
  GameEvent,
  GameListener,
  GameState,
  Hand,
  HandSnapshot,
  Player,
} from './types.js';

// Dealer draws at 16 or less and stands on every 17.
export const DEALER_STANDS_ON = 17;
export const BLACKJACK_RETURN = 2.5; // stake plus 3:2
export const WIN_RETURN = 2; // stake plus even money

export type GameOptions = {
  shoe?: CardSource;
  rng?: RNG;
  logger?: Logger;
};

function frozen(state: GameState): GameState {
  return Object.freeze(state);
}

function snapshot(hand: Hand): HandSnapshot {
  const copy = cloneHand(hand);
  Object.freeze(copy.cards);
  return Object.freeze(copy);
}

/**
 * One player against the dealer, driven one command at a time. Every command
 * either moves the round forward or is refused with a reason; a refused
 * command leaves the state exactly as it was.
 */
export class BlackjackGame {
  readonly settings: GameSettings;
  private readonly shoe: CardSource;
  private readonly player: Player;
  private readonly dealer: Player;
  private readonly listeners = new Set<GameListener>();
  private readonly log: Logger;
  private state: GameState;

  constructor(settings: GameSettings, opts: GameOptions = {}) {
    this.settings = settings;
    this.log = (opts.logger ?? rootLog).child({ scope: 'blackjack', player: settings.playerName });
    if (opts.shoe) {
      this.shoe = opts.shoe;
    } else {
      const shoe = new Shoe(settings.deckCount, opts.rng ?? cryptoRNG);
      shoe.shuffle();
      this.shoe = shoe;
    }
    this.player = createPlayer(settings.startingBankroll);
    this.dealer = createPlayer(0);
    this.state = frozen({ phase: 'waiting_for_bet', bankroll: this.player.bankroll });
  }

  getState(): GameState {
    return this.state;
  }

  get cardsRemaining(): number {
    return this.shoe.remaining;
  }

  on(listener: GameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  shuffleShoe(): void {
    this.shoe.shuffle();
  }

  placeBet(amount: number): CommandResult {
    if (this.state.phase !== 'waiting_for_bet') return this.reject('bet', `Cannot bet during ${this.state.phase}`);
    if (!Number.isFinite(amount) || amount <= 0) return this.reject('bet', 'Bet must be a positive amount');
    if (amount > this.player.bankroll) return this.reject('bet', 'You cannot bet more than you have');

    this.player.bankroll -= amount;
    this.player.hands[0].bet = amount;
    return this.moveTo(frozen({ phase: 'waiting_to_deal', bet: amount, bankroll: this.player.bankroll }));
  }

  deal(): CommandResult {
    if (this.state.phase !== 'waiting_to_deal') return this.reject('deal', `Cannot deal during ${this.state.phase}`);

    if (this.shoe.ensureCardsForPlayers(1)) {
      this.emit({ type: 'shoe_replenished', decks: this.settings.deckCount, cards: this.shoe.remaining });
      this.log.info({ msg: 'shoe_replenished', decks: this.settings.deckCount, cards: this.shoe.remaining });
    }
    if (this.shoe.remaining < 4) return this.reject('deal', 'The shoe is empty');

    for (let i = 0; i < 2; i++) {
      this.drawTo('player', 0);
      this.drawTo('dealer', 0);
    }

    const hand = this.player.hands[0];
    const dealerHand = this.dealer.hands[0];
    const playerNatural = isNaturalBlackjack(hand);
    const dealerNatural = isNaturalBlackjack(dealerHand);

    if (playerNatural && dealerNatural) {
      this.player.bankroll += hand.bet;
      hand.outcome = 'push';
      return this.completeRound();
    }
    if (playerNatural) {
      this.player.bankroll += hand.bet * BLACKJACK_RETURN;
      hand.outcome = 'blackjack';
      return this.completeRound();
    }
    if (dealerNatural) {
      hand.outcome = 'loss';
      return this.completeRound();
    }
    return this.moveTo(this.playerTurn(0));
  }

  act(action: GameAction, handIndex: number): CommandResult {
    if (this.state.phase !== 'player_turn') return this.reject(action, `Cannot ${action} during ${this.state.phase}`);
    if (handIndex !== this.state.activeHandIndex) return this.reject(action, `Hand ${handIndex + 1} is not in play`);

    switch (action) {
      case 'hit':
        return this.hit(handIndex);
      case 'stand':
        return this.advance(handIndex);
      case 'double':
        return this.double(handIndex);
      case 'split':
        return this.split(handIndex);
    }
  }

  private hit(handIndex: number): CommandResult {
    if (!this.drawTo('player', handIndex)) return this.reject('hit', 'The shoe is empty');

    const hand = this.player.hands[handIndex];
    if (isBusted(hand)) {
      hand.outcome = 'loss';
      if (handIndex + 1 < this.player.hands.length) return this.advance(handIndex);
      // Earlier split hands still standing need the dealer; otherwise there is nothing to compare.
      if (this.player.hands.some((h) => !isBusted(h))) return this.moveTo(this.dealerTurn());
      return this.completeRound();
    }
    // 21 cannot improve
    if (isBlackjack(hand)) return this.advance(handIndex);
    return this.moveTo(this.playerTurn(handIndex));
  }

  private double(handIndex: number): CommandResult {
    const hand = this.player.hands[handIndex];
    if (this.player.bankroll < hand.bet) return this.reject('double', 'Not enough bankroll to double');
    if (!this.drawTo('player', handIndex)) return this.reject('double', 'The shoe is empty');

    this.player.bankroll -= hand.bet;
    doubleBet(hand);
    return this.advance(handIndex);
  }

  private split(handIndex: number): CommandResult {
    const hand = this.player.hands[handIndex];
    if (!canSplit(hand)) return this.reject('split', 'Only two cards of the same rank can be split');
    if (this.player.bankroll < hand.bet) return this.reject('split', 'Not enough bankroll to split');
    if (this.shoe.remaining < 1) return this.reject('split', 'The shoe is empty');

    const moved = hand.cards.pop();
    if (moved === undefined) return this.reject('split', 'Only two cards of the same rank can be split');
    this.player.bankroll -= hand.bet;
    this.player.hands.splice(handIndex + 1, 0, handWithCard(moved, hand.bet));
    this.drawTo('player', handIndex);
    return this.moveTo(this.playerTurn(handIndex));
  }

  /**
   * One dealer decision: draw at 16 or less, otherwise settle. Each non-final
   * draw leaves the round in `dealer_turn` so a renderer can show the card.
   */
  dealerStep(): CommandResult {
    if (this.state.phase !== 'dealer_turn') return this.reject('dealer', `Cannot play the dealer during ${this.state.phase}`);
    const dealerHand = this.dealer.hands[0];
    if (bestValue(dealerHand) >= DEALER_STANDS_ON) return this.completeRound();

    if (!this.drawTo('dealer', 0)) {
      this.log.warn({ msg: 'shoe_exhausted_during_dealer_turn', dealer: bestValue(dealerHand) });
      return this.completeRound();
    }
    if (isBusted(dealerHand)) return this.completeRound();
    return this.moveTo(this.dealerTurn());
  }

  /** Runs the dealer to settlement, returning the state after every step. */
  playDealer(): GameState[] {
    if (this.state.phase !== 'dealer_turn') {
      this.reject('dealer', `Cannot play the dealer during ${this.state.phase}`);
      return [];
    }
    const steps: GameState[] = [];
    while (this.state.phase === 'dealer_turn') {
      steps.push(this.dealerStep().state);
    }
    return steps;
  }

  /**
   * Settles every open hand against the dealer's hand as it stands now. The
   * dealer draws nothing more; use `dealerStep()` or `playDealer()` to finish
   * the dealer's turn under the house rules.
   */
  settle(): CommandResult {
    if (this.state.phase !== 'dealer_turn') return this.reject('settle', `Cannot settle during ${this.state.phase}`);
    return this.completeRound();
  }

  nextRound(): CommandResult {
    if (this.state.phase !== 'round_complete') return this.reject('next_round', `Cannot start a new round during ${this.state.phase}`);
    resetHands(this.player);
    resetHands(this.dealer);
    return this.moveTo(frozen({ phase: 'waiting_for_bet', bankroll: this.player.bankroll }));
  }

  // Move to the next split hand, giving it its second card, or hand over to the dealer.
  private advance(handIndex: number): CommandResult {
    const next = handIndex + 1;
    if (next < this.player.hands.length) {
      this.drawTo('player', next);
      return this.moveTo(this.playerTurn(next));
    }
    return this.moveTo(this.dealerTurn());
  }

  private completeRound(): CommandResult {
    const dealerHand = this.dealer.hands[0];
    const dealerValue = bestValue(dealerHand);
    const dealerBusted = isBusted(dealerHand);

    for (const hand of this.player.hands) {
      if (hand.outcome !== undefined) continue;
      const value = bestValue(hand);
      if (isBusted(hand)) {
        hand.outcome = 'loss';
      } else if (dealerBusted || value > dealerValue) {
        this.player.bankroll += hand.bet * WIN_RETURN;
        hand.outcome = 'win';
      } else if (value < dealerValue) {
        hand.outcome = 'loss';
      } else {
        this.player.bankroll += hand.bet;
        hand.outcome = 'push';
      }
    }

    const result = this.moveTo(
      frozen({
        phase: 'round_complete',
        dealerHand: snapshot(dealerHand),
        playerHands: Object.freeze(this.player.hands.map(snapshot)),
        bankroll: this.player.bankroll,
      }),
    );
    const outcomes = this.player.hands.flatMap((h) => (h.outcome ? [h.outcome] : []));
    this.emit({ type: 'round_settled', outcomes, bankroll: this.player.bankroll });
    this.log.info({ msg: 'round_settled', outcomes, dealer: dealerValue, bankroll: this.player.bankroll });
    return result;
  }

  private playerTurn(activeHandIndex: number): GameState {
    return frozen({
      phase: 'player_turn',
      dealerHand: snapshot(this.dealer.hands[0]),
      playerHands: Object.freeze(this.player.hands.map(snapshot)),
      bankroll: this.player.bankroll,
      activeHandIndex,
    });
  }

  private dealerTurn(): GameState {
    return frozen({
      phase: 'dealer_turn',
      dealerHand: snapshot(this.dealer.hands[0]),
      playerHands: Object.freeze(this.player.hands.map(snapshot)),
      bankroll: this.player.bankroll,
    });
  }

  private drawTo(target: 'player' | 'dealer', handIndex: number): Card | undefined {
    const c = this.shoe.draw();
    if (c === undefined) return undefined;
    addCardToHand(target === 'player' ? this.player : this.dealer, c, handIndex);
    this.emit({ type: 'card_dealt', target, handIndex, card: c });
    return c;
  }

  private moveTo(next: GameState): CommandResult {
    const from = this.state.phase;
    this.state = next;
    if (from !== next.phase) {
      this.emit({ type: 'phase_changed', from, to: next.phase });
      this.log.debug({ msg: 'phase_changed', from, to: next.phase });
    }
    return { ok: true, state: next };
  }

  private reject(command: string, reason: string): CommandResult {
    this.emit({ type: 'command_rejected', command, reason });
    this.log.debug({ msg: 'command_rejected', command, reason, phase: this.state.phase });
    return { ok: false, reason, state: this.state };
  }

  private emit(event: GameEvent) {
    for (const listener of this.listeners) listener(event);
  }
}

/** Validates the settings (throwing SettingsError) and opens a table with a shuffled shoe. */
export function createGame(settings: GameSettingsInput, opts: GameOptions = {}): BlackjackGame {
  return new BlackjackGame(parseSettings(settings), opts);
}
