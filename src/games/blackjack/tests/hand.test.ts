import {
  bestValue,
  canSplit,
  cloneHand,
  createHand,
  doubleBet,
  handToString,
  isBlackjack,
  isBusted,
  isNaturalBlackjack,
  isSoft,
  outcomeLabel,
  possibleValues,
} from '../hand.js';
import { cards } from './helpers.js';

const hand = (...specs: string[]) => ({ cards: cards(...specs) });

describe('hand values', () => {
  test('an empty hand is worth 0', () => {
    expect(possibleValues(createHand())).toEqual([0]);
    expect(bestValue(createHand())).toBe(0);
  });

  test('face cards count ten', () => {
    expect(possibleValues(hand('JS', 'QH', 'KD'))).toEqual([30]);
  });

  test('an Ace counts 1 or 11', () => {
    expect(possibleValues(hand('AS', 'KH'))).toEqual([11, 21]);
    expect(bestValue(hand('AS', 'KH'))).toBe(21);
  });

  test('two Aces give three totals', () => {
    expect(possibleValues(hand('AS', 'AD'))).toEqual([2, 12, 22]);
    expect(bestValue(hand('AS', 'AD'))).toBe(12);
  });

  test('A A 9 is 21', () => {
    expect(bestValue(hand('AS', 'AD', '9H'))).toBe(21);
  });

  test('k Aces give k + 1 totals ten apart', () => {
    expect(possibleValues(hand('AS', 'AD', 'AH', 'AC', '5S'))).toEqual([9, 19, 29, 39, 49]);
    expect(bestValue(hand('AS', 'AD', 'AH', 'AC', '5S'))).toBe(19);
  });

  test('card order does not change the best value', () => {
    const orders = [
      ['AS', '5D', 'KH'],
      ['5D', 'AS', 'KH'],
      ['KH', '5D', 'AS'],
      ['5D', 'KH', 'AS'],
    ];
    expect(orders.map((o) => bestValue(hand(...o)))).toEqual([16, 16, 16, 16]);
  });

  test('best value falls back to the lowest total once every total busts', () => {
    expect(bestValue(hand('10S', '9D', '5H'))).toBe(24);
    expect(isBusted(hand('10S', '9D', '5H'))).toBe(true);
    expect(isBusted(hand('AS', '10D', '5H'))).toBe(false);
  });
});

describe('hand predicates', () => {
  test('natural needs exactly two cards making 21', () => {
    expect(isNaturalBlackjack(hand('AS', 'QD'))).toBe(true);
    expect(isNaturalBlackjack(hand('7S', '7D', '7H'))).toBe(false);
    expect(isBlackjack(hand('7S', '7D', '7H'))).toBe(true);
  });

  test('soft while an Ace still counts 11', () => {
    expect(isSoft(hand('AS', '6D'))).toBe(true);
    expect(isSoft(hand('AS', '6D', '10H'))).toBe(false);
    expect(isSoft(hand('10S', '7D'))).toBe(false);
  });

  test('split needs two cards of the same rank', () => {
    expect(canSplit(hand('8S', '8D'))).toBe(true);
    expect(canSplit(hand('KS', 'QD'))).toBe(false);
    expect(canSplit(hand('8S', '8D', '8H'))).toBe(false);
  });
});

describe('hand bookkeeping', () => {
  test('doubling the bet and cloning', () => {
    const h = { cards: cards('5S', '6D'), bet: 50 };
    const copy = cloneHand(h);
    doubleBet(h);
    expect(h.bet).toBe(100);
    expect(copy.bet).toBe(50);
    expect(copy.cards).not.toBe(h.cards);
    expect(copy).not.toHaveProperty('outcome');
  });

  test('labels and strings', () => {
    expect(outcomeLabel('blackjack')).toBe('BLACKJACK');
    expect(outcomeLabel('push')).toBe('PUSH');
    expect(handToString(hand('AS', '10H'))).toBe('A♠ 10♥');
  });
});
