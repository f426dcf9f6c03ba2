import { CARDS_PER_DECK, Shoe, makeDecks, minCardsNeeded } from '../shoe.js';
import { seededRNG } from '../../../util/rng.js';

describe('shoe', () => {
  test('decks are built rank by rank, suit by suit', () => {
    const deck = makeDecks(1);
    expect(deck).toHaveLength(CARDS_PER_DECK);
    expect(deck[0]).toEqual({ rank: '2', suit: 'C' });
    expect(deck[3]).toEqual({ rank: '2', suit: 'S' });
    expect(deck[51]).toEqual({ rank: 'A', suit: 'S' });
    expect(makeDecks(6)).toHaveLength(312);
  });

  test('draws from the top and keeps the discards', () => {
    const shoe = new Shoe(1);
    expect(shoe.draw()).toEqual({ rank: 'A', suit: 'S' });
    expect(shoe.remaining).toBe(51);
    expect(shoe.discardedCount).toBe(1);
    expect(shoe.discarded[0]).toEqual({ rank: 'A', suit: 'S' });
  });

  test('an empty shoe draws undefined', () => {
    const shoe = new Shoe(1);
    for (let i = 0; i < CARDS_PER_DECK; i++) shoe.draw();
    expect(shoe.draw()).toBeUndefined();
    expect(shoe.remaining).toBe(0);
  });

  test('every draw moves one card to the discards until a multi-deck shoe is spent', () => {
    const shoe = new Shoe(2);
    const total = 2 * CARDS_PER_DECK;
    for (let i = 1; i <= total; i++) {
      shoe.draw();
      expect(shoe.remaining + shoe.discardedCount).toBe(total);
      expect(shoe.discardedCount).toBe(i);
    }
    expect(shoe.remaining).toBe(0);
    expect(shoe.discardedCount).toBe(104);
    expect(shoe.draw()).toBeUndefined();
    expect(shoe.discardedCount).toBe(104);
  });

  test('the default shuffle moves most cards', () => {
    const shoe = new Shoe(1);
    shoe.shuffle();
    const fresh = makeDecks(1);
    const moved = shoe.available.filter((c, i) => c.rank !== fresh[i].rank || c.suit !== fresh[i].suit).length;
    // about one card stays put on average; 12 or more fixed is below one in a billion
    expect(moved).toBeGreaterThan(40);
  });

  test('shuffle keeps every card', () => {
    const shoe = new Shoe(2, seededRNG(7));
    shoe.shuffle();
    expect(shoe.remaining).toBe(104);
    const counts = new Map<string, number>();
    for (const c of shoe.available) counts.set(c.rank + c.suit, (counts.get(c.rank + c.suit) ?? 0) + 1);
    expect(counts.size).toBe(52);
    expect([...counts.values()].every((n) => n === 2)).toBe(true);
  });

  test('the same seed gives the same order', () => {
    const a = new Shoe(1, seededRNG(42));
    const b = new Shoe(1, seededRNG(42));
    a.shuffle();
    b.shuffle();
    expect(a.available).toEqual(b.available);
  });

  test('replenishes only below the minimum', () => {
    expect(minCardsNeeded(1)).toBe(8);
    const shoe = new Shoe(1);
    while (shoe.remaining > 8) shoe.draw();
    expect(shoe.ensureCardsForPlayers(1)).toBe(false);
    shoe.draw();
    expect(shoe.ensureCardsForPlayers(1)).toBe(true);
    expect(shoe.remaining).toBe(52);
    expect(shoe.discardedCount).toBe(0);
  });
});
