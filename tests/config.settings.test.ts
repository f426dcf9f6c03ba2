import {
  DEFAULT_BANKROLL,
  defaultSinglePlayer,
  loadSettingsFromEnv,
  parseSettings,
  shoeChangeDelayMs,
  validateSettings,
} from '../src/config/settings.js';
import { SettingsError } from '../src/util/errors.js';

describe('game settings', () => {
  test('fills in the default bankroll', () => {
    expect(validateSettings({ playerName: 'Ann', deckCount: 6 })).toEqual({
      ok: true,
      settings: { playerName: 'Ann', deckCount: 6, startingBankroll: DEFAULT_BANKROLL },
    });
  });

  test('single-player defaults', () => {
    expect(defaultSinglePlayer('Bo')).toEqual({ playerName: 'Bo', deckCount: 6, startingBankroll: 10_000 });
  });

  test.each([0, 9, 2.5, 'six'])('deck count %p is refused', (deckCount) => {
    expect(validateSettings({ playerName: 'Ann', deckCount })).toEqual({
      ok: false,
      reason: 'Deck count must be between 1 and 8',
    });
  });

  test('blank names are refused', () => {
    expect(validateSettings({ playerName: '   ', deckCount: 1 })).toEqual({ ok: false, reason: 'Player name cannot be empty' });
  });

  test('unknown keys are refused', () => {
    expect(validateSettings({ playerName: 'Ann', deckCount: 1, seats: 3 }).ok).toBe(false);
  });

  test('parseSettings throws SettingsError', () => {
    expect(() => parseSettings({ playerName: 'Ann', deckCount: -1 })).toThrow(SettingsError);
  });
});

describe('settings from the environment', () => {
  test('defaults when nothing is set', () => {
    expect(loadSettingsFromEnv({})).toEqual({ playerName: 'Player', deckCount: 6, startingBankroll: 10_000 });
  });

  test('reads player, decks and bankroll', () => {
    const env = { BLACKJACK_PLAYER: 'Cy', BLACKJACK_DECKS: '2', BLACKJACK_BANKROLL: '250' };
    expect(loadSettingsFromEnv(env)).toEqual({ playerName: 'Cy', deckCount: 2, startingBankroll: 250 });
  });

  test('malformed numbers are reported', () => {
    expect(() => loadSettingsFromEnv({ BLACKJACK_DECKS: 'abc' })).toThrow('Deck count must be between 1 and 8');
  });

  test('shoe change delay', () => {
    expect(shoeChangeDelayMs({})).toBe(2000);
    expect(shoeChangeDelayMs({ SHOE_CHANGE_DELAY_MS: '500' })).toBe(500);
    expect(shoeChangeDelayMs({ SHOE_CHANGE_DELAY_MS: '0' })).toBe(0);
    expect(shoeChangeDelayMs({ SHOE_CHANGE_DELAY_MS: '-1' })).toBe(2000);
    expect(shoeChangeDelayMs({ SHOE_CHANGE_DELAY_MS: 'soon' })).toBe(2000);
  });
});
