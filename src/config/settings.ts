import { z } from 'zod';
import { SettingsError } from '../util/errors.js';

export const DEFAULT_DECKS = 6;
export const DEFAULT_BANKROLL = 10_000;
export const MIN_DECKS = 1;
export const MAX_DECKS = 8;

const settingsSchema = z.object({
  playerName: z.string().refine((s) => s.trim().length > 0, 'Player name cannot be empty'),
  deckCount: z
    .number({ invalid_type_error: 'Deck count must be between 1 and 8' })
    .int('Deck count must be between 1 and 8')
    .min(MIN_DECKS, 'Deck count must be between 1 and 8')
    .max(MAX_DECKS, 'Deck count must be between 1 and 8'),
  startingBankroll: z.number({ invalid_type_error: 'Starting bankroll must be a finite amount' }).finite('Starting bankroll must be a finite amount').min(0, 'Starting bankroll cannot be negative').default(DEFAULT_BANKROLL),
}).strict();

export type GameSettings = z.output<typeof settingsSchema>;
export type GameSettingsInput = z.input<typeof settingsSchema>;

export type SettingsCheck = { ok: true; settings: GameSettings } | { ok: false; reason: string };

export function defaultSinglePlayer(playerName: string): GameSettings {
  return { playerName, deckCount: DEFAULT_DECKS, startingBankroll: DEFAULT_BANKROLL };
}

export function validateSettings(input: unknown): SettingsCheck {
  const res = settingsSchema.safeParse(input);
  if (res.success) return { ok: true, settings: res.data };
  // first issue only, matching what a prompt can show on one line
  const issue = res.error.issues[0];
  return { ok: false, reason: issue ? issue.message : 'Invalid settings' };
}

export function parseSettings(input: unknown): GameSettings {
  const check = validateSettings(input);
  if (!check.ok) throw new SettingsError(check.reason);
  return check.settings;
}

function num(v: string | undefined, d: number): number {
  if (v === undefined || v.trim() === '') return d;
  return Number(v);
}

/**
 * Build settings from BLACKJACK_PLAYER, BLACKJACK_DECKS and BLACKJACK_BANKROLL.
 * Unset values fall back to the single-player defaults; malformed ones are
 * reported by {@link parseSettings}.
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): GameSettings {
  return parseSettings({
    playerName: env.BLACKJACK_PLAYER ?? 'Player',
    deckCount: num(env.BLACKJACK_DECKS, DEFAULT_DECKS),
    startingBankroll: num(env.BLACKJACK_BANKROLL, DEFAULT_BANKROLL),
  });
}

export function shoeChangeDelayMs(env: NodeJS.ProcessEnv = process.env): number {
  const n = num(env.SHOE_CHANGE_DELAY_MS, 2000);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2000;
}
