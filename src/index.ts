export * from './cards/Card.js';
export * from './games/blackjack/hand.js';
export * from './games/blackjack/player.js';
export * from './games/blackjack/shoe.js';
export * from './games/blackjack/actions.js';
export * from './games/blackjack/engine.js';
export * from './games/blackjack/view.js';
export type * from './games/blackjack/types.js';
export * from './config/settings.js';
export { UserError, SettingsError, normalizeError } from './util/errors.js';
export { cryptoRNG, seededRNG } from './util/rng.js';
export type { RNG } from './util/rng.js';
export { createLogger } from './log.js';
export type { Logger } from './log.js';
