#!/usr/bin/env node
import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import type { Interface } from 'node:readline/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { loadSettingsFromEnv, shoeChangeDelayMs } from '../config/settings.js';
import { parseAction } from '../games/blackjack/actions.js';
import { createGame } from '../games/blackjack/engine.js';
import type { BlackjackGame } from '../games/blackjack/engine.js';
import { createLogger } from '../log.js';
import { normalizeError, userMessage } from '../util/errors.js';
import { renderPrompt, renderState } from './render.js';
import { palette, ui } from './ui.js';

const DEALER_PAUSE_MS = 400;

async function playSession(game: BlackjackGame, rl: Interface) {
  let shoeChanged = false;
  game.on((e) => {
    if (e.type === 'shoe_replenished') shoeChanged = true;
    if (e.type === 'command_rejected') ui.say(e.reason, 'warn');
  });

  for (;;) {
    const state = game.getState();
    switch (state.phase) {
      case 'waiting_for_bet': {
        ui.lines(renderState(palette, state));
        if (state.bankroll <= 0) {
          ui.say('You are out of money.', 'error');
          return;
        }
        const answer = (await rl.question('Bet (q to quit): ')).trim();
        if (answer.toLowerCase() === 'q') return;
        game.placeBet(Number(answer));
        break;
      }
      case 'waiting_to_deal':
        game.deal();
        if (shoeChanged) {
          shoeChanged = false;
          ui.say('Starting a new shoe', 'title');
          await sleep(shoeChangeDelayMs());
        }
        break;
      case 'player_turn': {
        ui.lines(renderState(palette, state));
        const action = parseAction(await rl.question(`${renderPrompt(state)}: `));
        if (!action) {
          ui.say('Unrecognized action', 'warn');
          break;
        }
        game.act(action, state.activeHandIndex);
        break;
      }
      case 'dealer_turn':
        for (const step of game.playDealer()) {
          ui.lines(renderState(palette, step));
          await sleep(DEALER_PAUSE_MS);
        }
        break;
      case 'round_complete':
        ui.lines(renderState(palette, state));
        await rl.question(palette.dim('Press enter for the next round '));
        game.nextRound();
        break;
    }
  }
}

async function main() {
  const logger = createLogger({ pretty: true, level: process.env.LOG_LEVEL ?? 'warn' });
  let game: BlackjackGame;
  try {
    const settings = loadSettingsFromEnv();
    game = createGame(settings, { logger });
  } catch (err) {
    ui.say(userMessage(err), 'error');
    logger.error({ msg: 'startup_failed', error: normalizeError(err) });
    process.exitCode = 1;
    return;
  }

  ui.banner(game.settings.playerName, game.settings.deckCount);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await playSession(game, rl);
  } finally {
    rl.close();
  }
  ui.say(`Final bankroll: ${game.getState().bankroll}`, 'success');
}

main().catch((err) => {
  ui.say(userMessage(err), 'error');
  console.error(normalizeError(err).stack);
  process.exitCode = 1;
});
