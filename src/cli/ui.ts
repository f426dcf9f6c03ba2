import boxen from 'boxen';
import logSymbols from 'log-symbols';
import { getPalette } from './theme.js';
import { isInteractive, isTestEnv } from '../util/env.js';

export type SayStyle = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

const noColor = !!process.env.NO_COLOR || process.argv.includes('--no-color') || !isInteractive();
export const palette = getPalette(noColor);

export function format(msg: string, style: SayStyle = 'info'): string {
  switch (style) {
    case 'success': return `${logSymbols.success} ${palette.success(msg)}`;
    case 'warn': return `${logSymbols.warning} ${palette.warn(msg)}`;
    case 'error': return `${logSymbols.error} ${palette.error(msg)}`;
    case 'dim': return palette.dim(msg);
    case 'title': return palette.bold(palette.info(msg));
    default: return `${logSymbols.info} ${palette.info(msg)}`;
  }
}

function say(msg: string, style: SayStyle = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  console.log(format(msg, style));
}

function lines(rows: string[]) {
  if (isTestEnv()) return;
  for (const r of rows) console.log(r);
}

function banner(playerName: string, decks: number) {
  if (isTestEnv() || process.env.CLI_BANNER === 'off') return;
  const body = `${palette.bold('Blackjack')}\n\n${palette.dim(`${playerName} · ${decks}-deck shoe · blackjack pays 3:2`)}`;
  console.log(boxen(body, { padding: 1, borderColor: 'green' }));
}

export const ui = { say, lines, banner, format };
export default ui;
