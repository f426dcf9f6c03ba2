import chalk from 'chalk';

export type Chalk = InstanceType<typeof chalk.Instance>;

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  red: (s: string) => string;
  black: (s: string) => string;
  bold: (s: string) => string;
};

export function makeChalk(noColor: boolean): Chalk {
  return new chalk.Instance({ level: noColor ? 0 : 3 });
}

export function getPalette(noColor = !!process.env.NO_COLOR || process.argv.includes('--no-color')): Palette {
  const c = makeChalk(noColor);
  const theme = (process.env.CLI_THEME || 'felt').toLowerCase();
  if (theme === 'mono') {
    return {
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      red: c.white,
      black: c.white,
      bold: c.bold,
    };
  }
  // felt (default)
  return {
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    red: c.redBright,
    black: c.whiteBright,
    bold: c.bold,
  };
}
