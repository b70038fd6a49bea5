/**
 * ANSI styling for terminal output
 *
 * Off under NO_COLOR or TERM=dumb, forced on by FORCE_COLOR, otherwise on for
 * TTYs and CI. Styles nest: red(`a ${cyan('b')} c`).
 */

function detectColorSupport(env: NodeJS.ProcessEnv = process.env): boolean {
  // https://no-color.org/
  if (env.NO_COLOR !== undefined) return false;
  if (env.FORCE_COLOR !== undefined) return true;
  if (env.TERM === 'dumb') return false;

  return process.stdout?.isTTY === true || Boolean(env.CI);
}

export const enabled = detectColorSupport();

export type Colorizer = (text: string | number) => string;

function style(open: number, close: number): Colorizer {
  if (!enabled) return (text) => String(text);

  const start = `\x1b[${open}m`;
  const end = `\x1b[${close}m`;

  // An inner style's close code would end ours too; re-open after it
  return (text) => start + String(text).split(end).join(start) + end;
}

const colors = {
  bold: style(1, 22),
  red: style(31, 39),
  green: style(32, 39),
  yellow: style(33, 39),
  blue: style(34, 39),
  cyan: style(36, 39),
  gray: style(90, 39),
};

export const { bold, red, green, yellow, blue, cyan, gray } = colors;

export type ColorName = keyof typeof colors;

export default colors;
