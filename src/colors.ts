// ABOUTME: Terminal color palette for console output
// ABOUTME: Honours NO_COLOR, TERM=dumb and piped output by returning empty escape codes

export type ColorName = 'red' | 'green' | 'yellow' | 'blue' | 'dim';

export type Colors = Record<ColorName | 'reset', string>;

const ESCAPES: Record<ColorName, string> = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  dim: '\x1b[2m',
};

export function supportsColor(env: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  // https://no-color.org/
  if (env.NO_COLOR) return false;
  if (env.TERM === 'dumb') return false;
  return isTTY;
}

export function getColors(env: NodeJS.ProcessEnv, isTTY: boolean): Colors {
  const hasColor = supportsColor(env, isTTY);

  return {
    red: hasColor ? ESCAPES.red : '',
    green: hasColor ? ESCAPES.green : '',
    yellow: hasColor ? ESCAPES.yellow : '',
    blue: hasColor ? ESCAPES.blue : '',
    dim: hasColor ? ESCAPES.dim : '',
    reset: hasColor ? '\x1b[0m' : '',
  };
}

export function paint(colors: Colors, color: ColorName, text: string): string {
  return `${colors[color]}${text}${colors.reset}`;
}
