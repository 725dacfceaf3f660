/**
 * ANSI styling for console log lines
 */

const ESC = '\u001b[';
const RESET = `${ESC}0m`;

export type Style = (text: string) => string;

const sgr =
  (...codes: number[]): Style =>
  (text) =>
    `${ESC}${codes.join(';')}m${text}${RESET}`;

export const Styles = {
  blue: sgr(34),
  green: sgr(32),
  yellow: sgr(33),
  red: sgr(31),
  boldRed: sgr(1, 31),
  // bold black text on a coloured background
  badgeBlue: sgr(1, 30, 44),
  badgeGreen: sgr(1, 30, 42),
  badgeRed: sgr(1, 30, 41),
  badgeYellow: sgr(1, 30, 43),
} as const;

/**
 * Substrings highlighted wherever they appear in a formatted line
 */
export const DEFAULT_COLOR_RULES: ReadonlyArray<readonly [string, Style]> = [
  ['DEBUG', Styles.blue],
  ['INFO', Styles.green],
  ['WARNING', Styles.yellow],
  ['ERROR', Styles.red],
  ['CRITICAL', Styles.boldRed],
  ['[START]', Styles.badgeBlue],
  ['[PASS]', Styles.badgeGreen],
  ['[FAIL]', Styles.badgeRed],
  ['[RUNNING]', Styles.badgeYellow],
];

export const colorize = (
  line: string,
  rules: ReadonlyArray<readonly [string, Style]> = DEFAULT_COLOR_RULES
): string =>
  rules.reduce(
    (formatted, [token, style]) => formatted.split(token).join(style(token)),
    line
  );

export const stripAnsi = (text: string): string =>
  text.replace(/\u001b\[[0-9;]*m/g, '');
