/**
 * CLI Output Utilities
 *
 * Colored terminal output for promptgate commands.
 */

/**
 * ANSI escape codes for the colors the commands use.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export type ColorName = keyof typeof colors;

/**
 * Colors are off when NO_COLOR is set.
 */
const useColors = !process.env['NO_COLOR'];

/**
 * Wrap text in a color, unless colors are off.
 */
export function color(colorName: ColorName, text: string): string {
  if (!useColors) return text;
  return `${colors[colorName]}${text}${colors.reset}`;
}

/**
 * Print a green check line.
 */
export function success(message: string): void {
  console.log(color('green', `✓ ${message}`));
}

/**
 * Print a red cross line to stderr.
 */
export function error(message: string): void {
  console.error(color('red', `✗ ${message}`));
}

/**
 * Print a yellow warning line.
 */
export function warning(message: string): void {
  console.log(color('yellow', `⚠ ${message}`));
}

/**
 * Print a cyan info line.
 */
export function info(message: string): void {
  console.log(color('cyan', `ℹ ${message}`));
}

/**
 * Print muted text.
 */
export function dim(message: string): void {
  console.log(color('dim', message));
}

/**
 * Print a bold section title with a rule under it.
 */
export function header(text: string): void {
  console.log('');
  console.log(color('bold', text));
  console.log(color('dim', '─'.repeat(Math.min(text.length + 4, 60))));
}

/**
 * Print rows as aligned columns. Column names come from the first row.
 */
export function table(rows: Array<Record<string, string | number | boolean | undefined>>): void {
  const [first] = rows;
  if (!first) return;

  const columns = Object.keys(first);
  const width = (col: string): number =>
    Math.max(col.length, ...rows.map((row) => String(row[col] ?? '').length));
  const widths = new Map(columns.map((col) => [col, width(col)]));
  const pad = (text: string, col: string): string => text.padEnd(widths.get(col) ?? 0);

  console.log(color('bold', columns.map((col) => pad(col, col)).join('  ')));
  console.log(color('dim', columns.map((col) => '─'.repeat(widths.get(col) ?? 0)).join('──')));
  for (const row of rows) {
    console.log(columns.map((col) => pad(String(row[col] ?? ''), col)).join('  '));
  }
}

/**
 * Print data as JSON, indented unless `pretty` is false.
 */
export function json(data: unknown, pretty = true): void {
  console.log(pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data));
}

/**
 * Shorten text to `maxLength`, ending in `...`.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Format milliseconds as `850ms`, `2.5s` or `1m 5s`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}

/**
 * Format a token count as `950`, `12.3k` or `1.25M`.
 */
export function formatTokens(count: number): string {
  if (count < 1000) return String(count);
  if (count < 1000000) return `${(count / 1000).toFixed(1)}k`;
  return `${(count / 1000000).toFixed(2)}M`;
}

/**
 * Format a cost with its currency code, e.g. `0.000480 USD`.
 */
export function formatCost(amount: number, currency: string, decimalPlaces = 6): string {
  return `${amount.toFixed(decimalPlaces)} ${currency}`;
}

/**
 * Print an error and exit.
 */
export function exitWithError(message: string, code = 1): never {
  error(message);
  process.exit(code);
}
