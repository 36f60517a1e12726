/**
 * Color palette constants and the rule color table for terminal output.
 *
 * Uses ansis for ANSI color support with built-in strip() for tests.
 * ansis auto-detects color support level (no colors, 256, truecolor).
 */

import ansis from 'ansis';

type Paint = typeof ansis.red;

/**
 * Color palette for the tool's own messages.
 */
export const palette = {
  error: ansis.bold.red,
  warning: ansis.yellow,
  dim: ansis.dim,
  banner: ansis.bold.cyan,
} as const;

/**
 * Colors a rule may name, keyed by normalized name.
 */
const ruleColors = new Map<string, Paint>([
  ['red', ansis.red],
  ['bold-red', ansis.bold.red],
  ['green', ansis.green],
  ['bold-green', ansis.bold.green],
  ['yellow', ansis.yellow],
  ['bold-yellow', ansis.bold.yellow],
  ['blue', ansis.blue],
  ['magenta', ansis.magenta],
  ['cyan', ansis.cyan],
  ['white', ansis.white],
  ['black', ansis.black],
  ['gray', ansis.gray],
]);

/**
 * "Bold Red", "bold_red" and "bold-red" all name the same color.
 */
export function normalizeColorName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, '-');
}

/** Look up a rule color. Returns undefined for names outside the table. */
export function getRuleColor(name: string): Paint | undefined {
  return ruleColors.get(normalizeColorName(name));
}

export function isKnownColor(name: string): boolean {
  return ruleColors.has(normalizeColorName(name));
}
