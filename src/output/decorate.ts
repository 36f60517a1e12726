import { getRuleColor } from './colors.js';

/**
 * Render a matched line as "{icon} {line}", with the line painted in the
 * rule's color. An unknown color name leaves the line unstyled.
 */
export function decorate(line: string, color: string, icon: string): string {
  const paint = getRuleColor(color);
  return `${icon} ${paint ? paint(line) : line}`;
}
