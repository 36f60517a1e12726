/**
 * Output module barrel export.
 *
 * Terminal styling for classified lines and the tool's own messages.
 */

export { decorate } from './decorate.js';
export { palette, normalizeColorName, getRuleColor, isKnownColor } from './colors.js';
export { renderBanner, renderRunBanner } from './banner.js';
