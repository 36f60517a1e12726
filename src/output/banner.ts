/**
 * Run banner rendering with Unicode box-drawing characters.
 *
 * Falls back to ASCII box characters on terminals that can't draw them
 * (TERM=dumb, or a non-UTF-8 locale).
 */

import { palette } from './colors.js';
import type { Buckets } from '../types/index.js';
import { bucketCounts } from '../classifier/index.js';

/** Dumb terminals and the Linux console without a UTF-8 locale get ASCII. */
function supportsUnicode(): boolean {
  if (process.env['TERM'] === 'dumb') return false;
  const locale = process.env['LC_ALL'] || process.env['LC_CTYPE'] || process.env['LANG'] || '';
  return locale === '' || /utf-?8/i.test(locale);
}

interface BoxChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

const unicodeBox: BoxChars = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
};

const asciiBox: BoxChars = {
  topLeft: '+',
  topRight: '+',
  bottomLeft: '+',
  bottomRight: '+',
  horizontal: '-',
  vertical: '|',
};

/**
 * Render a boxed banner with a title and optional subtitle lines.
 *
 * ```
 * +------------------------------------+
 * | dmesg-triage                       |
 * | 812 lines, rules from embedded     |
 * +------------------------------------+
 * ```
 */
export function renderBanner(title: string, ...subtitles: string[]): string {
  const box = supportsUnicode() ? unicodeBox : asciiBox;
  const body = [title, ...subtitles];
  const innerWidth = Math.max(...body.map((line) => line.length)) + 2;

  const top = `${box.topLeft}${box.horizontal.repeat(innerWidth)}${box.topRight}`;
  const rows = body.map(
    (line) => `${box.vertical} ${line.padEnd(innerWidth - 1)}${box.vertical}`,
  );
  const bottom = `${box.bottomLeft}${box.horizontal.repeat(innerWidth)}${box.bottomRight}`;

  return palette.banner([top, ...rows, bottom].join('\n'));
}

/**
 * Banner shown before the section menu: line totals per bucket and the
 * source of the active rules.
 */
export function renderRunBanner(buckets: Buckets, rulesSource: string): string {
  const counts = bucketCounts(buckets);
  const total = counts.critical + counts.error + counts.warning + counts.info;
  return renderBanner(
    'dmesg-triage',
    `${total} lines, rules from ${rulesSource}`,
    `critical ${counts.critical}  error ${counts.error}  warning ${counts.warning}  info ${counts.info}`,
  );
}
