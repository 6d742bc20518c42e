/**
 * Formatting helpers shared by comments, reports and chat messages
 */

import type { PercentChange } from '../cost/index.js';
import type { WeightedPercent } from '../rollup/index.js';

const formatters = new Map<string, Intl.NumberFormat>();

function currencyFormatter(currency: string): Intl.NumberFormat {
  let formatter = formatters.get(currency);
  if (!formatter) {
    formatter = new Intl.NumberFormat('en-US', {
      style: 'currency',
      currency,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    });
    formatters.set(currency, formatter);
  }
  return formatter;
}

/** Round to cents */
export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function formatMoney(amount: number, currency: string): string {
  const rounded = roundMoney(amount);
  return currencyFormatter(currency).format(rounded === 0 ? 0 : rounded);
}

/** "+$10.00", "-$4.00", "$0.00" */
export function formatSignedMoney(amount: number, currency: string): string {
  const rounded = roundMoney(amount);
  const sign = rounded > 0 ? '+' : rounded < 0 ? '-' : '';
  return `${sign}${formatMoney(Math.abs(rounded), currency)}`;
}

/** "+12.5%", "-100.0%", "0.0%", "new" */
export function formatPercent(percent: PercentChange | WeightedPercent): string {
  if (percent.kind === 'new') return 'new';
  if (percent.kind === 'not-applicable') return 'n/a';
  const value = Math.round(percent.value * 10) / 10;
  const sign = value > 0 ? '+' : '';
  return `${sign}${(value === 0 ? 0 : value).toFixed(1)}%`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

export function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Last `maxLines` lines, for embedding tool output in comments
 */
export function tail(text: string, maxLines: number): string {
  const lines = text.trimEnd().split(/\r?\n/);
  if (lines.length <= maxLines) return lines.join('\n');
  return [`… (${lines.length - maxLines} earlier lines omitted)`, ...lines.slice(-maxLines)].join('\n');
}

/**
 * Leading part of `text` within `maxChars`, cut at a line end when possible
 */
export function clipHead(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  let cut = text.slice(0, Math.max(0, maxChars));
  const newline = cut.lastIndexOf('\n');
  if (newline > 0) {
    cut = cut.slice(0, newline);
  } else if (/[\uD800-\uDBFF]$/.test(cut)) {
    cut = cut.slice(0, -1);
  }
  return cut;
}

/**
 * Trailing part of `text` within `maxChars`, cut at a line start when possible
 */
export function clipTail(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  let cut = text.slice(text.length - Math.max(0, maxChars));
  const newline = cut.indexOf('\n');
  if (newline >= 0 && newline < cut.length - 1) {
    cut = cut.slice(newline + 1);
  } else if (/^[\uDC00-\uDFFF]/.test(cut)) {
    cut = cut.slice(1);
  }
  return cut;
}
