/**
 * src/modules/render/helpers/format.ts
 *
 * Display formatting shared by the PDF and any future renderer.
 */

import type { PDFFont } from 'pdf-lib';
import type { AccountTier } from '../../enrichment';
import { EMPTY_TIERS_PLACEHOLDER } from '../../report';

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const oneDecimalFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
});

export function formatInteger(value: number): string {
  return integerFormat.format(value);
}

export function formatCoreHours(value: number): string {
  return oneDecimalFormat.format(value);
}

export function formatTiers(tiers: readonly AccountTier[]): string {
  return tiers.length === 0 ? EMPTY_TIERS_PLACEHOLDER : tiers.join(', ');
}

// Standard PDF fonts only encode WinAnsi.
export function sanitizeText(text: string): string {
  return text.replace(/[^\x20-\x7E\xA0-\xFF]/g, '?');
}

export function fitText(text: string, font: PDFFont, size: number, maxWidth: number): string {
  const clean = sanitizeText(text);
  if (font.widthOfTextAtSize(clean, size) <= maxWidth) return clean;

  const ellipsis = '...';
  let end = clean.length;
  while (end > 0 && font.widthOfTextAtSize(clean.slice(0, end) + ellipsis, size) > maxWidth) {
    end--;
  }
  return clean.slice(0, end) + ellipsis;
}
