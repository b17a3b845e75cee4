import { cleanText } from './text.js';
import { readFormats, readIdentifiers } from './records.js';

// Substrings that mark a description as pressing-specific (colour, edition, remaster).
export const VARIANT_KEYWORDS = [
  'colored',
  'red',
  'blue',
  'green',
  'marbled',
  'splatter',
  'limited',
  'reissue',
  'remastered',
  'club'
] as const;

export interface FormatSummary {
  /** e.g. `Vinyl LP Album (Red) x1|Vinyl 7" Single x1` */
  summary: string;
  /** e.g. `Red|Limited Edition` */
  variant: string;
}

function isVariantDescription(description: string): boolean {
  const lowered = description.toLowerCase();
  return VARIANT_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

function uniqueInOrder(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (seen.has(value)) continue;
    seen.add(value);
    result.push(value);
  }
  return result;
}

/**
 * Builds the compact format summary and the variant text for a release.
 * Entries that are not objects are skipped; anything other than a list yields two empty strings.
 */
export function summarizeFormats(value: unknown): FormatSummary {
  const formats = readFormats(value);
  if (!formats) return { summary: '', variant: '' };

  const pieces: string[] = [];
  const variantBits: string[] = [];

  for (const { name, qty, text, descriptions } of formats) {
    if (text) variantBits.push(text);
    for (const description of descriptions) {
      if (description && isVariantDescription(description)) {
        variantBits.push(description);
      }
    }

    let piece = [name, ...descriptions.filter(Boolean)].join(' ').trim();
    if (text) piece = `${piece} (${text})`.trim();
    if (qty) piece = `${piece} x${qty}`.trim();
    if (piece) pieces.push(piece);
  }

  return {
    summary: pieces.join('|'),
    variant: cleanText(uniqueInOrder(variantBits).join('|'))
  };
}

export function firstBarcode(value: unknown): string {
  const barcode = readIdentifiers(value)?.find(
    (identifier) => identifier.type.toLowerCase() === 'barcode'
  );
  return barcode ? cleanText(barcode.value) : '';
}
