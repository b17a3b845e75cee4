import { readNamedEntities } from './records.js';

/** Collapses any value into a single trimmed line; null and undefined become "". */
export function cleanText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value)
    .replace(/[\r\n\t]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** `[{ name: 'A' }, { name: 'B' }]` -> `'A|B'`; entries without a name are skipped. */
export function joinNames(value: unknown): string {
  const entities = readNamedEntities(value);
  if (!entities) return '';
  return entities
    .map((entity) => entity.name)
    .filter(Boolean)
    .join('|');
}

export function joinValues(values: readonly string[] | undefined): string {
  return (values ?? []).join('|');
}
