import type {
  CollectionFolder,
  CollectionItem,
  FormatEntry,
  LabelEntity,
  NamedEntity,
  ReleaseIdentifier,
  ReleaseRecord
} from '../types/index.js';

// Readers turn untrusted JSON into the optional-field record types. Each one returns
// undefined for a missing or wrongly typed value instead of throwing.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export function readId(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

export function readStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((entry): entry is string => typeof entry === 'string');
}

function readObjects(value: unknown): Record<string, unknown>[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter(isRecord);
}

export function readNamedEntities(value: unknown): NamedEntity[] | undefined {
  return readObjects(value)?.map((entry) => ({ name: readText(entry.name) ?? '' }));
}

export function readLabels(value: unknown): LabelEntity[] | undefined {
  return readObjects(value)?.map((entry) => ({
    name: readText(entry.name) ?? '',
    catno: readText(entry.catno) ?? ''
  }));
}

export function readFormats(value: unknown): FormatEntry[] | undefined {
  return readObjects(value)?.map((entry) => ({
    name: (readText(entry.name) ?? '').trim(),
    qty: (readText(entry.qty) ?? '').trim(),
    text: (readText(entry.text) ?? '').trim(),
    descriptions: Array.isArray(entry.descriptions)
      ? entry.descriptions.map((description) => (readText(description) ?? '').trim())
      : []
  }));
}

export function readIdentifiers(value: unknown): ReleaseIdentifier[] | undefined {
  return readObjects(value)?.map((entry) => ({
    type: readText(entry.type) ?? '',
    value: readText(entry.value) ?? ''
  }));
}

function readYear(value: unknown): number | string | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') return value;
  return undefined;
}

export function parseReleaseRecord(raw: unknown): ReleaseRecord {
  if (!isRecord(raw)) return {};
  return {
    id: readId(raw.id),
    master_id: readId(raw.master_id),
    title: readText(raw.title),
    artists: readNamedEntities(raw.artists),
    labels: readLabels(raw.labels),
    formats: readFormats(raw.formats),
    genres: readStringList(raw.genres),
    styles: readStringList(raw.styles),
    country: readText(raw.country),
    released: readText(raw.released),
    released_formatted: readText(raw.released_formatted),
    year: readYear(raw.year),
    resource_url: readText(raw.resource_url),
    identifiers: readIdentifiers(raw.identifiers)
  };
}

export function parseCollectionItem(raw: unknown): CollectionItem {
  const source: Record<string, unknown> = isRecord(raw) ? raw : {};
  return {
    id: readId(source.id),
    date_added: readText(source.date_added) ?? '',
    basic_information: parseReleaseRecord(source.basic_information)
  };
}

export function parseCollectionFolder(raw: unknown): CollectionFolder {
  if (!isRecord(raw)) {
    throw new Error('Collection folder response is not an object.');
  }
  const count = readId(raw.count);
  if (count === undefined) {
    throw new Error('Collection folder response is missing its item count.');
  }
  return {
    id: readId(raw.id) ?? 0,
    name: readText(raw.name) ?? '',
    count
  };
}
