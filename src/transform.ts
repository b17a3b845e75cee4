import type {
  CollectionItem,
  CollectionRow,
  EnrichmentResult,
  ExtraColumn,
  ReleaseRecord
} from './types/index.js';
import { firstBarcode, summarizeFormats } from './lib/formats.js';
import { pick, resolveReleaseDate } from './lib/resolve.js';
import { cleanText, joinNames, joinValues } from './lib/text.js';

export interface RowOptions {
  extraColumns?: readonly ExtraColumn[];
}

export function enrichedRelease(enrichment: EnrichmentResult): ReleaseRecord | undefined {
  return enrichment.status === 'ok' ? enrichment.release : undefined;
}

/** The listing's own release link wins over the embedded record's id; 0 counts as missing. */
export function resolveReleaseId(item: CollectionItem): number | undefined {
  const releaseId = item.id || item.basic_information.id;
  return releaseId ? releaseId : undefined;
}

export function buildCollectionRow(
  releaseId: number,
  item: CollectionItem,
  enrichment: EnrichmentResult,
  options: RowOptions = {}
): CollectionRow {
  const full = enrichedRelease(enrichment);
  const basic = item.basic_information;

  const artists = pick('artists', full, basic, []);
  const labels = pick('labels', full, basic, []);
  const formats = pick('formats', full, basic, []);
  const genres = pick('genres', full, basic, []);
  const styles = pick('styles', full, basic, []);

  const { summary, variant } = summarizeFormats(formats);

  const row: CollectionRow = {
    release_id: releaseId,
    master_id: pick('master_id', full, basic) ?? null,
    artist: cleanText(joinNames(artists)),
    title: cleanText(pick('title', full, basic, '')),
    date_added: cleanText(item.date_added),
    variant,
    format: cleanText(summary),
    release_date: resolveReleaseDate(full, basic),
    country: cleanText(pick('country', full, basic, '')),
    label: cleanText(joinNames(labels)),
    catno: cleanText(
      labels
        .map((label) => label.catno)
        .filter(Boolean)
        .join('|')
    ),
    genres: cleanText(joinValues(genres)),
    styles: cleanText(joinValues(styles))
  };

  const extras = new Set(options.extraColumns ?? []);
  if (extras.has('barcode')) {
    row.barcode = firstBarcode(full?.identifiers);
  }
  if (extras.has('resource_url')) {
    row.resource_url = cleanText(pick('resource_url', full, basic, ''));
  }

  return row;
}
