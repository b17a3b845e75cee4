export const EXTRA_COLUMNS = ['barcode', 'resource_url'] as const;

export type ExtraColumn = (typeof EXTRA_COLUMNS)[number];

export interface CollectionRow {
  release_id: number;
  master_id: number | null;
  artist: string;
  title: string;
  date_added: string;
  variant: string;
  format: string;
  release_date: string;
  country: string;
  label: string;
  catno: string;
  genres: string;
  styles: string;
  barcode?: string;
  resource_url?: string;
}

export type CollectionRowField = keyof CollectionRow;

export const ROW_FIELDS: readonly CollectionRowField[] = [
  'release_id',
  'master_id',
  'artist',
  'title',
  'date_added',
  'variant',
  'format',
  'release_date',
  'country',
  'label',
  'catno',
  'genres',
  'styles',
  ...EXTRA_COLUMNS
];
