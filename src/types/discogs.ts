// Raw Discogs payloads after boundary parsing. Every field is optional because the
// collection listing and the release endpoint populate different subsets.

export interface NamedEntity {
  name: string;
}

export interface LabelEntity extends NamedEntity {
  catno: string;
}

export interface FormatEntry {
  name: string;
  qty: string;
  text: string;
  descriptions: string[];
}

export interface ReleaseIdentifier {
  type: string;
  value: string;
}

export interface ReleaseRecord {
  id?: number;
  master_id?: number;
  title?: string;
  artists?: NamedEntity[];
  labels?: LabelEntity[];
  formats?: FormatEntry[];
  genres?: string[];
  styles?: string[];
  country?: string;
  released?: string;
  released_formatted?: string;
  year?: number | string;
  resource_url?: string;
  identifiers?: ReleaseIdentifier[];
}

export interface CollectionItem {
  /** Release id the listing links the instance to. */
  id?: number;
  date_added: string;
  basic_information: ReleaseRecord;
}

export interface CollectionFolder {
  id: number;
  name: string;
  count: number;
}

export type EnrichmentResult =
  | { status: 'ok'; release: ReleaseRecord }
  | { status: 'failed'; error: string }
  | { status: 'skipped' };
