export * from './discogs.js';
export * from './normalized.js';
