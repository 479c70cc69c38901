/** Dataset kind every listing adapter writes and the freshness check reads. */
export const LISTING_KIND = 'listing';

/** Longest collection/kind name the store accepts. */
export const MAX_NAME_LENGTH = 100;

/** Browser-like UA; several fund sites reject obvious bot agents. */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';

export const FILE_EXTENSIONS = {
  json: 'json',
  msgpack: 'msgpack',
} as const;

export const MANIFEST_SUFFIX = '_metadata.json';
