// Market data collected before the analyst fan-out

export const SOURCE_NAMES = [
  'statements',
  'disclosures',
  'stock_price',
  'news',
  'macro',
  'rates',
  'fx',
] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

/** Per-source payloads; a source that failed or returned nothing is null */
export type SourceData = Partial<Record<SourceName, unknown>>;

export interface FetchOptions {
  timeoutMs: number;
}

export interface SourceAvailability {
  source: SourceName;
  tool: string;
  available: boolean;
}

export interface DataFetcher {
  /** Never rejects for a single failing source; that source is null instead */
  fetch(entityId: string, options: FetchOptions): Promise<SourceData>;
  /** Which sources the backing service can serve */
  checkSources(): Promise<SourceAvailability[]>;
}
