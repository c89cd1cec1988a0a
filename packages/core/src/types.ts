export interface TopicDefinition {
  key: string;
  name: string;
  keywords: string[];
  synonyms: string[];
  negativeKeywords: string[];
}

export interface PublisherDefinition {
  name: string;
  aliases: string[];
  /** DOI prefixes, e.g. `10.1117` */
  prefixes: string[];
}

export interface QuerySpec {
  queryText: string;
  /** Inclusive, `YYYY-MM-DD` */
  fromDate: string;
  /** Inclusive, `YYYY-MM-DD` */
  untilDate: string;
  docTypes: string[];
  /** Empty means unfiltered */
  publisherFilter: string[];
  prefixes: string[];
  maxRecords: number;
  rows: number;
  /** `null` requests the first page */
  cursor: string | null;
}

export interface RawAuthor {
  name?: string;
  affiliation?: string;
}

export interface RawRecord {
  doi: string;
  title: string;
  publisher?: string;
  type?: string;
  publishedDate?: string;
  createdDate?: string;
  acceptedDate?: string;
  abstract?: string;
  authors: RawAuthor[];
  containerTitle?: string;
}

export interface MatchedRecord extends RawRecord {
  topicKey: string | null;
  matched: boolean;
}

export interface WorksPage {
  records: RawRecord[];
  nextCursor: string | null;
}

export interface CacheEntry {
  records: RawRecord[];
  nextCursor: string | null;
  fetchedAt: string;
}

export interface CoverageMetrics {
  abstractRate: number;
  affiliationRate: number;
  acceptedDateRate: number;
}

export interface ResultMeta {
  generatedAt: string;
  cachedResponses: number;
  liveResponses: number;
  lastApiCallAt: string | null;
  warnings: string[];
}

export type AnalysisResult<T extends object> = {
  recordCount: number;
  coverage: CoverageMetrics;
  meta: ResultMeta;
} & T;
