import { z } from 'zod';
import { FetchError, buildUserAgent, getJSON } from '@pubintel/core';
import type { QuerySpec, RawAuthor, RawRecord, WorksPage } from '@pubintel/core';

const BASE = 'https://api.crossref.org';

/** Crossref rejects `rows` above this. */
export const CROSSREF_MAX_ROWS = 1000;

/** Cursor value that starts a deep-paging session. */
export const FIRST_CURSOR = '*';

/**
 * Upstream page source. The response cache is the only caller; each call is
 * one live request.
 */
export interface WorksSource {
  searchPage(spec: QuerySpec): Promise<WorksPage>;
}

const dateSectionSchema = z.object({
  'date-parts': z.array(z.array(z.number().nullable())).optional()
}).passthrough();

const crossrefItemSchema = z.object({
  DOI: z.string().optional(),
  title: z.array(z.string()).optional(),
  publisher: z.string().optional(),
  type: z.string().optional(),
  abstract: z.string().optional(),
  'container-title': z.array(z.string()).optional(),
  author: z.array(z.object({
    given: z.string().optional(),
    family: z.string().optional(),
    name: z.string().optional(),
    affiliation: z.array(z.object({ name: z.string().optional() }).passthrough()).optional()
  }).passthrough()).optional(),
  issued: dateSectionSchema.optional(),
  'published-online': dateSectionSchema.optional(),
  'published-print': dateSectionSchema.optional(),
  created: dateSectionSchema.optional(),
  deposited: dateSectionSchema.optional(),
  accepted: dateSectionSchema.optional()
}).passthrough();

export type CrossrefItem = z.infer<typeof crossrefItemSchema>;

const worksResponseSchema = z.object({
  status: z.string(),
  message: z.object({
    items: z.array(z.unknown()).default([]),
    'next-cursor': z.string().optional(),
    'total-results': z.number().optional()
  }).passthrough()
}).passthrough();

type DateSection = z.infer<typeof dateSectionSchema>;
type DateKey = 'issued' | 'published-online' | 'published-print' | 'created' | 'deposited' | 'accepted';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Crossref date-parts `[[y, m?, d?]]` → `YYYY-MM-DD`; missing parts default to 1. */
export function dateFromParts(section?: DateSection): string | undefined {
  const parts = section?.['date-parts']?.[0];
  const [year, month = 1, day = 1] = parts ?? [];
  if (year === null || year === undefined || month === null || day === null) return undefined;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return `${String(year).padStart(4, '0')}-${pad(month)}-${pad(day)}`;
}

function firstDate(item: CrossrefItem, keys: DateKey[]): string | undefined {
  for (const key of keys) {
    const value = dateFromParts(item[key]);
    if (value) return value;
  }
  return undefined;
}

const TAG_PATTERN = /<[^>]+>/g;
const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' '
};

/** Abstracts arrive as JATS XML; keep the text only. */
export function stripMarkup(value: string): string {
  return value
    .replace(TAG_PATTERN, ' ')
    .replace(/&(?:amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, ' ')
    .trim();
}

function normalizeAuthor(author: NonNullable<CrossrefItem['author']>[number]): RawAuthor {
  const name = author.name ?? ([author.given, author.family].filter(Boolean).join(' ') || undefined);
  const affiliation = author.affiliation?.map((a) => a.name?.trim()).find((value) => Boolean(value));
  return { name, affiliation };
}

/** Items without a DOI cannot be deduplicated and are dropped. */
export function normalizeCrossrefItem(item: CrossrefItem): RawRecord | null {
  const doi = item.DOI?.trim().toLowerCase();
  if (!doi) return null;

  const abstract = item.abstract ? stripMarkup(item.abstract) : '';

  return {
    doi,
    title: (item.title ?? []).join(' ').trim(),
    publisher: item.publisher?.trim() || undefined,
    type: item.type,
    publishedDate: firstDate(item, ['issued', 'published-online', 'published-print', 'created']),
    createdDate: firstDate(item, ['created', 'deposited']),
    acceptedDate: firstDate(item, ['accepted']),
    abstract: abstract || undefined,
    authors: (item.author ?? []).map(normalizeAuthor),
    containerTitle: item['container-title']?.[0]?.trim() || undefined
  };
}

/**
 * Crossref `filter` parameter. Repeated filters of one name are OR-ed
 * upstream; publisher names are not sent and are applied locally instead.
 */
export function buildFilterString(spec: Pick<QuerySpec, 'fromDate' | 'untilDate' | 'docTypes' | 'prefixes'>): string {
  const filters: string[] = [`from-pub-date:${spec.fromDate}`, `until-pub-date:${spec.untilDate}`];
  for (const docType of spec.docTypes) {
    filters.push(`type:${docType}`);
  }
  for (const prefix of spec.prefixes) {
    filters.push(`prefix:${prefix}`);
  }
  return filters.join(',');
}

export function buildWorksUrl(spec: QuerySpec, contactEmail?: string): string {
  const params = new URLSearchParams({
    filter: buildFilterString(spec),
    rows: String(Math.min(spec.rows, CROSSREF_MAX_ROWS)),
    cursor: spec.cursor ?? FIRST_CURSOR
  });

  if (spec.queryText) {
    params.set('query', spec.queryText);
  }

  if (contactEmail) {
    params.set('mailto', contactEmail);
  }

  return `${BASE}/works?${params}`;
}

export function parseWorksPage(json: unknown, url: string): WorksPage {
  const parsed = worksResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new FetchError(`Malformed Crossref payload from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, {
      retryable: false
    });
  }

  const records: RawRecord[] = [];
  let dropped = 0;
  for (const raw of parsed.data.message.items) {
    const item = crossrefItemSchema.safeParse(raw);
    const record = item.success ? normalizeCrossrefItem(item.data) : null;
    if (record) {
      records.push(record);
    } else {
      dropped++;
    }
  }
  if (dropped > 0) {
    console.error(`[crossref] dropped ${dropped} unusable item(s) from ${url}`);
  }

  return {
    records,
    nextCursor: parsed.data.message['next-cursor'] ?? null
  };
}

export interface CrossrefOptions {
  contactEmail?: string;
  timeoutMs?: number;
}

export class CrossrefWorksSource implements WorksSource {
  constructor(private readonly options: CrossrefOptions = {}) {}

  async searchPage(spec: QuerySpec): Promise<WorksPage> {
    const url = buildWorksUrl(spec, this.options.contactEmail);
    const headers = { 'User-Agent': buildUserAgent(this.options.contactEmail) };
    const json = await getJSON(url, headers, this.options.timeoutMs);
    return parseWorksPage(json, url);
  }
}
