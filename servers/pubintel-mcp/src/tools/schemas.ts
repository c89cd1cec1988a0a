import { z } from 'zod';

const dateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const analyzeSchema = z.object({
  topicKey: z.string().min(1).optional()
    .describe('Configured topic key (e.g. silicon_photonics); mutually exclusive with adHocQuery'),
  adHocQuery: z.string().min(1).optional()
    .describe('Free-text query sent upstream verbatim; mutually exclusive with topicKey'),
  fromPubDate: dateString.default('2018-01-01')
    .describe('Earliest publication date, inclusive (YYYY-MM-DD)'),
  untilPubDate: dateString.optional()
    .describe('Latest publication date, inclusive (YYYY-MM-DD); defaults to today'),
  docTypes: z.array(z.string().min(1)).default(['journal-article', 'proceedings-article'])
    .describe('Crossref work types to include'),
  publishers: z.array(z.string().min(1)).default([])
    .describe('Publisher names or aliases to restrict to (empty: all)'),
  containerTitles: z.array(z.string().min(1)).default([])
    .describe('Journal or proceedings title fragments to restrict to'),
  doiPrefixes: z.array(z.string().min(1)).default([])
    .describe('DOI prefixes to restrict to (e.g. 10.1117)'),
  maxRecords: z.number().int().min(1).max(20000).optional()
    .describe('Record cap for this analysis (default from configuration)'),
  rowsPerRequest: z.number().int().min(1).max(1000).optional()
    .describe('Upstream page size (default from configuration)'),
  refreshCache: z.boolean().default(false)
    .describe('Bypass cached pages and refetch them')
});

export type AnalyzeParams = z.infer<typeof analyzeSchema>;

export const comparePublishersSchema = analyzeSchema.extend({
  publishers: z.array(z.string().min(1)).min(1)
    .describe('Publishers to compare; shares are relative to all matched records')
});

export type ComparePublishersParams = z.infer<typeof comparePublishersSchema>;

export const topicSweepSchema = z.object({
  fromPubDate: dateString.default('2018-01-01')
    .describe('Earliest publication date, inclusive (YYYY-MM-DD)'),
  untilPubDate: dateString.optional()
    .describe('Latest publication date, inclusive (YYYY-MM-DD); defaults to today'),
  docTypes: z.array(z.string().min(1)).default(['journal-article', 'proceedings-article'])
    .describe('Crossref work types to include'),
  topicKeys: z.array(z.string().min(1)).optional()
    .describe('Topics to include (default: all configured topics)'),
  lookbackYears: z.number().int().min(1).max(30).optional()
    .describe('Window for recent growth (default from configuration)'),
  maxRecordsPerTopic: z.number().int().min(1).max(20000).optional()
    .describe('Record cap per topic (default from configuration)'),
  refreshCache: z.boolean().default(false)
    .describe('Bypass cached pages and refetch them')
});

export type TopicSweepParams = z.infer<typeof topicSweepSchema>;

export const gapAnalysisSchema = topicSweepSchema.extend({
  targetPublisher: z.string().min(1)
    .describe('Publisher whose under-representation is scored')
});

export type GapAnalysisParams = z.infer<typeof gapAnalysisSchema>;
