#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { startServer } from '@pubintel/core';

import { loadServiceFromEnv } from './context.js';
import { analyzeTopic } from './tools/analyze_topic.js';
import { comparePublishers } from './tools/compare_publishers.js';
import { institutions } from './tools/institutions.js';
import { timeToPublication } from './tools/time_to_publication.js';
import { emergingTopics } from './tools/emerging_topics.js';
import { gapAnalysis } from './tools/gap_analysis.js';
import { getConfig } from './tools/get_config.js';
import {
  analyzeSchema,
  comparePublishersSchema,
  gapAnalysisSchema,
  topicSweepSchema
} from './tools/schemas.js';

const { service, config } = loadServiceFromEnv();

const server = new McpServer({
  name: 'pubintel-mcp',
  version: config.settings.version
});

server.tool(
  'pubintel_analyze_topic',
  'Publication trend, CAGR, top publishers and journals for a topic or ad-hoc query',
  analyzeSchema.shape,
  async (params) => analyzeTopic(service, analyzeSchema.parse(params))
);

server.tool(
  'pubintel_compare_publishers',
  'Per-year counts, market share and growth for selected publishers',
  comparePublishersSchema.shape,
  async (params) => comparePublishers(service, comparePublishersSchema.parse(params))
);

server.tool(
  'pubintel_institutions',
  'Top institutions by first-listed affiliation, with country roll-ups',
  analyzeSchema.shape,
  async (params) => institutions(service, analyzeSchema.parse(params))
);

server.tool(
  'pubintel_time_to_publication',
  'Created-to-published and accepted-to-published lag statistics',
  analyzeSchema.shape,
  async (params) => timeToPublication(service, analyzeSchema.parse(params))
);

server.tool(
  'pubintel_emerging_topics',
  'Ranks configured topics by recent growth',
  topicSweepSchema.shape,
  async (params) => emergingTopics(service, topicSweepSchema.parse(params))
);

server.tool(
  'pubintel_gap_analysis',
  'Scores topics by growth and a target publisher\'s under-representation',
  gapAnalysisSchema.shape,
  async (params) => gapAnalysis(service, gapAnalysisSchema.parse(params))
);

server.tool(
  'pubintel_config',
  'Configured topics, publishers and defaults',
  async () => getConfig(service)
);

server.server.onerror = (error) => console.error('[pubintel-mcp]', error);
process.on('SIGINT', () => {
  server.close()
    .catch((error: unknown) => console.error('[pubintel-mcp] close failed', error))
    .finally(() => process.exit(0));
});

console.error(`Contact email: ${process.env.CONTACT_EMAIL || config.settings.contactEmail || 'not set (set CONTACT_EMAIL for polite access)'}`);
startServer(server, { serverName: 'pubintel-mcp', version: config.settings.version }).catch((error) => {
  console.error('[pubintel-mcp] fatal', error);
  process.exit(1);
});
