/**
 * Tool definitions and call dispatcher for the MCP server.
 */
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Database } from 'better-sqlite3';
import { z } from 'zod';

import { COLLECTION_NAMES } from '../config.js';
import { about } from './about.js';
import { checkDataFreshness } from './check-data-freshness.js';
import { getDocument } from './get-document.js';
import { listCollections } from './list-collections.js';
import { searchDocumentsTool } from './search-documents.js';

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const searchDocumentsInput = z.object({
  query: z.string().optional(),
  collection: z.string().optional(),
  date_from: isoDay.optional(),
  date_to: isoDay.optional(),
  limit: z.number().optional(),
});

const getDocumentInput = z.object({
  collection: z.string(),
  key: z.string(),
});

const checkDataFreshnessInput = z.object({
  as_of: isoDay.optional(),
  status: z.enum(['fresh', 'warning', 'stale', 'never_loaded']).optional(),
});

const noInput = z.object({}).strict();

export const TOOLS: Tool[] = [
  {
    name: 'search_documents',
    description:
      'Full-text search across indexed Hansard contributions, written questions, authorised firms, individuals and investment products.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search text or keywords.' },
        collection: {
          type: 'string',
          enum: [...COLLECTION_NAMES],
          description: 'Restrict to one collection. Without a query, lists its most recent documents.',
        },
        date_from: { type: 'string', description: 'Earliest document date, YYYY-MM-DD.' },
        date_to: { type: 'string', description: 'Latest document date, YYYY-MM-DD.' },
        limit: { type: 'number', description: 'Maximum rows to return. Default 10, max 50.' },
      },
      required: [],
    },
  },
  {
    name: 'get_document',
    description: 'Get one indexed document with its full text and source payload.',
    inputSchema: {
      type: 'object',
      properties: {
        collection: { type: 'string', enum: [...COLLECTION_NAMES] },
        key: { type: 'string', description: 'Document key, e.g. "pq_12345" or "firm_123456".' },
      },
      required: ['collection', 'key'],
    },
  },
  {
    name: 'list_collections',
    description: 'List sources, their collections, document counts and latest ingestion run.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
  },
  {
    name: 'check_data_freshness',
    description: 'Compute freshness per source from the ingestion run log and flag stale collections.',
    inputSchema: {
      type: 'object',
      properties: {
        as_of: { type: 'string', description: 'ISO date override for deterministic checks.' },
        status: {
          type: 'string',
          enum: ['fresh', 'warning', 'stale', 'never_loaded'],
        },
      },
      required: [],
    },
  },
  {
    name: 'about',
    description: 'Return server scope and live database totals.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
  },
];

function parseInput<T>(schema: z.ZodType<T>, name: string, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
    throw new Error(`Invalid arguments for ${name}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Dispatch a tool call to the correct handler function.
 * Throws for unknown tools and invalid arguments.
 */
export async function callTool(db: Database, name: string, args: unknown): Promise<unknown> {
  switch (name) {
    case 'search_documents':
      return searchDocumentsTool(db, parseInput(searchDocumentsInput, name, args));
    case 'get_document':
      return getDocument(db, parseInput(getDocumentInput, name, args));
    case 'list_collections':
      parseInput(noInput, name, args);
      return listCollections(db);
    case 'check_data_freshness':
      return checkDataFreshness(db, parseInput(checkDataFreshnessInput, name, args));
    case 'about':
      parseInput(noInput, name, args);
      return about(db);
    default:
      throw new Error(`Unknown tool "${name}".`);
  }
}
