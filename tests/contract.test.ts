import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import { z } from 'zod';

import { callTool } from '../src/tools/shared-tools.js';
import { closeStoreTestDatabase, createStoreTestDatabase } from './fixtures/store-db.js';

const goldenTestSchema = z.object({
  id: z.string(),
  category: z.string(),
  description: z.string(),
  tool: z.string(),
  input: z.record(z.unknown()),
  assertions: z.object({
    has_fields: z.array(z.string()).optional(),
    result_fields: z.array(z.string()).optional(),
    min_results: z.number().optional(),
    max_results: z.number().optional(),
    is_null: z.boolean().optional(),
  }),
});

const goldenTestFileSchema = z.object({
  version: z.string(),
  mcp_name: z.string(),
  tests: z.array(goldenTestSchema),
});

// Load test definitions at module level so they're available for test registration
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const testFile = goldenTestFileSchema.parse(
  JSON.parse(fs.readFileSync(path.resolve(__dirname, '../fixtures/golden-tests.json'), 'utf8')),
);

describe('Golden Contract Tests', () => {
  let db: Database.Database;

  beforeAll(async () => {
    db = await createStoreTestDatabase();
  });

  afterAll(() => {
    closeStoreTestDatabase(db);
  });

  it('should have loaded at least 10 golden tests', () => {
    expect(testFile.tests.length).toBeGreaterThanOrEqual(10);
  });

  for (const test of testFile.tests) {
    it(`[${test.id}] ${test.description}`, async () => {
      const result = await callTool(db, test.tool, test.input);
      const { assertions } = test;

      if (assertions.is_null) {
        expect(result).toBeNull();
        return;
      }
      expect(result).toBeDefined();

      for (const field of assertions.has_fields ?? []) {
        expect(result).toHaveProperty(field);
      }

      if (
        assertions.result_fields ||
        assertions.min_results !== undefined ||
        assertions.max_results !== undefined
      ) {
        expect(Array.isArray(result)).toBe(true);
        const rows: unknown[] = Array.isArray(result) ? result : [];
        if (assertions.min_results !== undefined) {
          expect(rows.length).toBeGreaterThanOrEqual(assertions.min_results);
        }
        if (assertions.max_results !== undefined) {
          expect(rows.length).toBeLessThanOrEqual(assertions.max_results);
        }
        for (const row of rows) {
          for (const field of assertions.result_fields ?? []) {
            expect(row).toHaveProperty(field);
          }
        }
      }
    });
  }
});
