import type { Database } from 'better-sqlite3';

import { toStoredDocument, type StoredDocument } from '../db/store.js';
import type { DocumentRow } from '../db/types.js';
import { requireCollection } from './tool-utils.js';

export interface GetDocumentInput {
  collection: string;
  key: string;
}

export async function getDocument(db: Database, input: GetDocumentInput): Promise<StoredDocument | null> {
  const collection = requireCollection(input.collection);
  const key = input.key?.trim();

  if (!key) {
    throw new Error('key is required');
  }

  const row = db
    .prepare('SELECT * FROM documents WHERE collection = ? AND doc_key = ?')
    .get(collection, key) as DocumentRow | undefined;

  return row ? toStoredDocument(row) : null;
}
