import type { CollectionName } from '../config.js';

export type UpdateFrequency = 'daily' | 'weekly' | 'monthly';
export type RunStatus = 'completed' | 'failed';

export interface SourceRecord {
  id: string;
  name: string;
  authority: string;
  official_portal: string;
  collection: CollectionName;
  update_frequency: UpdateFrequency;
  requires_date_range: boolean;
  coverage_note: string;
}

/** One document as submitted for indexing. */
export interface IndexDocument {
  key: string;
  title: string;
  body: string;
  date: string | null;
  url: string | null;
  payload: Record<string, unknown>;
}

export interface DocumentRow {
  collection: string;
  doc_key: string;
  title: string;
  body: string;
  document_date: string | null;
  url: string | null;
  payload: string;
  content_hash: string;
  indexed_at: string;
}

export interface IngestionRunRecord {
  source: string;
  from_date: string | null;
  to_date: string | null;
  started_at: string;
  finished_at: string;
  status: RunStatus;
  attempted: number;
  indexed: number;
  unchanged: number;
  failed: number;
  pages_total: number;
  pages_failed: number;
  error: string | null;
}

export interface IngestionRunRow extends IngestionRunRecord {
  id: number;
}
