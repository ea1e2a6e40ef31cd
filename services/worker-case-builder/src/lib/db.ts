/**
 * Database Operations
 *
 * Stores processed documents and keeps one case snapshot per user. A
 * document write and the snapshot rebuild share one transaction, serialized
 * per user with an advisory lock.
 */

import { Pool, PoolClient } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  type CaseData,
  type CaseDocument,
  type CaseDocumentSource,
  type Classification,
  type ExtractedEntity,
  type FormFieldsExtraction,
} from '@tenantcase/shared';

export interface StoredDocument {
  user_id: string;
  uploaded_at: string;
  correlation_id: string;
  document: CaseDocument;
}

/** Builds the snapshot from the user's documents in upload order; may throw to abort the write. */
export type SnapshotBuilder = (documents: CaseDocument[]) => CaseData;

export interface CaseRepository extends CaseDocumentSource {
  saveDocumentAndSnapshot(stored: StoredDocument, buildSnapshot: SnapshotBuilder): Promise<CaseData>;
  getSnapshot(userId: string): Promise<CaseData | null>;
}

interface CaseDocumentRow {
  document_id: string;
  filename: string;
  classification: Classification;
  entities: ExtractedEntity[];
  fields: FormFieldsExtraction;
}

interface CaseSnapshotRow {
  case_data: CaseData;
}

const SELECT_DOCUMENTS = `
  SELECT document_id, filename, classification, entities, fields
  FROM case_documents
  WHERE user_id = $1
  ORDER BY uploaded_at, document_id`;

function toCaseDocument(row: CaseDocumentRow): CaseDocument {
  return {
    document_id: row.document_id,
    filename: row.filename,
    classification: row.classification,
    entities: row.entities,
    fields: row.fields,
  };
}

export function createPool(): Pool {
  return new Pool({
    connectionString: config.databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}

export class PgCaseRepository implements CaseRepository {
  constructor(private readonly pool: Pool) {}

  async listDocuments(userId: string): Promise<CaseDocument[]> {
    const startTime = Date.now();
    const result = await this.pool.query<CaseDocumentRow>(SELECT_DOCUMENTS, [userId]);
    dbQueryDurationHistogram.observe({ operation: 'list_documents' }, (Date.now() - startTime) / 1000);
    return result.rows.map(toCaseDocument);
  }

  async getSnapshot(userId: string): Promise<CaseData | null> {
    const result = await this.pool.query<CaseSnapshotRow>(
      'SELECT case_data FROM case_snapshots WHERE user_id = $1',
      [userId]
    );
    return result.rows[0]?.case_data ?? null;
  }

  async saveDocumentAndSnapshot(stored: StoredDocument, buildSnapshot: SnapshotBuilder): Promise<CaseData> {
    const client = await this.pool.connect();
    const startTime = Date.now();

    try {
      await client.query('BEGIN');

      // Serialize jobs for the same user so each rebuild sees every committed document
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [stored.user_id]);

      await upsertDocument(client, stored);

      const documents = await client.query<CaseDocumentRow>(SELECT_DOCUMENTS, [stored.user_id]);
      const snapshot = buildSnapshot(documents.rows.map(toCaseDocument));

      await upsertSnapshot(client, stored, snapshot);

      await client.query('COMMIT');

      const duration = (Date.now() - startTime) / 1000;
      dbQueryDurationHistogram.observe({ operation: 'save_document_and_snapshot' }, duration);

      logger.info('Persisted document and case snapshot', {
        document_id: stored.document.document_id,
        user_id: stored.user_id,
        document_count: snapshot.document_count,
        duration_seconds: duration,
      });

      return snapshot;
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error('Failed to persist document', error, {
        document_id: stored.document.document_id,
        user_id: stored.user_id,
      });
      throw error;
    } finally {
      client.release();
    }
  }
}

async function upsertDocument(client: PoolClient, stored: StoredDocument): Promise<void> {
  const { document } = stored;
  await client.query(
    `INSERT INTO case_documents (
       document_id, user_id, filename, document_type, category, confidence, urgency,
       classification, entities, fields, correlation_id, uploaded_at
     ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
     ON CONFLICT (document_id) DO UPDATE SET
       filename = EXCLUDED.filename,
       document_type = EXCLUDED.document_type,
       category = EXCLUDED.category,
       confidence = EXCLUDED.confidence,
       urgency = EXCLUDED.urgency,
       classification = EXCLUDED.classification,
       entities = EXCLUDED.entities,
       fields = EXCLUDED.fields,
       correlation_id = EXCLUDED.correlation_id,
       updated_at = NOW()`,
    [
      document.document_id,
      stored.user_id,
      document.filename,
      document.classification.type,
      document.classification.category,
      document.classification.confidence,
      document.classification.urgency,
      JSON.stringify(document.classification),
      JSON.stringify(document.entities),
      JSON.stringify(document.fields),
      stored.correlation_id,
      stored.uploaded_at,
    ]
  );
}

async function upsertSnapshot(client: PoolClient, stored: StoredDocument, snapshot: CaseData): Promise<void> {
  await client.query(
    `INSERT INTO case_snapshots (user_id, case_data, document_count, urgency_level, correlation_id)
     VALUES ($1, $2, $3, $4, $5)
     ON CONFLICT (user_id) DO UPDATE SET
       case_data = EXCLUDED.case_data,
       document_count = EXCLUDED.document_count,
       urgency_level = EXCLUDED.urgency_level,
       correlation_id = EXCLUDED.correlation_id,
       updated_at = NOW()`,
    [stored.user_id, JSON.stringify(snapshot), snapshot.document_count, snapshot.urgency_level, stored.correlation_id]
  );
}
