import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../database/index.js';
import type { PoolClient } from 'pg';
import {
  assertReplaceFilter,
  assertValidBatch,
  assertValidK,
  toVectorLiteral,
  toVectorMetadata,
} from './vector-batch.js';
import type {
  VectorDeleteFilter,
  VectorIndex,
  VectorMatch,
  VectorMetadata,
  VectorRecordBatch,
} from './vector-index.types.js';

export const VECTOR_TABLE = 'vector_chunks';

const SCHEMA_STATEMENTS = [
  'CREATE EXTENSION IF NOT EXISTS vector',
  `CREATE TABLE IF NOT EXISTS ${VECTOR_TABLE} (
    id TEXT PRIMARY KEY,
    text TEXT NOT NULL,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    embedding vector NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE INDEX IF NOT EXISTS ${VECTOR_TABLE}_metadata_idx ON ${VECTOR_TABLE} USING GIN (metadata)`,
];

interface MatchRow {
  id: string;
  text: string;
  metadata: unknown;
  distance: number | string;
}

@Injectable()
export class PostgresVectorIndex implements VectorIndex {
  private readonly logger = new Logger(PostgresVectorIndex.name);
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly database: DatabaseService) {}

  async add(batch: VectorRecordBatch): Promise<void> {
    assertValidBatch(batch);
    if (batch.ids.length === 0) {
      return;
    }
    await this.ensureSchema();

    await this.inTransaction(async (client) => {
      await this.upsertRows(client, batch);
    });
    this.logger.debug(`Upserted ${batch.ids.length} vector(s)`);
  }

  async replace(where: VectorMetadata, batch: VectorRecordBatch): Promise<void> {
    assertReplaceFilter(where);
    assertValidBatch(batch);
    await this.ensureSchema();

    await this.inTransaction(async (client) => {
      await client.query(
        `DELETE FROM ${VECTOR_TABLE} WHERE metadata @> $1::jsonb`,
        [JSON.stringify(where)],
      );
      await this.upsertRows(client, batch);
    });
    this.logger.debug(`Replaced vectors matching ${JSON.stringify(where)} with ${batch.ids.length}`);
  }

  async query(vectors: number[][], k: number): Promise<VectorMatch[][]> {
    assertValidK(k);
    await this.ensureSchema();

    const pool = this.database.getPool();
    const results: VectorMatch[][] = [];
    for (const vector of vectors) {
      const { rows } = await pool.query<MatchRow>(
        `SELECT id, text, metadata, embedding <=> $1::vector AS distance
        FROM ${VECTOR_TABLE}
        ORDER BY embedding <=> $1::vector ASC
        LIMIT $2`,
        [toVectorLiteral(vector), k],
      );
      results.push(rows.map(mapMatch));
    }
    return results;
  }

  async count(): Promise<number> {
    await this.ensureSchema();
    const { rows } = await this.database
      .getPool()
      .query<{ count: number }>(
        `SELECT COUNT(*)::int AS count FROM ${VECTOR_TABLE}`,
      );
    return rows[0]?.count ?? 0;
  }

  async delete(filter: VectorDeleteFilter): Promise<void> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.ids) {
      params.push(filter.ids);
      conditions.push(`id = ANY($${params.length}::text[])`);
    }
    if (filter.where) {
      params.push(JSON.stringify(filter.where));
      conditions.push(`metadata @> $${params.length}::jsonb`);
    }
    if (conditions.length === 0) {
      return;
    }

    await this.ensureSchema();
    const { rowCount } = await this.database
      .getPool()
      .query(
        `DELETE FROM ${VECTOR_TABLE} WHERE ${conditions.join(' AND ')}`,
        params,
      );
    this.logger.debug(`Deleted ${rowCount ?? 0} vector(s)`);
  }

  private async inTransaction(
    work: (client: PoolClient) => Promise<void>,
  ): Promise<void> {
    const client = await this.database.getClient();
    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private async upsertRows(
    client: PoolClient,
    batch: VectorRecordBatch,
  ): Promise<void> {
    for (let i = 0; i < batch.ids.length; i += 1) {
      await client.query(
        `INSERT INTO ${VECTOR_TABLE} (id, text, metadata, embedding, created_at, updated_at)
        VALUES ($1, $2, $3::jsonb, $4::vector, NOW(), NOW())
        ON CONFLICT (id) DO UPDATE
        SET
          text = EXCLUDED.text,
          metadata = EXCLUDED.metadata,
          embedding = EXCLUDED.embedding,
          updated_at = NOW()`,
        [
          batch.ids[i],
          batch.texts[i],
          JSON.stringify(batch.metadatas[i]),
          toVectorLiteral(batch.vectors[i]),
        ],
      );
    }
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    const pool = this.database.getPool();
    for (const statement of SCHEMA_STATEMENTS) {
      await pool.query(statement);
    }
    this.logger.log(`Vector table ${VECTOR_TABLE} is ready`);
  }
}

function mapMatch(row: MatchRow): VectorMatch {
  return {
    id: row.id,
    text: row.text,
    metadata: toVectorMetadata(row.metadata),
    distance:
      typeof row.distance === 'number'
        ? row.distance
        : Number.parseFloat(row.distance),
  };
}
