#!/usr/bin/env tsx
/**
 * Empties the vector_chunks table.
 * Usage: npm run documents:clear
 */

import { Pool } from 'pg';
import { config } from 'dotenv';
import { resolve } from 'node:path';

config({ path: resolve(process.cwd(), '.env.local') });
config({ path: resolve(process.cwd(), '.env') });

const DATABASE_URL = process.env.DATABASE_URL;

if (!DATABASE_URL) {
  console.error('❌ DATABASE_URL is not configured');
  process.exit(1);
}

const pool = new Pool({
  connectionString: DATABASE_URL,
});

async function countChunks(): Promise<number> {
  const { rows } = await pool.query<{ count: number }>(
    'SELECT COUNT(*)::int AS count FROM vector_chunks'
  );
  return rows[0]?.count ?? 0;
}

async function clearIndex() {
  try {
    const before = await countChunks();
    console.log(`📊 vector_chunks currently holds ${before} chunk(s)`);

    if (before === 0) {
      console.log('✅ Index is already empty');
      return;
    }

    await pool.query('TRUNCATE vector_chunks');
    console.log(`✅ Removed ${before} chunk(s); now ${await countChunks()}`);
  } finally {
    await pool.end();
  }
}

clearIndex().catch(error => {
  console.error('❌ Clearing the index failed:', error);
  process.exit(1);
});
