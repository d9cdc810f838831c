#!/usr/bin/env tsx
/**
 * Uploads every supported document in a folder to the running API.
 * Usage: npm run documents:ingest -- <folder>
 */

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { config as loadEnv } from 'dotenv';

['.env.local', '.env']
  .map(file => path.resolve(process.cwd(), file))
  .forEach(envPath => {
    loadEnv({ path: envPath, override: false });
  });

const API_BASE_URL = process.env.API_BASE_URL || 'http://localhost:3000/api/v1';
const SUPPORTED = new Set(['.pdf', '.txt', '.md', '.docx']);

async function uploadFile(filePath: string): Promise<boolean> {
  const name = path.basename(filePath);
  const form = new FormData();
  form.append('file', new Blob([await readFile(filePath)]), name);

  const response = await fetch(`${API_BASE_URL}/documents`, {
    method: 'POST',
    body: form,
  });
  const body = await response.text();

  if (!response.ok) {
    console.error(`❌ ${name}: ${response.status} ${body}`);
    return false;
  }
  console.log(`✅ ${name}: ${body}`);
  return true;
}

async function main() {
  const folder = path.resolve(process.cwd(), process.argv[2] ?? 'documents');
  const entries = await readdir(folder, { withFileTypes: true });
  const files = entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .filter(name => SUPPORTED.has(path.extname(name).toLowerCase()))
    .sort();

  if (files.length === 0) {
    console.log(`No supported documents found in ${folder}`);
    return;
  }

  console.log(`📄 Uploading ${files.length} document(s) from ${folder}`);
  let failed = 0;
  for (const name of files) {
    try {
      if (!(await uploadFile(path.join(folder, name)))) {
        failed += 1;
      }
    } catch (error) {
      failed += 1;
      console.error(`❌ ${name}:`, error);
    }
  }

  console.log(`\nDone: ${files.length - failed} succeeded, ${failed} failed`);
  if (failed > 0) {
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
