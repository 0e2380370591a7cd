#!/usr/bin/env tsx
/**
 * Database + storage setup for Lesson Reel.
 * Applies every SQL file in /migrations/ in order through the `exec_sql` RPC,
 * then creates the video bucket if it is missing.
 * Run: npm run setup-db
 *
 * Without an `exec_sql` function on the project, paste the migrations into
 * the Supabase SQL editor (or run `supabase db push`) and re-run for the bucket.
 *
 * Exit codes:
 *   0 — migrations applied and bucket present
 *   1 — a migration or the bucket step failed
 */
import { readFileSync, readdirSync, existsSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createClient } from '@supabase/supabase-js';
import { loadConfig } from '../src/config.js';
import { errorMessage } from '../src/errors.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

// ── Config ────────────────────────────────────────────────────────────────────

const config = loadConfig();
const sb = createClient(config.supabase.url, config.supabase.serviceKey);

const migrationsDir = fileURLToPath(new URL('../migrations/', import.meta.url));

async function executeSql(sql: string): Promise<void> {
  const { error } = await sb.rpc('exec_sql', { sql });
  if (error) throw new Error(error.message);
}

// ── Migrations ────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Lesson Reel — Database Setup ===${RESET}\n`);

if (!existsSync(migrationsDir)) {
  console.error(`${RED}migrations/ directory not found at ${migrationsDir}${RESET}`);
  process.exit(1);
}

const migrationFiles = readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort();
console.log(`Found ${migrationFiles.length} migration file(s):\n`);

let failedCount = 0;

for (const file of migrationFiles) {
  process.stdout.write(`  ${CYAN}${file}${RESET}… `);
  try {
    // Every migration uses IF NOT EXISTS
    await executeSql(readFileSync(join(migrationsDir, file), 'utf-8'));
    console.log(`${GREEN}✓ applied${RESET}`);
  } catch (err) {
    const msg = errorMessage(err);
    console.error(`${RED}✗ FAILED${RESET}`);
    console.error(`    Error: ${msg}`);
    if (msg.includes('exec_sql')) {
      console.error(`\n${YELLOW}  Tip: exec_sql is not set up on this project.`);
      console.error(`  Paste ${join(migrationsDir, file)} into the Supabase SQL editor instead.${RESET}`);
    }
    failedCount++;
  }
}

// ── Storage bucket ────────────────────────────────────────────────────────────

console.log(`\n${BOLD}Storage bucket "${config.supabase.bucket}"${RESET}`);

const { error: lookupErr } = await sb.storage.getBucket(config.supabase.bucket);
if (!lookupErr) {
  console.log(`  ${YELLOW}○${RESET} already exists`);
} else {
  const { error: createErr } = await sb.storage.createBucket(config.supabase.bucket, {
    public: true,
    allowedMimeTypes: ['video/mp4'],
  });
  if (createErr) {
    console.error(`  ${RED}✗${RESET} could not create bucket: ${createErr.message}`);
    failedCount++;
  } else {
    console.log(`  ${GREEN}✓${RESET} created (public)`);
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

if (failedCount > 0) {
  console.error(`\n${RED}${BOLD}Setup had ${failedCount} failure(s). Fix errors above, then re-run.${RESET}\n`);
  process.exit(1);
}

console.log(`\n${GREEN}${BOLD}Database and storage ready.${RESET}`);
console.log(`${YELLOW}Next: npm run smoke-test${RESET}\n`);
