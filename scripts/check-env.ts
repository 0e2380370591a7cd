#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for Lesson Reel.
 * Validates configuration, media tooling, the title font, Supabase and Telegram.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { existsSync } from 'fs';
import { createClient } from '@supabase/supabase-js';
import { loadConfig, type AppConfig } from '../src/config.js';
import { errorMessage } from '../src/errors.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, why: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${why})`);

let anyRequiredFailed = false;

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Lesson Reel — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Environment variables${RESET}`);

let config: AppConfig | null = null;
try {
  config = loadConfig();
  pass('Configuration valid');
  pass('Inference model', config.inference.model);
  pass('Storage bucket / table', `${config.supabase.bucket} / ${config.supabase.table}`);
  pass('Narration engine', config.tts.engine);
} catch (err) {
  fail(errorMessage(err), 'Copy .env.example to .env and fill in the blanks');
  anyRequiredFailed = true;
}

// ── Section: Media tooling ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Media tooling${RESET}`);

function checkBinary(label: string, bin: string): void {
  try {
    const out = execFileSync(bin, ['-version'], { encoding: 'utf-8' });
    pass(label, out.split('\n')[0] ?? bin);
  } catch (err) {
    fail(`${label} not runnable (${bin})`, `Install ffmpeg or set ${label.toUpperCase()}_BIN: ${errorMessage(err)}`);
    anyRequiredFailed = true;
  }
}

if (config) {
  checkBinary('ffmpeg', config.media.ffmpegBin);
  checkBinary('ffprobe', config.media.ffprobeBin);
  if (existsSync(config.media.fontFile)) {
    pass('Title font', config.media.fontFile);
  } else {
    // Missing font only costs the title overlay; the plain fallback still renders
    skip('Title font', `not found at ${config.media.fontFile} — videos will render without a title`);
  }
} else {
  skip('Media tooling', 'skipped — configuration invalid above');
}

// ── Section: Supabase ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Supabase${RESET}`);

if (config) {
  const sb = createClient(config.supabase.url, config.supabase.serviceKey);

  process.stdout.write(`  Checking bucket "${config.supabase.bucket}"… `);
  const { data: bucket, error: bucketErr } = await sb.storage.getBucket(config.supabase.bucket);
  if (bucketErr) {
    console.log(`${RED}✗${RESET}`);
    fail(`Bucket lookup failed: ${bucketErr.message}`, 'Run: npm run setup-db');
    anyRequiredFailed = true;
  } else {
    console.log(`${GREEN}✓${RESET}  ${bucket?.public ? 'public' : 'private (signed URLs)'}`);
  }

  process.stdout.write(`  Checking table "${config.supabase.table}"… `);
  const { error: tableErr } = await sb.from(config.supabase.table).select('id').limit(1);
  if (tableErr) {
    console.log(`${RED}✗${RESET}`);
    fail(`Table query failed: ${tableErr.message}`, 'Run: npm run setup-db');
    anyRequiredFailed = true;
  } else {
    console.log(`${GREEN}✓${RESET}  reachable`);
  }
} else {
  skip('Supabase', 'skipped — configuration invalid above');
}

// ── Section: Telegram bot ─────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Telegram alerts${RESET}`);

const tgToken  = config?.telegram.botToken;
const tgChatId = config?.telegram.chatId;

if (tgToken && tgChatId) {
  process.stdout.write(`  Sending Telegram test message… `);
  try {
    const res = await fetch(`https://api.telegram.org/bot${tgToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: tgChatId, text: '[LessonReel] check-env: pre-flight test — OK' }),
    });
    if (!res.ok) throw new Error(`Telegram API returned ${res.status}: ${await res.text()}`);
    console.log(`${GREEN}✓${RESET}  message sent — check your chat`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Telegram test message failed', errorMessage(err));
    anyRequiredFailed = true;
  }
} else {
  skip('Telegram', 'not configured — alerts are logged only');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run smoke-test${RESET}\n`);
}
