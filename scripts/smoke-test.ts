#!/usr/bin/env tsx
/**
 * Integration smoke test for Lesson Reel.
 * Exercises each external dependency once with tiny inputs: inference, TTS,
 * ffmpeg/ffprobe, storage and the videos table. Uploads nothing permanent.
 * Run: npm run smoke-test
 *
 * Exit codes:
 *   0 — all tests pass
 *   1 — one or more tests failed
 */
import * as fs from 'fs/promises';
import { join } from 'path';
import { generateText } from '../src/ai/huggingface.js';
import { synthesizeNarration } from '../src/ai/voice.js';
import { loadConfig } from '../src/config.js';
import { createSupabase } from '../src/db/client.js';
import { errorMessage } from '../src/errors.js';
import { readDurationSeconds, renderPlainComposite, renderTitleCard } from '../src/media/ffmpeg.js';
import { withTempDir } from '../src/utils/tempdir.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

// ── Test runner ───────────────────────────────────────────────────────────────

let allPass = true;
let testNumber = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  testNumber++;
  const label = `Test ${testNumber.toString().padStart(2, ' ')}: ${name}`;
  process.stdout.write(`  ${label}… `);
  try {
    await fn();
    console.log(`${GREEN}PASS${RESET}`);
  } catch (err) {
    console.log(`${RED}FAIL${RESET}`);
    console.error(`           ${YELLOW}${errorMessage(err)}${RESET}`);
    allPass = false;
  }
}

// ── Run tests ─────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Lesson Reel — Smoke Tests ===${RESET}\n`);

const config = loadConfig();
const sb = createSupabase(config.supabase);

await test('Inference endpoint answers', async () => {
  const text = await generateText('Reply with the single word OK.', config.inference);
  if (!text.trim()) throw new Error('Empty completion');
});

await withTempDir(config.tempDir, 'smoke-', async (dir) => {
  const audioPath = join(dir, 'audio.mp3');
  const colorPath = join(dir, 'title.mp4');

  await test(`Narration (${config.tts.engine})`, async () => {
    await synthesizeNarration('Smoke test. Hello class.', audioPath, config.tts);
    const { size } = await fs.stat(audioPath);
    if (size === 0) throw new Error('Narration file is empty');
  });

  await test('ffprobe reads narration duration', async () => {
    const seconds = await readDurationSeconds(config.media.ffprobeBin, audioPath);
    if (seconds <= 0) throw new Error(`Unexpected duration ${seconds}`);
  });

  await test('ffmpeg renders a title card', async () => {
    await renderTitleCard(config.media.ffmpegBin, {
      title: "Smoke: it's working",
      durationSeconds: 1,
      fontFile: config.media.fontFile,
      outputPath: colorPath,
    });
  });

  await test('ffmpeg renders the plain composite', async () => {
    await renderPlainComposite(config.media.ffmpegBin, {
      durationSeconds: 1,
      audioPath,
      outputPath: join(dir, 'plain.mp4'),
    });
  });
});

await test(`Storage bucket "${config.supabase.bucket}" reachable`, async () => {
  const { error } = await sb.storage.from(config.supabase.bucket).list('', { limit: 1 });
  if (error) throw new Error(`Storage error: ${error.message}`);
});

await test(`Table "${config.supabase.table}" reachable`, async () => {
  const { error } = await sb.from(config.supabase.table).select('id').limit(1);
  if (error) throw new Error(`Supabase query error: ${error.message}`);
});

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (!allPass) {
  console.error(`${RED}${BOLD}Smoke tests FAILED — fix the failures above before serving traffic.${RESET}\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}All ${testNumber} smoke tests passed.${RESET}`);
console.log(`${YELLOW}Start the server: npm run dev${RESET}\n`);
