/**
 * FFmpeg operations for the title-card video — duration probing, title-card
 * rendering, narration muxing and the plain-color fallback composite.
 *
 * All render functions throw on non-zero FFmpeg exit. Arguments are passed
 * as an argv array, never through a shell.
 */
import { execFile } from 'child_process';
import * as fs from 'fs/promises';
import { promisify } from 'util';
import { RENDER } from '../config.js';
import { logger } from '../utils/logger.js';
import { removeIfExists } from '../utils/tempdir.js';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 16 * 1024 * 1024;
const STDERR_TAIL = 2_000;

// ── Helpers ────────────────────────────────────────────────────────────────────

function describeExecError(err: unknown): string {
  if (err instanceof Error) {
    const stderr = 'stderr' in err ? String(err.stderr).trim() : '';
    return stderr ? stderr.slice(-STDERR_TAIL) : err.message;
  }
  return String(err);
}

async function runFfmpeg(bin: string, args: string[], label: string): Promise<void> {
  logger.debug(`FFmpeg [${label}]`, { args });
  try {
    await execFileAsync(bin, ['-y', '-hide_banner', '-loglevel', 'error', ...args], { maxBuffer: MAX_BUFFER });
  } catch (err) {
    throw new Error(`FFmpeg ${label} failed: ${describeExecError(err)}`);
  }
}

async function runFfprobe(bin: string, args: string[], label: string): Promise<string> {
  logger.debug(`FFprobe [${label}]`, { args });
  try {
    const { stdout } = await execFileAsync(bin, args, { encoding: 'utf-8', maxBuffer: MAX_BUFFER });
    return stdout.trim();
  } catch (err) {
    throw new Error(`FFprobe ${label} failed: ${describeExecError(err)}`);
  }
}

/**
 * Escape a value (a file path) for a filter option inside `-vf`: once for the
 * option parser (`\ ' :`), then again for the filtergraph parser
 * (`\ ' [ ] , ;`).
 */
export function escapeFilterValue(s: string): string {
  return s
    .replace(/[\\':]/g, '\\$&')
    .replace(/[\\'[\],;]/g, '\\$&');
}

/** Title text lives beside the clip being rendered. */
export function titleTextPath(outputPath: string): string {
  return `${outputPath}.title.txt`;
}

function colorSource(durationSeconds: number): string {
  return `color=c=${RENDER.background}:s=${RENDER.width}x${RENDER.height}:d=${durationSeconds}`;
}

// ── Argument builders ──────────────────────────────────────────────────────────

export interface TitleCardOptions {
  title: string;
  durationSeconds: number;
  fontFile: string;
  outputPath: string;
}

export interface TitleCardArgsOptions {
  /** File holding the title verbatim; read by drawtext with expansion off. */
  textFile: string;
  durationSeconds: number;
  fontFile: string;
  outputPath: string;
}

export function buildTitleCardArgs(opts: TitleCardArgsOptions): string[] {
  const drawtext =
    `drawtext=fontfile=${escapeFilterValue(opts.fontFile)}:textfile=${escapeFilterValue(opts.textFile)}:` +
    `expansion=none:fontsize=${RENDER.fontSize}:fontcolor=${RENDER.fontColor}:x=(w-text_w)/2:y=(h-text_h)/2`;
  return [
    '-f', 'lavfi',
    '-i', colorSource(opts.durationSeconds),
    '-vf', drawtext,
    '-c:v', RENDER.videoCodec,
    '-t', String(opts.durationSeconds),
    '-pix_fmt', RENDER.pixelFormat,
    opts.outputPath,
  ];
}

export interface MuxOptions {
  videoPath: string;
  audioPath: string;
  outputPath: string;
}

export function buildMuxArgs(opts: MuxOptions): string[] {
  return [
    '-i', opts.videoPath,
    '-i', opts.audioPath,
    '-c:v', RENDER.videoCodec,
    '-c:a', RENDER.audioCodec,
    '-pix_fmt', RENDER.pixelFormat,
    '-shortest',
    opts.outputPath,
  ];
}

export interface PlainCompositeOptions {
  durationSeconds: number;
  audioPath: string;
  outputPath: string;
}

export function buildPlainCompositeArgs(opts: PlainCompositeOptions): string[] {
  return [
    '-f', 'lavfi',
    '-i', colorSource(opts.durationSeconds),
    '-i', opts.audioPath,
    '-c:v', RENDER.videoCodec,
    '-c:a', RENDER.audioCodec,
    '-pix_fmt', RENDER.pixelFormat,
    '-shortest',
    opts.outputPath,
  ];
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Container duration in seconds, from ffprobe's plain `format=duration` output.
 * Throws when ffprobe fails or prints something that is not a number.
 */
export async function readDurationSeconds(ffprobeBin: string, mediaPath: string): Promise<number> {
  const out = await runFfprobe(
    ffprobeBin,
    ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', mediaPath],
    'readDuration',
  );
  const seconds = Number.parseFloat(out);
  if (!out || !Number.isFinite(seconds)) {
    throw new Error(`FFprobe readDuration returned a non-numeric duration: "${out}"`);
  }
  return seconds;
}

/**
 * Solid-color background of exactly `durationSeconds` with the title centered.
 * The title is handed to drawtext through a text file, so quotes, commas and
 * percent signs reach the frame unchanged.
 */
export async function renderTitleCard(ffmpegBin: string, opts: TitleCardOptions): Promise<void> {
  logger.info('FFmpeg: rendering title card', { durationSeconds: opts.durationSeconds, outputPath: opts.outputPath });
  const textFile = titleTextPath(opts.outputPath);
  try {
    await fs.writeFile(textFile, opts.title, 'utf-8');
    await runFfmpeg(ffmpegBin, buildTitleCardArgs({
      textFile,
      durationSeconds: opts.durationSeconds,
      fontFile: opts.fontFile,
      outputPath: opts.outputPath,
    }), 'renderTitleCard');
  } finally {
    await removeIfExists(textFile);
  }
}

/** Combine a silent clip with narration; the shorter stream sets the length. */
export async function muxNarration(ffmpegBin: string, opts: MuxOptions): Promise<void> {
  logger.info('FFmpeg: muxing narration', { outputPath: opts.outputPath });
  await runFfmpeg(ffmpegBin, buildMuxArgs(opts), 'muxNarration');
}

/** Color source straight into the audio mux, without any text overlay. */
export async function renderPlainComposite(ffmpegBin: string, opts: PlainCompositeOptions): Promise<void> {
  logger.info('FFmpeg: rendering plain composite', { durationSeconds: opts.durationSeconds, outputPath: opts.outputPath });
  await runFfmpeg(ffmpegBin, buildPlainCompositeArgs(opts), 'renderPlainComposite');
}
