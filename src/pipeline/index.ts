/**
 * Main pipeline orchestrator.
 *
 * One request runs four stages strictly in sequence:
 *   scriptwriter → narration → assembler → publisher
 * Each request owns a private temp directory that is removed on every exit
 * path, success or failure.
 */
import * as path from 'path';
import { z } from 'zod';
import { synthesizeNarration } from '../ai/voice.js';
import {
  DEFAULT_LENGTH_SECONDS,
  MAX_LENGTH_SECONDS,
  type AppConfig,
} from '../config.js';
import { createSupabase } from '../db/client.js';
import { createSupabaseBucket, type VideoBucket } from '../db/storage.js';
import { createVideoTable, type VideoRecord, type VideoTable } from '../db/videos.js';
import { PipelineError, errorMessage, type PipelineStage } from '../errors.js';
import { createTelegramAlerts, type Alerts } from '../monitoring/telegram.js';
import { logger } from '../utils/logger.js';
import { withTempDir } from '../utils/tempdir.js';
import { assembleVideo } from './assembler.js';
import { publishVideo } from './publisher.js';
import { generateLesson, type QuizItem } from './scriptwriter.js';

// ── Request / result ──────────────────────────────────────────────────────────

export const GenerationRequestSchema = z.object({
  topic:          z.string().trim().min(1),
  role:           z.string().trim().min(1),
  length_seconds: z.number().int().positive().max(MAX_LENGTH_SECONDS).nullish()
    .transform(v => v ?? DEFAULT_LENGTH_SECONDS),
});

export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;

export interface GenerationResult {
  ok: true;
  title: string;
  video_url: string;
  quiz: QuizItem[];
  meta: VideoRecord | { insert_error: string };
}

// ── Dependencies ──────────────────────────────────────────────────────────────

export interface PipelineDeps {
  config: AppConfig;
  bucket: VideoBucket;
  videos: VideoTable;
  alerts: Alerts;
}

/** Process-wide clients, built once at startup and shared by every request. */
export function createPipelineDeps(config: AppConfig): PipelineDeps {
  const supabase = createSupabase(config.supabase);
  return Object.freeze({
    config,
    bucket: createSupabaseBucket(supabase, config.supabase.bucket),
    videos: createVideoTable(supabase, config.supabase.table),
    alerts: createTelegramAlerts(config.telegram),
  });
}

// ── Stage runner ──────────────────────────────────────────────────────────────

async function runStage<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
  const started = Date.now();
  logger.info(`Pipeline: ${stage} started`);
  try {
    const result = await fn();
    logger.info(`Pipeline: ${stage} complete`, { ms: Date.now() - started });
    return result;
  } catch (err) {
    logger.error(`Pipeline: ${stage} failed`, { ms: Date.now() - started, error: errorMessage(err) });
    if (err instanceof PipelineError) throw err;
    throw new PipelineError(stage, 'Unexpected', `${stage} failed: ${errorMessage(err)}`, err);
  }
}

// ── Main pipeline ─────────────────────────────────────────────────────────────

export async function runPipeline(request: GenerationRequest, deps: PipelineDeps): Promise<GenerationResult> {
  const { config } = deps;
  logger.info('Pipeline: starting run', { topic: request.topic, role: request.role });

  const lesson = await runStage('generation', () => generateLesson(request, config.inference));

  return withTempDir(config.tempDir, 'lesson-', async (workDir) => {
    const audioPath = path.join(workDir, 'audio.mp3');
    const videoPath = path.join(workDir, 'video.mp4');

    await runStage('synthesis', () => synthesizeNarration(lesson.script, audioPath, config.tts));

    const video = await runStage('render', () => assembleVideo({
      audioPath,
      title: lesson.title,
      outputPath: videoPath,
      guidelineSeconds: request.length_seconds,
    }, config.media));

    const published = await runStage('publish', () => publishVideo({
      title: lesson.title,
      role: request.role,
      filePath: video.videoPath,
      quiz: lesson.quiz,
    }, deps));

    logger.info('Pipeline: run complete', {
      title: lesson.title,
      videoUrl: published.videoUrl,
      overlay: video.overlay,
      status: published.status,
    });

    return {
      ok: true,
      title: lesson.title,
      video_url: published.videoUrl,
      quiz: lesson.quiz,
      meta: published.status === 'recorded' ? published.record : { insert_error: published.insertError },
    };
  });
}
