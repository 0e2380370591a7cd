/**
 * Publisher — uploads the rendered video to the storage bucket, resolves a
 * playable URL and records the lesson in the videos table.
 *
 * Upload failure is fatal and nothing is inserted. Insert failure is not:
 * the already-resolved URL is returned together with the insert error.
 */
import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import { SIGNED_URL_TTL_SECONDS } from '../config.js';
import type { VideoBucket } from '../db/storage.js';
import type { NewVideoRecord, VideoRecord, VideoTable } from '../db/videos.js';
import { PublishError, errorMessage } from '../errors.js';
import type { Alerts } from '../monitoring/telegram.js';
import { logger } from '../utils/logger.js';
import type { QuizItem } from './scriptwriter.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PublishTargets {
  bucket: VideoBucket;
  videos: VideoTable;
  alerts: Alerts;
}

export interface PublishInput {
  title: string;
  role: string;
  filePath: string;
  quiz: QuizItem[];
}

export type PublishOutcome =
  | { status: 'recorded'; videoUrl: string; record: VideoRecord }
  | { status: 'insert_failed'; videoUrl: string; insertError: string };

const CONTENT_TYPE = 'video/mp4';

// ── Helpers ───────────────────────────────────────────────────────────────────

/** `<role>_<32 hex chars>.mp4` */
export function buildObjectKey(role: string): string {
  return `${role.toLowerCase()}_${randomBytes(16).toString('hex')}.mp4`;
}

/** First quiz item only; options stored as a JSON string. */
export function buildVideoRow(title: string, role: string, videoUrl: string, quiz: QuizItem[]): NewVideoRecord {
  const primary = quiz[0];
  return {
    title,
    video_url:     videoUrl,
    role,
    quiz_question: primary?.question ?? null,
    quiz_options:  primary ? JSON.stringify(primary.options) : null,
    quiz_answer:   primary?.answer ?? null,
  };
}

/**
 * Public URL first; a 24h signed URL when the public one is empty or its
 * resolution throws.
 */
export async function resolveVideoUrl(bucket: VideoBucket, key: string): Promise<string> {
  try {
    const publicUrl = bucket.publicUrl(key);
    if (publicUrl) return publicUrl;
    logger.info('Publisher: no public URL — creating signed URL', { key });
  } catch (err) {
    logger.warn('Publisher: public URL resolution failed — creating signed URL', { key, error: errorMessage(err) });
  }

  let signedUrl: string | null;
  try {
    signedUrl = await bucket.signedUrl(key, SIGNED_URL_TTL_SECONDS);
  } catch (err) {
    throw new PublishError('UrlUnavailable', `Could not resolve a URL for ${key}: ${errorMessage(err)}`, err);
  }
  if (!signedUrl) throw new PublishError('UrlUnavailable', `Could not resolve a URL for ${key}`);
  return signedUrl;
}

// ── Core publish ──────────────────────────────────────────────────────────────

export async function publishVideo(input: PublishInput, targets: PublishTargets): Promise<PublishOutcome> {
  const key = buildObjectKey(input.role);
  logger.info('Publisher: uploading video', { key });

  let uploadError: string | null;
  try {
    const body = await fs.readFile(input.filePath);
    ({ error: uploadError } = await targets.bucket.upload(key, body, CONTENT_TYPE));
  } catch (err) {
    uploadError = errorMessage(err);
  }
  if (uploadError) {
    throw new PublishError('UploadFailed', `Supabase upload error: ${uploadError}`);
  }

  const videoUrl = await resolveVideoUrl(targets.bucket, key);
  const result = await targets.videos.insert(buildVideoRow(input.title, input.role, videoUrl, input.quiz));

  if ('error' in result) {
    logger.warn('Publisher: metadata insert failed (non-fatal)', { key, error: result.error });
    await targets.alerts.alert(`Video uploaded but metadata insert failed for ${key}: ${result.error}`, 'warning');
    return { status: 'insert_failed', videoUrl, insertError: result.error };
  }

  logger.info('Publisher: video published', { key, id: result.record.id });
  return { status: 'recorded', videoUrl, record: result.record };
}
