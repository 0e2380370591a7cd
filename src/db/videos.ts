/**
 * Video DB operations — one metadata row per published lesson video.
 *
 * Legacy single-question schema: only the first quiz item is stored, with its
 * options JSON-encoded into a text column.
 */
import type { SupabaseClient } from '@supabase/supabase-js';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { isConnError } from './client.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface VideoRecord {
  id: number | string;
  title: string;
  video_url: string;
  role: string;
  quiz_question: string | null;
  quiz_options: string | null;
  quiz_answer: string | null;
  created_at?: string;
}

export type NewVideoRecord = Omit<VideoRecord, 'id' | 'created_at'>;

export type InsertResult = { record: VideoRecord } | { error: string };

export interface VideoTable {
  /** Never throws; failures come back as `{ error }`. */
  insert(row: NewVideoRecord): Promise<InsertResult>;
}

// ─── Supabase table ───────────────────────────────────────────────────────────

export function createVideoTable(client: SupabaseClient, table: string): VideoTable {
  return {
    async insert(row) {
      try {
        const { data, error } = await client.from(table).insert(row).select().single();
        if (error) return { error: error.message };
        const record: VideoRecord = data;
        logger.info('Video record created', { id: record.id, table });
        return { record };
      } catch (err) {
        if (isConnError(err)) logger.warn('Supabase unreachable for INSERT', { table });
        return { error: errorMessage(err) };
      }
    },
  };
}
