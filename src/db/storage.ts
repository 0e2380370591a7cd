/**
 * Video bucket — object upload plus public / signed URL resolution.
 */
import type { SupabaseClient } from '@supabase/supabase-js';

export interface VideoBucket {
  /** Resolves with the storage error message, or null on success. */
  upload(key: string, body: Buffer, contentType: string): Promise<{ error: string | null }>;
  /** Permanent URL for public buckets; null when none can be built. */
  publicUrl(key: string): string | null;
  /** Time-limited URL; null when the storage service returned none. */
  signedUrl(key: string, expiresInSeconds: number): Promise<string | null>;
}

export function createSupabaseBucket(client: SupabaseClient, bucketName: string): VideoBucket {
  const bucket = () => client.storage.from(bucketName);

  return {
    async upload(key, body, contentType) {
      const { error } = await bucket().upload(key, body, { contentType, upsert: false });
      return { error: error ? error.message : null };
    },

    publicUrl(key) {
      const { data } = bucket().getPublicUrl(key);
      return data.publicUrl || null;
    },

    async signedUrl(key, expiresInSeconds) {
      const { data, error } = await bucket().createSignedUrl(key, expiresInSeconds);
      if (error) throw new Error(`Supabase signed URL error: ${error.message}`);
      return data.signedUrl || null;
    },
  };
}
