import * as os from 'os';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

export const LogLevelSchema  = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['text', 'json']);

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

const optionalString = z.string().trim().min(1).optional()
  .or(z.literal('').transform(() => undefined));

const EnvSchema = z.object({
  // Inference
  HUGGINGFACE_API_KEY:   z.string().min(1),
  HUGGINGFACE_MODEL:     z.string().min(1).default('google/flan-t5-large'),
  INFERENCE_BASE_URL:    z.string().url().default('https://api-inference.huggingface.co/models'),

  // Storage + database
  SUPABASE_URL:          z.string().url(),
  SUPABASE_SERVICE_KEY:  z.string().min(1),
  SUPABASE_BUCKET:       z.string().min(1).default('ai_videos'),
  SUPABASE_TABLE:        z.string().min(1).default('videos'),

  // Media tooling
  FFMPEG_BIN:            z.string().min(1).default('ffmpeg'),
  FFPROBE_BIN:           optionalString,
  TITLE_FONT_FILE:       z.string().min(1).default('/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf'),

  // Narration
  TTS_ENGINE:            z.enum(['google', 'openai']).default('google'),
  TTS_LANGUAGE:          z.string().min(2).default('en'),
  OPENAI_API_KEY:        optionalString,
  OPENAI_TTS_VOICE:      z.enum(OPENAI_VOICES).default('alloy'),

  // Runtime
  TEMP_DIR:              z.string().min(1).default(os.tmpdir()),
  PORT:                  z.coerce.number().int().positive().default(8000),

  // Notifications (optional — alerts are disabled when unset)
  TELEGRAM_BOT_TOKEN:    optionalString,
  TELEGRAM_CHAT_ID:      optionalString,

  // Logging
  LOG_LEVEL:             LogLevelSchema.default('info'),
  LOG_FORMAT:            LogFormatSchema.default('text'),
}).superRefine((env, ctx) => {
  if (env.TTS_ENGINE === 'openai' && !env.OPENAI_API_KEY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['OPENAI_API_KEY'],
      message: 'required when TTS_ENGINE=openai',
    });
  }
});

// ── Domain constants ──────────────────────────────────────────────────────────

export const DEFAULT_LENGTH_SECONDS = 45;
export const MAX_LENGTH_SECONDS     = 600;
export const INFERENCE_TIMEOUT_MS   = 120_000;
export const SIGNED_URL_TTL_SECONDS = 60 * 60 * 24;

export const QUIZ_SHAPE = {
  items:   3,
  options: 4,
} as const;

export const RENDER = {
  width:       1280,
  height:      720,
  background:  '0x071013',
  fontSize:    36,
  fontColor:   'white',
  videoCodec:  'libx264',
  audioCodec:  'aac',
  pixelFormat: 'yuv420p',
} as const;

// ── Typed configuration ───────────────────────────────────────────────────────

export type OpenAiVoice = typeof OPENAI_VOICES[number];

export interface InferenceConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
}

export interface SupabaseConfig {
  readonly url: string;
  readonly serviceKey: string;
  readonly bucket: string;
  readonly table: string;
}

export interface MediaConfig {
  readonly ffmpegBin: string;
  readonly ffprobeBin: string;
  readonly fontFile: string;
}

export type TtsConfig =
  | { readonly engine: 'google'; readonly language: string }
  | { readonly engine: 'openai'; readonly language: string; readonly apiKey: string; readonly voice: OpenAiVoice };

export interface TelegramConfig {
  readonly botToken?: string;
  readonly chatId?: string;
}

export interface AppConfig {
  readonly inference: InferenceConfig;
  readonly supabase: SupabaseConfig;
  readonly media: MediaConfig;
  readonly tts: TtsConfig;
  readonly telegram: TelegramConfig;
  readonly tempDir: string;
  readonly port: number;
}

/** ffprobe lives beside ffmpeg unless told otherwise. */
export function deriveFfprobeBin(ffmpegBin: string): string {
  return ffmpegBin.replace(/ffmpeg(?=[^/\\]*$)/, 'ffprobe');
}

/**
 * Parse and freeze the process configuration. Throws on the first call with a
 * message naming every missing or invalid variable, so startup aborts.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Missing or invalid environment variables: ${missing}`);
  }
  const env = parsed.data;

  const tts: TtsConfig = env.TTS_ENGINE === 'openai' && env.OPENAI_API_KEY
    ? { engine: 'openai', language: env.TTS_LANGUAGE, apiKey: env.OPENAI_API_KEY, voice: env.OPENAI_TTS_VOICE }
    : { engine: 'google', language: env.TTS_LANGUAGE };

  return Object.freeze({
    inference: Object.freeze({
      apiKey:    env.HUGGINGFACE_API_KEY,
      model:     env.HUGGINGFACE_MODEL,
      baseUrl:   env.INFERENCE_BASE_URL,
      timeoutMs: INFERENCE_TIMEOUT_MS,
    }),
    supabase: Object.freeze({
      url:        env.SUPABASE_URL,
      serviceKey: env.SUPABASE_SERVICE_KEY,
      bucket:     env.SUPABASE_BUCKET,
      table:      env.SUPABASE_TABLE,
    }),
    media: Object.freeze({
      ffmpegBin:  env.FFMPEG_BIN,
      ffprobeBin: env.FFPROBE_BIN ?? deriveFfprobeBin(env.FFMPEG_BIN),
      fontFile:   env.TITLE_FONT_FILE,
    }),
    tts: Object.freeze(tts),
    telegram: Object.freeze({
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId:   env.TELEGRAM_CHAT_ID,
    }),
    tempDir: env.TEMP_DIR,
    port:    env.PORT,
  });
}
