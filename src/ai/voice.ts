/**
 * Voice synthesis — Google Translate speech by default, OpenAI TTS when
 * configured. Both engines produce MP3.
 */
import * as fs from 'fs/promises';
import googleTTS from 'google-tts-api';
import OpenAI from 'openai';
import type { OpenAiVoice, TtsConfig } from '../config.js';
import { SynthesisError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

const GOOGLE_HOST = 'https://translate.google.com';
const GOOGLE_TIMEOUT_MS = 10_000;

export async function synthesizeNarration(
  text: string,
  outputPath: string,
  tts: TtsConfig,
): Promise<string> {
  if (!text.trim()) throw new SynthesisError('Narration text is empty');

  logger.info('Voice: synthesizing narration', { engine: tts.engine, chars: text.length });
  try {
    const audio = tts.engine === 'openai'
      ? await openAiSynthesize(text, tts.apiKey, tts.voice)
      : await googleSynthesize(text, tts.language);
    await fs.writeFile(outputPath, audio);
  } catch (err) {
    throw new SynthesisError(`${tts.engine} TTS failed: ${errorMessage(err)}`, err);
  }

  logger.info('Voice: narration saved', { outputPath });
  return outputPath;
}

/** Long scripts come back as several MP3 segments, joined back to back. */
async function googleSynthesize(text: string, language: string): Promise<Buffer> {
  const segments = await googleTTS.getAllAudioBase64(text, {
    lang: language,
    slow: false,
    host: GOOGLE_HOST,
    splitPunct: ',.?!;:',
    timeout: GOOGLE_TIMEOUT_MS,
  });
  if (segments.length === 0) throw new Error('no audio segments returned');
  return Buffer.concat(segments.map(s => Buffer.from(s.base64, 'base64')));
}

async function openAiSynthesize(text: string, apiKey: string, voice: OpenAiVoice): Promise<Buffer> {
  const openai = new OpenAI({ apiKey });
  const res = await openai.audio.speech.create({
    model: 'tts-1',
    voice,
    input: text,
    response_format: 'mp3',
  });
  return Buffer.from(await res.arrayBuffer());
}
