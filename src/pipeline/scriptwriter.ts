/**
 * Scriptwriter — asks the hosted model for a lesson payload (title, script,
 * quiz) and turns its free-form answer into a validated LessonPayload.
 */
import { z } from 'zod';
import { generateText } from '../ai/huggingface.js';
import { QUIZ_SHAPE, type InferenceConfig } from '../config.js';
import { GenerationError, errorMessage } from '../errors.js';
import { extractJsonObject } from '../utils/json.js';
import { logger } from '../utils/logger.js';

// ── Payload schema ────────────────────────────────────────────────────────────

export const QuizItemSchema = z.object({
  question: z.string().trim().min(1),
  options:  z.array(z.string()).length(QUIZ_SHAPE.options),
  answer:   z.string(),
}).refine(item => item.options.includes(item.answer), {
  message: 'answer must match one of the options',
  path: ['answer'],
});

export const LessonPayloadSchema = z.object({
  title:  z.string().trim().min(1),
  script: z.string().trim().min(1),
  quiz:   z.array(QuizItemSchema).length(QUIZ_SHAPE.items),
});

export type QuizItem = z.infer<typeof QuizItemSchema>;
export type LessonPayload = z.infer<typeof LessonPayloadSchema>;

export interface LessonBrief {
  topic: string;
  role: string;
  length_seconds: number;
}

const REQUIRED_KEYS = ['title', 'script', 'quiz'] as const;

// ── Prompt ────────────────────────────────────────────────────────────────────

export function buildLessonPrompt(brief: LessonBrief): string {
  return [
    `You are a witty, friendly teacher. Write a short lesson for a ${brief.role} on the topic "${brief.topic}".`,
    `Keep it humorous (exactly one clean joke or meme reference), conversational, and short enough to read aloud in about ${brief.length_seconds} seconds.`,
    'Respond with ONLY a JSON object, no text before or after it, using these keys:',
    '  - title: a short title',
    '  - script: the lesson text, 3 to 6 short sentences',
    `  - quiz: an array of exactly ${QUIZ_SHAPE.items} objects, each with "question", "options" (an array of ${QUIZ_SHAPE.options} strings) and "answer" (copied exactly from one of the options)`,
    'Example:',
    '{"title":"...","script":"...","quiz":[{"question":"...","options":["A","B","C","D"],"answer":"B"}]}',
    'The JSON must be parseable.',
  ].join('\n');
}

// ── Output parsing ────────────────────────────────────────────────────────────

/**
 * Text-generation endpoints return the prompt ahead of the completion unless
 * told otherwise; the prompt's own example object must not be parsed as the
 * answer.
 */
export function stripPromptEcho(raw: string, prompt: string): string {
  const trimmed = raw.trimStart();
  return trimmed.startsWith(prompt) ? trimmed.slice(prompt.length) : raw;
}

/**
 * Parse the first balanced object in the raw text; if that fails, parse the
 * whole text. Throws UnparsableModelOutput with the head of the raw text.
 */
export function parseModelJson(raw: string): unknown {
  const candidate = extractJsonObject(raw);
  let reason: string;

  if (candidate === null) {
    reason = raw.includes('{') ? 'Could not find end of JSON in model output' : 'No JSON object found in model output';
  } else {
    try {
      return JSON.parse(candidate);
    } catch (err) {
      reason = errorMessage(err);
    }
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new GenerationError(
      'UnparsableModelOutput',
      `Could not parse JSON from model output: ${reason} | raw: ${raw.slice(0, 1000)}`,
    );
  }
}

/**
 * Key presence first (IncompleteModelOutput), then shape: non-empty title and
 * script, exactly three quiz items of four options with a matching answer
 * (MalformedQuiz).
 */
export function validateLessonPayload(data: unknown): LessonPayload {
  const record = typeof data === 'object' && data !== null && !Array.isArray(data) ? data : {};
  const missing = REQUIRED_KEYS.filter(key => !(key in record));
  if (missing.length > 0) {
    throw new GenerationError(
      'IncompleteModelOutput',
      `Invalid output from model: missing keys ${missing.join(', ')}. raw: ${String(JSON.stringify(data)).slice(0, 800)}`,
    );
  }

  const parsed = LessonPayloadSchema.safeParse(record);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new GenerationError('MalformedQuiz', `Model output failed validation: ${problems}`);
  }
  return parsed.data;
}

// ── Entry point ───────────────────────────────────────────────────────────────

export async function generateLesson(brief: LessonBrief, inference: InferenceConfig): Promise<LessonPayload> {
  logger.info('Scriptwriter: generating lesson', { topic: brief.topic, role: brief.role, seconds: brief.length_seconds });

  const prompt = buildLessonPrompt(brief);
  const raw = stripPromptEcho(await generateText(prompt, inference), prompt);
  const lesson = validateLessonPayload(parseModelJson(raw));

  logger.info('Scriptwriter: lesson ready', {
    title: lesson.title,
    scriptChars: lesson.script.length,
    quizItems: lesson.quiz.length,
  });
  return lesson;
}
