/**
 * Hosted inference client — Hugging Face Inference API (text generation).
 *
 * The response body is not contractually fixed across models, so it is
 * classified into a closed set of shapes and reduced to one text blob.
 */
import type { InferenceConfig } from '../config.js';
import { GenerationError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

// ── Response shapes ───────────────────────────────────────────────────────────

export type InferenceOutput =
  | { kind: 'generated_text'; text: string }
  | { kind: 'text'; text: string }
  | { kind: 'object'; value: Record<string, unknown> }
  | { kind: 'scalar'; value: unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}

/**
 * Classify a decoded response body:
 * - `[{ generated_text }]` and `{ generated_text }` → generated_text
 * - `[{ text }]` → text
 * - `[{ ...anything else }]` → object
 * - everything else (first list element, or the whole value) → scalar
 */
export function classifyInferenceOutput(raw: unknown): InferenceOutput {
  if (Array.isArray(raw) && raw.length > 0) {
    const first: unknown = raw[0];
    if (isRecord(first)) {
      if ('generated_text' in first) return { kind: 'generated_text', text: stringify(first['generated_text']) };
      if ('text' in first) return { kind: 'text', text: stringify(first['text']) };
      return { kind: 'object', value: first };
    }
    return { kind: 'scalar', value: first };
  }
  if (isRecord(raw) && 'generated_text' in raw) {
    return { kind: 'generated_text', text: stringify(raw['generated_text']) };
  }
  return { kind: 'scalar', value: raw };
}

export function inferenceOutputText(output: InferenceOutput): string {
  switch (output.kind) {
    case 'generated_text':
    case 'text':
      return output.text;
    case 'object':
      return JSON.stringify(output.value);
    case 'scalar':
      return stringify(output.value);
  }
}

// ── HTTP call ─────────────────────────────────────────────────────────────────

/**
 * POST the prompt to the model endpoint and return the response as raw text.
 * Waits for cold models; aborts after `timeoutMs`.
 */
export async function generateText(prompt: string, inference: InferenceConfig): Promise<string> {
  const url = `${inference.baseUrl.replace(/\/+$/, '')}/${inference.model}`;
  logger.info('Inference: requesting completion', { model: inference.model, promptChars: prompt.length });

  let res: Response;
  let body: string;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${inference.apiKey}`,
        'Accept':        'application/json',
        'Content-Type':  'application/json',
      },
      body: JSON.stringify({
        inputs: prompt,
        options: { wait_for_model: true, use_cache: false },
      }),
      signal: AbortSignal.timeout(inference.timeoutMs),
    });
    body = await res.text();
  } catch (err) {
    throw new GenerationError('UpstreamUnavailable', `Inference request failed: ${errorMessage(err)}`, err);
  }

  if (!res.ok) {
    throw new GenerationError('UpstreamUnavailable', `Inference error: ${res.status} ${body.slice(0, 300)}`);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    // Some text-generation backends answer with a bare text body
    decoded = body;
  }

  const output = classifyInferenceOutput(decoded);
  logger.debug('Inference: response classified', { kind: output.kind });
  return inferenceOutputText(output);
}
