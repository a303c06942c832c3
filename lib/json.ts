import { MalformedOutputError } from '@/lib/pipeline/errors';

const JSON_FENCE = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/;

/** Pulls a JSON object out of a ```json fence when a model wrapped its answer in one. */
export function extractJsonCandidate(text: string): string {
  const trimmed = (text ?? '').trim();
  if (!trimmed) return trimmed;
  const fenced = JSON_FENCE.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

/** Strict parse of model output; truncated or invalid JSON yields no data at all. */
export function parseModelJson(text: string): unknown {
  const candidate = extractJsonCandidate(text);
  if (!candidate) {
    throw new MalformedOutputError('Model returned an empty response');
  }
  try {
    return JSON.parse(candidate);
  } catch {
    throw new MalformedOutputError('Model output is not valid JSON');
  }
}
